/**
 * HTTP Routes
 *
 * Plain requests on the gateway port: health check and read-only session
 * inspection, a reset endpoint that behaves like a `clear` frame, and two
 * request/response entry points that run a whole turn and answer once:
 * `POST /api/chat` (continues a named session) and `POST /research` (one
 * page, throwaway session).
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import { CitelineError, type CitedSource } from "@citeline/shared";
import { Logger } from "@citeline/kernel";
import type { ResearchEngine, ResearchSession } from "@citeline/core";
import type { SessionManager } from "./session-manager.js";
import type { Transport } from "./transport.js";

const log = Logger.for("HttpRoutes");

export interface HttpRoutesOptions {
  engine: ResearchEngine;
  sessions: SessionManager;
  transport: Transport;
  /** @default "*" */
  corsOrigin?: string;
}

const SESSION_ROUTE = /^\/api\/sessions\/([^/]+)\/(sources|notes|reset)$/;

const MAX_BODY_BYTES = 64 * 1024;

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1, "Message is required"),
  session_id: z.string().trim().min(1).default("default"),
});

export const PageResearchRequestSchema = z.object({
  url: z.url("A valid absolute url is required"),
  query: z.string().trim().min(1, "Query is required"),
});

/** Outcome of a turn drained into a single reply */
export type TurnOutcome =
  | { success: true; response: string; sources: CitedSource[] }
  | { success: false; error: string };

class RequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = "RequestError";
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) throw new RequestError("Request body too large", 413);
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString("utf8");
  try {
    return text ? JSON.parse(text) : {};
  } catch {
    throw new RequestError("Request body is not valid JSON", 400);
  }
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestError(result.error.issues[0]?.message ?? "Invalid request body", 400);
  }
  return result.data;
}

function decodeSessionId(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    log.debug({ raw, err: error }, "undecodable session id");
    return undefined;
  }
}

export class HttpRoutes {
  constructor(private readonly options: HttpRoutesOptions) {}

  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    res.setHeader("Access-Control-Allow-Origin", this.options.corsOrigin ?? "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const path = url.pathname;
    log.debug({ method: req.method, path }, "handleRequest");

    if (path === "/health") {
      if (req.method !== "GET") return sendJson(res, 405, { error: "Method not allowed" });
      return this.handleHealth(res);
    }

    if (path === "/api/chat" || path === "/research") {
      if (req.method !== "POST") return sendJson(res, 405, { error: "Method not allowed" });
      try {
        const body = await readJsonBody(req);
        return await (path === "/api/chat" ? this.handleChat(body, res) : this.handlePageResearch(body, res));
      } catch (error) {
        if (error instanceof RequestError) return sendJson(res, error.status, { error: error.message });
        throw error;
      }
    }

    if (path === "/api/sessions") {
      if (req.method !== "GET") return sendJson(res, 405, { error: "Method not allowed" });
      return sendJson(res, 200, { sessions: this.options.sessions.list() });
    }

    const match = SESSION_ROUTE.exec(path);
    if (match) {
      const [, rawId = "", action] = match;
      const id = decodeSessionId(rawId);
      if (id === undefined) return sendJson(res, 400, { error: "Invalid session id" });
      if (action === "reset") {
        if (req.method !== "POST") return sendJson(res, 405, { error: "Method not allowed" });
        return this.handleReset(id, res);
      }
      if (req.method !== "GET") return sendJson(res, 405, { error: "Method not allowed" });
      return this.handleSnapshot(id, action === "notes" ? "notes" : "sources", res);
    }

    sendJson(res, 404, { error: "Not found" });
  }

  private handleHealth(res: ServerResponse): void {
    sendJson(res, 200, {
      status: "healthy",
      timestamp: new Date().toISOString(),
      model: this.options.engine.model.id,
      sessions: this.options.sessions.size,
    });
  }

  private async handleChat(body: unknown, res: ServerResponse): Promise<void> {
    const request = parseBody(ChatRequestSchema, body);
    const sessionId = request.session_id;

    let turn;
    try {
      turn = this.options.sessions.beginTurn(sessionId);
    } catch (error) {
      if (error instanceof CitelineError && error.code === "TURN_IN_PROGRESS") {
        return sendJson(res, 409, { success: false, error: error.message, session_id: sessionId });
      }
      throw error;
    }

    const { session, controller } = turn;
    const onClose = () => {
      if (!res.writableFinished) this.options.sessions.cancel(sessionId, "Request closed");
    };
    res.on("close", onClose);
    try {
      const outcome = await this.drainTurn(session, request.message, controller.signal);
      sendJson(res, 200, {
        ...outcome,
        ...(outcome.success ? {} : { response: "", sources: [] }),
        notes_count: session.snapshot().notes.length,
        session_id: sessionId,
      });
    } finally {
      res.off("close", onClose);
      this.options.sessions.endTurn(sessionId, controller);
    }
  }

  private async handlePageResearch(body: unknown, res: ServerResponse): Promise<void> {
    const request = parseBody(PageResearchRequestSchema, body);
    const session = this.options.engine.createSession(`research-${randomUUID()}`);
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on("close", onClose);

    const message =
      `Read the page at ${request.url} with fetch_page_content and answer from it: ${request.query}`;
    try {
      const outcome = await this.drainTurn(session, message, controller.signal);
      sendJson(res, 200, {
        ...outcome,
        url: request.url,
        query: request.query,
        timestamp: new Date().toISOString(),
      });
    } finally {
      res.off("close", onClose);
    }
  }

  /**
   * Run a turn to its end and keep only the final event. A turn that ends
   * without one was cancelled.
   */
  private async drainTurn(session: ResearchSession, message: string, signal: AbortSignal): Promise<TurnOutcome> {
    let outcome: TurnOutcome = { success: false, error: "Research turn was cancelled" };
    for await (const event of this.options.engine.run(session, message, { signal })) {
      if (event.type === "complete") {
        outcome = { success: true, response: event.data.response, sources: event.data.sources };
      } else if (event.type === "error") {
        outcome = { success: false, error: event.message };
      }
    }
    log.debug({ sessionId: session.id, success: outcome.success }, "turn drained");
    return outcome;
  }

  private handleSnapshot(id: string, field: "sources" | "notes", res: ServerResponse): void {
    const session = this.options.sessions.get(id);
    if (!session) {
      sendJson(res, 404, { error: `Session ${id} not found` });
      return;
    }
    const snapshot = session.snapshot();
    sendJson(res, 200, { sessionId: id, [field]: snapshot[field] });
  }

  private async handleReset(id: string, res: ServerResponse): Promise<void> {
    if (!this.options.sessions.reset(id)) {
      sendJson(res, 404, { error: `Session ${id} not found` });
      return;
    }

    const client = this.options.transport.getClient(id);
    if (client?.isConnected) {
      try {
        await client.send({ type: "cleared" });
      } catch (error) {
        log.debug({ sessionId: id, err: error }, "could not notify client of reset");
      }
    }
    sendJson(res, 200, { sessionId: id, cleared: true });
  }
}
