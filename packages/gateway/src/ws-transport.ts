/**
 * WebSocket Transport
 *
 * Implements the Transport interface with `ws`, sharing the gateway's HTTP
 * server (upgrade requests on one path, plain requests go to the HTTP routes).
 */

import { randomUUID } from "node:crypto";
import type { Server } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { ServerEvent } from "@citeline/shared";
import { Logger, createAbortError } from "@citeline/kernel";
import { BaseTransport, type TransportClient } from "./transport.js";

const log = Logger.for("WSTransport");

export interface WSTransportConfig {
  /** HTTP server whose upgrade requests this transport accepts */
  server: Server;
  /** @default "/ws" */
  path?: string;
}

function frameToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

// ============================================================================
// WebSocket Client
// ============================================================================

class WSClientImpl implements TransportClient {
  readonly id: string;
  readonly connectedAt = new Date();

  constructor(
    id: string,
    readonly socket: WebSocket,
  ) {
    this.id = id;
  }

  send(event: ServerEvent): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(createAbortError("Connection closed"));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(JSON.stringify(event), (error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  get isConnected(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }
}

// ============================================================================
// WebSocket Transport
// ============================================================================

export class WSTransport extends BaseTransport {
  readonly type = "websocket" as const;
  private wss: WebSocketServer | null = null;
  private readonly config: WSTransportConfig;

  constructor(config: WSTransportConfig) {
    super();
    this.config = config;
  }

  get path(): string {
    return this.config.path ?? "/ws";
  }

  override start(): Promise<void> {
    if (this.wss) return Promise.resolve();

    this.wss = new WebSocketServer({ server: this.config.server, path: this.path });
    this.wss.on("connection", (socket) => this.handleConnection(socket));
    this.wss.on("error", (error) => {
      log.error({ err: error }, "websocket server error");
      this.handlers.error?.(error);
    });
    return Promise.resolve();
  }

  override stop(): Promise<void> {
    return new Promise((resolve) => {
      const wss = this.wss;
      if (!wss) {
        resolve();
        return;
      }

      for (const client of this.clients.values()) {
        client.close(1001, "Server shutting down");
      }

      wss.close(() => {
        this.wss = null;
        resolve();
      });
    });
  }

  private handleConnection(socket: WebSocket): void {
    const client = new WSClientImpl(randomUUID(), socket);
    this.clients.set(client.id, client);
    log.info({ clientId: client.id }, "client connected");

    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        log.debug({ clientId: client.id }, "ignoring binary frame");
        return;
      }
      this.handlers.message?.(client, frameToString(data));
    });

    socket.on("close", (code, reason) => {
      this.clients.delete(client.id);
      log.info({ clientId: client.id, code }, "client disconnected");
      this.handlers.disconnect?.(client.id, reason.toString() || undefined);
    });

    socket.on("error", (error) => {
      log.warn({ clientId: client.id, err: error }, "socket error");
      this.handlers.error?.(error);
    });

    this.handlers.connection?.(client);
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createWSTransport(config: WSTransportConfig): WSTransport {
  return new WSTransport(config);
}
