/**
 * Research Gateway
 *
 * One HTTP server carrying the WebSocket research endpoint and the HTTP
 * inspection routes. Each connection gets its own research session, created
 * when the client connects and discarded (with its in-flight turn aborted)
 * when it disconnects.
 */

import { EventEmitter } from "node:events";
import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { Logger } from "@citeline/kernel";
import type { ResearchEngine } from "@citeline/core";
import { WSTransport } from "./ws-transport.js";
import { SessionManager } from "./session-manager.js";
import { ConnectionHandler } from "./connection-handler.js";
import { HttpRoutes } from "./http-routes.js";

const log = Logger.for("Gateway");

export interface GatewayConfig {
  engine: ResearchEngine;
  /** @default 8000 (0 picks a free port) */
  port?: number;
  /** @default "0.0.0.0" */
  host?: string;
  /** WebSocket endpoint path. @default "/ws" */
  path?: string;
  /** @default "*" */
  corsOrigin?: string;
}

export interface GatewayEvents {
  started: [{ port: number; host: string }];
  stopped: [];
}

export class ResearchGateway extends EventEmitter<GatewayEvents> {
  readonly sessions: SessionManager;
  private readonly server: Server;
  private readonly transport: WSTransport;
  private readonly handler: ConnectionHandler;
  private readonly routes: HttpRoutes;
  private isRunning = false;

  constructor(private readonly config: GatewayConfig) {
    super();
    this.sessions = new SessionManager(config.engine);
    this.handler = new ConnectionHandler(config.engine, this.sessions);
    this.server = createServer();
    this.transport = new WSTransport({ server: this.server, path: config.path });
    this.routes = new HttpRoutes({
      engine: config.engine,
      sessions: this.sessions,
      transport: this.transport,
      corsOrigin: config.corsOrigin,
    });

    this.server.on("request", (req, res) => {
      this.routes.handleRequest(req, res).catch((error: unknown) => {
        log.error({ err: error, url: req.url }, "request failed");
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
        }
        res.end(JSON.stringify({ error: "Internal server error" }));
      });
    });

    this.transport.on("connection", (client) => {
      this.sessions.open(client.id);
    });
    this.transport.on("message", (client, data) => {
      void this.handler.handleMessage(client, data);
    });
    this.transport.on("disconnect", (clientId) => {
      this.handler.handleDisconnect(clientId);
    });
  }

  /**
   * Bound address once started.
   */
  get address(): AddressInfo | undefined {
    const address = this.server.address();
    return address && typeof address === "object" ? address : undefined;
  }

  get running(): boolean {
    return this.isRunning;
  }

  /**
   * Start listening. Resolves with the bound port.
   */
  async start(): Promise<number> {
    if (this.isRunning) {
      throw new Error("Gateway is already running");
    }

    await this.transport.start();
    const port = this.config.port ?? 8000;
    const host = this.config.host ?? "0.0.0.0";

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        resolve();
      });
    });

    this.isRunning = true;
    const bound = this.address?.port ?? port;
    log.info({ host, port: bound, path: this.transport.path }, "gateway listening");
    this.emit("started", { port: bound, host });
    return bound;
  }

  /**
   * Abort every turn, close every connection and stop listening.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.sessions.closeAll();
    await this.transport.stop();
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
      this.server.closeAllConnections();
    });

    this.isRunning = false;
    log.info("gateway stopped");
    this.emit("stopped");
  }
}

export function createResearchGateway(config: GatewayConfig): ResearchGateway {
  return new ResearchGateway(config);
}
