/**
 * Connection Handler
 *
 * Routes client frames (`chat`, `clear`) for one connection. A chat turn is
 * driven by pulling events from the research engine and awaiting each socket
 * write before pulling the next, so a slow client suspends the loop.
 */

import {
  InvalidMessageError,
  CitelineError,
  errorMessage,
  parseClientMessage,
  type ServerEvent,
} from "@citeline/shared";
import { Logger } from "@citeline/kernel";
import type { ResearchEngine } from "@citeline/core";
import type { SessionManager } from "./session-manager.js";
import type { TransportClient } from "./transport.js";

const log = Logger.for("ConnectionHandler");

export class ConnectionHandler {
  constructor(
    private readonly engine: ResearchEngine,
    private readonly sessions: SessionManager,
  ) {}

  /**
   * Handle one raw frame. Never rejects: failures are reported to the client
   * or logged.
   */
  async handleMessage(client: TransportClient, data: string): Promise<void> {
    let message;
    try {
      message = parseClientMessage(data);
    } catch (error) {
      const text = error instanceof InvalidMessageError ? error.message : "Invalid message";
      log.debug({ clientId: client.id, error: text }, "rejected client frame");
      await this.deliver(client, { type: "error", message: text });
      return;
    }

    switch (message.type) {
      case "chat":
        await this.handleChat(client, message.message);
        return;
      case "clear":
        await this.handleClear(client);
        return;
    }
  }

  async handleChat(client: TransportClient, text: string): Promise<void> {
    let turn;
    try {
      turn = this.sessions.beginTurn(client.id);
    } catch (error) {
      if (error instanceof CitelineError && error.code === "TURN_IN_PROGRESS") {
        await this.deliver(client, { type: "error", message: error.message });
        return;
      }
      throw error;
    }

    const { session, controller } = turn;
    try {
      for await (const event of this.engine.run(session, text, { signal: controller.signal })) {
        await client.send(event);
      }
    } catch (error) {
      if (controller.signal.aborted || !client.isConnected) {
        log.debug({ clientId: client.id }, "turn stopped: %s", errorMessage(error));
        return;
      }
      log.error({ clientId: client.id, err: error }, "turn delivery failed");
      await this.deliver(client, { type: "error", message: errorMessage(error) });
    } finally {
      this.sessions.endTurn(client.id, controller);
    }
  }

  async handleClear(client: TransportClient): Promise<void> {
    this.sessions.open(client.id);
    this.sessions.reset(client.id);
    await this.deliver(client, { type: "cleared" });
  }

  /**
   * Abort the connection's turn and drop its session.
   */
  handleDisconnect(clientId: string): void {
    this.sessions.close(clientId);
  }

  /**
   * Best-effort send for replies outside a turn's event stream.
   */
  private async deliver(client: TransportClient, event: ServerEvent): Promise<void> {
    try {
      await client.send(event);
    } catch (error) {
      log.debug({ clientId: client.id, type: event.type, err: error }, "could not deliver event");
    }
  }
}
