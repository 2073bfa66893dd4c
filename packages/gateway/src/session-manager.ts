/**
 * Session Manager
 *
 * One research session per connection, plus the abort controller of the turn
 * the connection is running. A connection runs one turn at a time.
 */

import { CitelineError } from "@citeline/shared";
import { Logger, createAbortError } from "@citeline/kernel";
import type { ResearchEngine, ResearchSession } from "@citeline/core";

const log = Logger.for("SessionManager");

interface ManagedSession {
  session: ResearchSession;
  /** Present while a turn is running */
  turn?: AbortController;
  openedAt: Date;
}

export interface SessionSummary {
  id: string;
  openedAt: string;
  busy: boolean;
  sources: number;
  notes: number;
}

export class SessionManager {
  private sessions = new Map<string, ManagedSession>();

  constructor(private readonly engine: ResearchEngine) {}

  open(clientId: string): ResearchSession {
    return this.ensure(clientId).session;
  }

  get(clientId: string): ResearchSession | undefined {
    return this.sessions.get(clientId)?.session;
  }

  isBusy(clientId: string): boolean {
    return this.sessions.get(clientId)?.turn !== undefined;
  }

  /**
   * Claim the connection for a new turn.
   *
   * @throws CitelineError TURN_IN_PROGRESS when a turn is already running
   */
  beginTurn(clientId: string): { session: ResearchSession; controller: AbortController } {
    const managed = this.ensure(clientId);
    if (managed.turn) {
      throw new CitelineError(
        "A research turn is already in progress; wait for it to finish or clear the session",
        "TURN_IN_PROGRESS",
      );
    }

    const controller = new AbortController();
    managed.turn = controller;
    return { session: managed.session, controller };
  }

  /**
   * Release the connection. A controller that was already replaced (by a
   * clear) leaves the current state alone.
   */
  endTurn(clientId: string, controller: AbortController): void {
    const managed = this.sessions.get(clientId);
    if (managed?.turn === controller) {
      managed.turn = undefined;
    }
  }

  /**
   * Abort the running turn, if any.
   */
  cancel(clientId: string, reason: string): boolean {
    const managed = this.sessions.get(clientId);
    const turn = managed?.turn;
    if (!managed || !turn) return false;

    managed.turn = undefined;
    turn.abort(createAbortError(reason));
    log.debug({ sessionId: clientId, reason }, "turn aborted");
    return true;
  }

  /**
   * Abort the running turn and reset the session's research state.
   */
  reset(clientId: string): boolean {
    const managed = this.sessions.get(clientId);
    if (!managed) return false;

    this.cancel(clientId, "Session cleared");
    managed.session.clear();
    log.info({ sessionId: clientId }, "session cleared");
    return true;
  }

  /**
   * Abort the running turn and forget the session.
   */
  close(clientId: string): void {
    this.cancel(clientId, "Connection closed");
    if (this.sessions.delete(clientId)) {
      log.debug({ sessionId: clientId }, "session closed");
    }
  }

  closeAll(): void {
    for (const clientId of Array.from(this.sessions.keys())) {
      this.close(clientId);
    }
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.entries(), ([id, managed]) => {
      const snapshot = managed.session.snapshot();
      return {
        id,
        openedAt: managed.openedAt.toISOString(),
        busy: managed.turn !== undefined,
        sources: snapshot.sources.length,
        notes: snapshot.notes.length,
      };
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  private ensure(clientId: string): ManagedSession {
    const existing = this.sessions.get(clientId);
    if (existing) return existing;

    const managed: ManagedSession = {
      session: this.engine.createSession(clientId),
      openedAt: new Date(),
    };
    this.sessions.set(clientId, managed);
    log.debug({ sessionId: clientId }, "session opened");
    return managed;
  }
}
