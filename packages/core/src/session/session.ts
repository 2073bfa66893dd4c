/**
 * Research Session
 *
 * Per-connection research state: transcript, notes, sources and the step
 * counter of the running turn. All mutation during a turn goes through a
 * `TurnHandle`; once the session is cleared or a newer turn begins, the old
 * handle refuses to mutate (late tool results are dropped, never applied).
 *
 * @module @citeline/core/session
 */

import { randomUUID } from "node:crypto";
import type { ResearchNote, SourceEntry, Turn } from "@citeline/shared";
import { createAbortError } from "@citeline/kernel";

export interface SourceInput {
  url: string;
  title: string;
  snippet?: string;
  query?: string;
}

export interface SessionSnapshot {
  readonly id: string;
  readonly transcript: readonly Turn[];
  readonly notes: readonly ResearchNote[];
  readonly sources: readonly SourceEntry[];
  readonly stepCount: number;
  /** Incremented by every clear() */
  readonly generation: number;
}

/**
 * Key used for idempotent source insertion: trimmed, fragment removed,
 * scheme and host lower-cased. Unparseable addresses key on their trimmed text.
 */
export function normalizeUrl(raw: string): string {
  const trimmed = raw.trim();
  try {
    const url = new URL(trimmed);
    url.hash = "";
    return url.toString();
  } catch {
    return trimmed;
  }
}

export class ResearchSession {
  readonly id: string;

  private transcript: Turn[] = [];
  private notes: ResearchNote[] = [];
  private sources = new Map<string, SourceEntry>();
  private stepCount = 0;
  private generation = 0;

  private turnCounter = 0;
  private activeTurnId: number | undefined;
  private turnSources = new Set<number>();

  constructor(id: string = randomUUID()) {
    this.id = id;
  }

  /**
   * Start a user turn: resets the step counter and the per-turn source set.
   * Any previous turn handle goes stale.
   */
  beginTurn(): TurnHandle {
    this.stepCount = 0;
    this.turnSources = new Set();
    this.activeTurnId = ++this.turnCounter;
    return new TurnHandle(this, this.activeTurnId, this.transcript.length);
  }

  record(turn: Turn): void {
    this.transcript.push(turn);
  }

  /**
   * Insert a source or reuse the index of an already-seen URL.
   * Fields missing on the stored entry are filled in from later sightings.
   */
  addSource(input: SourceInput): number {
    const key = normalizeUrl(input.url);
    const existing = this.sources.get(key);
    if (existing) {
      if (!existing.title && input.title) existing.title = input.title;
      if (existing.snippet === undefined && input.snippet !== undefined) {
        existing.snippet = input.snippet;
      }
      if (existing.query === undefined && input.query !== undefined) {
        existing.query = input.query;
      }
      this.turnSources.add(existing.index);
      return existing.index;
    }

    const entry: SourceEntry = {
      index: this.sources.size + 1,
      url: input.url.trim(),
      title: input.title,
      addedAt: new Date().toISOString(),
      ...(input.snippet !== undefined ? { snippet: input.snippet } : {}),
      ...(input.query !== undefined ? { query: input.query } : {}),
    };
    this.sources.set(key, entry);
    this.turnSources.add(entry.index);
    return entry.index;
  }

  addNote(content: string, sourceUrl?: string): ResearchNote {
    const note: ResearchNote = {
      id: randomUUID(),
      content,
      createdAt: new Date().toISOString(),
      ...(sourceUrl ? { sourceUrl } : {}),
    };
    this.notes.push(note);
    return note;
  }

  /**
   * Reset transcript, notes, sources and step counter together.
   */
  clear(): void {
    this.transcript = [];
    this.notes = [];
    this.sources = new Map();
    this.stepCount = 0;
    this.turnSources = new Set();
    this.activeTurnId = undefined;
    this.generation++;
  }

  snapshot(): SessionSnapshot {
    return Object.freeze({
      id: this.id,
      transcript: Object.freeze(this.transcript.map((turn) => Object.freeze({ ...turn }))),
      notes: Object.freeze(this.notes.map((note) => Object.freeze({ ...note }))),
      sources: Object.freeze(
        Array.from(this.sources.values(), (source) => Object.freeze({ ...source })),
      ),
      stepCount: this.stepCount,
      generation: this.generation,
    });
  }

  /** @internal */
  isActiveTurn(turnId: number): boolean {
    return this.activeTurnId === turnId;
  }

  /** @internal */
  incrementStep(): number {
    return ++this.stepCount;
  }

  /** @internal */
  currentTurnSources(): SourceEntry[] {
    return Array.from(this.sources.values())
      .filter((source) => this.turnSources.has(source.index))
      .map((source) => ({ ...source }));
  }

  /** @internal */
  truncateTranscript(length: number): void {
    this.transcript.length = Math.min(this.transcript.length, length);
  }

  /** @internal */
  transcriptView(): readonly Turn[] {
    return this.transcript.slice();
  }
}

/**
 * Capability to mutate a session on behalf of one turn.
 */
export class TurnHandle {
  constructor(
    private readonly session: ResearchSession,
    readonly id: number,
    /** Transcript length when the turn began */
    readonly startIndex: number,
  ) {}

  get sessionId(): string {
    return this.session.id;
  }

  get isCurrent(): boolean {
    return this.session.isActiveTurn(this.id);
  }

  record(turn: Turn): void {
    this.assertCurrent();
    this.session.record(turn);
  }

  addSource(input: SourceInput): number {
    this.assertCurrent();
    return this.session.addSource(input);
  }

  addNote(content: string, sourceUrl?: string): ResearchNote {
    this.assertCurrent();
    return this.session.addNote(content, sourceUrl);
  }

  /**
   * Count one tool-dispatch round.
   *
   * @returns the step number just started (1-based)
   */
  nextStep(): number {
    this.assertCurrent();
    return this.session.incrementStep();
  }

  /** Sources added or re-used during this turn, in index order */
  sources(): SourceEntry[] {
    return this.isCurrent ? this.session.currentTurnSources() : [];
  }

  transcript(): readonly Turn[] {
    return this.session.transcriptView();
  }

  /**
   * Drop every transcript entry this turn added. No-op once stale.
   */
  rollback(): void {
    if (this.isCurrent) {
      this.session.truncateTranscript(this.startIndex);
    }
  }

  private assertCurrent(): void {
    if (!this.isCurrent) {
      throw createAbortError("Turn is no longer current; the session was cleared or moved on");
    }
  }
}
