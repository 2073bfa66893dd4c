/**
 * Transcript, tool call and research-state types.
 *
 * @module @citeline/shared/transcript
 */

// ============================================================================
// Tools
// ============================================================================

export const TOOL_NAMES = [
  "decompose_query",
  "search_web",
  "fetch_page_content",
  "take_note",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(value);
}

/**
 * A tool invocation requested by the model.
 *
 * `arguments` is still raw here: the registry validates it against the
 * tool's schema before anything runs.
 */
export interface ToolCall {
  callId: string;
  name: string;
  arguments: unknown;
}

/**
 * Outcome of one tool call, serialized into the transcript for the model.
 */
export interface ToolResult {
  callId: string;
  name: string;
  success: boolean;
  /** JSON document handed back to the model */
  content: string;
  error?: string;
}

// ============================================================================
// Transcript
// ============================================================================

export interface UserTurn {
  role: "user";
  content: string;
}

export interface AssistantTurn {
  role: "assistant";
  content: string;
  /** Present when this turn asked for tools instead of answering */
  toolCalls?: ToolCall[];
}

export interface ToolTurn {
  role: "tool";
  content: string;
  toolCallId: string;
  name: string;
}

export type Turn = UserTurn | AssistantTurn | ToolTurn;

export type TurnRole = Turn["role"];

// ============================================================================
// Research state
// ============================================================================

export interface SourceEntry {
  /** 1-based citation index, stable for the life of the session */
  index: number;
  url: string;
  title: string;
  snippet?: string;
  /** Search query that discovered the source, if any */
  query?: string;
  addedAt: string;
}

export interface ResearchNote {
  id: string;
  content: string;
  sourceUrl?: string;
  createdAt: string;
}

/**
 * Source as it appears in a `complete` event.
 */
export interface CitedSource {
  url: string;
  title: string;
}
