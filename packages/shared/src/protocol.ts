/**
 * Wire Protocol Types - Shared between client and server
 *
 * Every frame on the research connection is a JSON object with a `type`
 * discriminator. Inbound frames are validated with zod; outbound frames are
 * produced by the server only and are typed, not validated.
 *
 * @module @citeline/shared/protocol
 */

import { z } from "zod";
import type { CitedSource } from "./transcript.js";
import { InvalidMessageError } from "./errors.js";

// ============================================================================
// Client → Server
// ============================================================================

export const ChatMessageSchema = z.object({
  type: z.literal("chat"),
  message: z.string().trim().min(1, "Message is required"),
});

export const ClearMessageSchema = z.object({
  type: z.literal("clear"),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [
  ChatMessageSchema,
  ClearMessageSchema,
]);

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ClearMessage = z.infer<typeof ClearMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/**
 * Parse a raw text frame into a client message.
 *
 * @throws InvalidMessageError when the frame is not JSON or not a known message
 */
export function parseClientMessage(raw: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InvalidMessageError("Failed to parse message", { cause: error });
  }

  const parsed = ClientMessageSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidMessageError(issue?.message ?? "Invalid message", { cause: parsed.error });
  }
  return parsed.data;
}

// ============================================================================
// Server → Client
// ============================================================================

export interface StatusEvent {
  type: "status";
  status: "thinking";
}

export interface ToolUseEvent {
  type: "tool_use";
  tool: string;
  arguments: Record<string, unknown>;
}

export interface StreamChunkEvent {
  type: "stream";
  content: string;
}

export interface CompleteEvent {
  type: "complete";
  data: {
    response: string;
    sources: CitedSource[];
  };
}

export interface ErrorEvent {
  type: "error";
  message: string;
}

export interface ClearedEvent {
  type: "cleared";
}

/**
 * Events produced by one research turn, in generation order.
 */
export type TurnEvent = StatusEvent | ToolUseEvent | StreamChunkEvent | CompleteEvent | ErrorEvent;

/**
 * Everything the server may send on the connection.
 */
export type ServerEvent = TurnEvent | ClearedEvent;

export type ServerEventType = ServerEvent["type"];
