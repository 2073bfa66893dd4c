/**
 * StreamAccumulator - collects model deltas into a finished response.
 *
 * Adapters only map provider chunks to `ModelDelta`; the accumulator tracks
 * text, assembles tool calls from their streamed argument fragments and
 * records stop reason and usage.
 *
 * @example
 * ```typescript
 * const accumulator = new StreamAccumulator();
 * for await (const delta of model.stream(input)) {
 *   const text = accumulator.push(delta);
 *   if (text) forward(text);
 * }
 * const output = accumulator.toOutput();
 * ```
 *
 * @module @citeline/core/model/stream-accumulator
 */

import { ModelResponseError, type ToolCall } from "@citeline/shared";
import type { ModelDelta, StopReason, UsageStats } from "./model.js";

interface AccumulatingToolCall {
  id: string;
  name: string;
  inputJson: string;
  /** Set when the provider sent the call whole */
  input?: unknown;
}

export interface ModelOutput {
  text: string;
  toolCalls: ToolCall[];
  stopReason: StopReason;
  usage: UsageStats;
}

/**
 * Parse streamed argument JSON. Unparseable input is passed through as the
 * raw string so the tool's schema rejects it as a tool-level error.
 */
function parseArguments(json: string): unknown {
  if (json.trim() === "") return {};
  try {
    return JSON.parse(json);
  } catch {
    return json;
  }
}

export class StreamAccumulator {
  private text = "";
  private toolCalls = new Map<string, AccumulatingToolCall>();
  private lastToolCallId?: string;
  private stopReason: StopReason = "stop";
  private usage: UsageStats = { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
  private anonymousCalls = 0;

  /**
   * Apply one delta.
   *
   * @returns the text to forward to the client, if the delta carried any
   * @throws ModelResponseError for provider errors and nameless tool calls
   */
  push(delta: ModelDelta): string | undefined {
    switch (delta.type) {
      case "text":
        this.text += delta.delta;
        return delta.delta || undefined;

      case "tool_call_start": {
        if (!delta.name) {
          throw new ModelResponseError("Model requested a tool call without a name");
        }
        const id = delta.id || this.nextAnonymousId();
        // Some providers repeat the name on later chunks of the same call.
        if (!this.toolCalls.has(id)) {
          this.toolCalls.set(id, { id, name: delta.name, inputJson: "" });
        }
        this.lastToolCallId = id;
        return undefined;
      }

      case "tool_call_delta": {
        const id = this.toolCalls.has(delta.id) ? delta.id : this.lastToolCallId;
        const call = id ? this.toolCalls.get(id) : undefined;
        if (!call) {
          throw new ModelResponseError("Model sent tool arguments before naming the tool");
        }
        call.inputJson += delta.delta;
        return undefined;
      }

      case "tool_call": {
        if (!delta.name) {
          throw new ModelResponseError("Model requested a tool call without a name");
        }
        const id = delta.id || this.nextAnonymousId();
        this.toolCalls.set(id, { id, name: delta.name, inputJson: "", input: delta.input });
        this.lastToolCallId = id;
        return undefined;
      }

      case "message_end":
        this.stopReason = delta.stopReason;
        if (delta.usage) this.usage = { ...delta.usage };
        return undefined;

      case "usage":
        this.usage = { ...this.usage, ...delta.usage };
        return undefined;

      case "error": {
        const message = typeof delta.error === "string" ? delta.error : delta.error.message;
        throw new ModelResponseError(message || "Model stream failed", {
          cause: typeof delta.error === "string" ? undefined : delta.error,
        });
      }
    }
  }

  get hasToolCalls(): boolean {
    return this.toolCalls.size > 0;
  }

  toOutput(): ModelOutput {
    const toolCalls: ToolCall[] = [];
    for (const call of this.toolCalls.values()) {
      toolCalls.push({
        callId: call.id,
        name: call.name,
        arguments: call.input !== undefined ? call.input : parseArguments(call.inputJson),
      });
    }

    return {
      text: this.text,
      toolCalls,
      stopReason: toolCalls.length > 0 ? "tool_use" : this.stopReason,
      usage: this.usage,
    };
  }

  private nextAnonymousId(): string {
    return `call_${++this.anonymousCalls}`;
  }
}
