import { z } from "zod";
import {
  ToolError,
  errorMessage,
  type ToolCall,
  type ToolErrorType,
  type ToolResult,
  type ToolUseEvent,
} from "@citeline/shared";
import { Logger, throwIfAborted, withTimeout } from "@citeline/kernel";
import type { TurnHandle } from "../session/session.js";
import type { ToolRegistry } from "../tool/registry.js";
import type { ToolContext, ToolLimits, ToolPayload } from "../tool/tool.js";
import type { PageFetcher, SearchProvider } from "../collaborators/types.js";

const log = Logger.for("ToolExecutor");

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  search: SearchProvider;
  fetcher: PageFetcher;
  limits: ToolLimits;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map a thrown value onto the category reported to the model.
 */
export function classifyToolError(error: unknown): ToolErrorType {
  if (error instanceof ToolError) return error.errorType;
  if (error instanceof z.ZodError) return "INVALID_ARGUMENTS";
  if (error instanceof Error && error.name === "TimeoutError") return "TIMEOUT";
  return "COLLABORATOR_FAILED";
}

/**
 * Tool Execution Service
 *
 * Runs tool calls one at a time against the turn that requested them. Every
 * failure a tool can have (unknown name, bad arguments, collaborator error,
 * timeout) becomes a failed `ToolResult` for the model. Only cancellation
 * escapes: an aborted signal or a stale turn handle rethrows so the loop stops.
 */
export class ToolExecutor {
  constructor(private readonly options: ToolExecutorOptions) {}

  /**
   * Execute one call. Yields its `tool_use` progress event before any
   * collaborator runs, then returns the result.
   *
   * @example
   * ```typescript
   * const result = yield* executor.execute(call, turn, signal);
   * ```
   */
  async *execute(
    call: ToolCall,
    turn: TurnHandle,
    signal?: AbortSignal,
  ): AsyncGenerator<ToolUseEvent, ToolResult, undefined> {
    yield {
      type: "tool_use",
      tool: call.name,
      arguments: isRecord(call.arguments) ? call.arguments : {},
    };

    return await this.executeSingleTool(call, turn, signal);
  }

  /**
   * Execute a single tool call without emitting progress.
   */
  async executeSingleTool(
    call: ToolCall,
    turn: TurnHandle,
    signal?: AbortSignal,
  ): Promise<ToolResult> {
    throwIfAborted(signal);

    const tool = this.options.registry.resolve(call.name);
    if (!tool) {
      log.warn({ tool: call.name, callId: call.callId }, "model requested an unknown tool");
      return this.createErrorResult(call, `Tool "${call.name}" is not available`, "TOOL_NOT_FOUND");
    }

    const started = Date.now();
    try {
      const payload = await tool.run(call.arguments, this.createContext(turn, signal));
      throwIfAborted(signal);
      log.debug(
        { tool: call.name, callId: call.callId, durationMs: Date.now() - started },
        "tool call succeeded",
      );
      return this.createSuccessResult(call, payload);
    } catch (error) {
      // Cancelled turn or stale handle; an abort-named error from a
      // collaborator on a live turn is an ordinary failure.
      if (signal?.aborted || !turn.isCurrent) throw error;

      const errorType = classifyToolError(error);
      log.info(
        { tool: call.name, callId: call.callId, errorType, durationMs: Date.now() - started },
        "tool call failed: %s",
        errorMessage(error),
      );
      return this.createErrorResult(call, errorMessage(error), errorType);
    }
  }

  private createContext(turn: TurnHandle, signal: AbortSignal | undefined): ToolContext {
    const { search, fetcher, limits } = this.options;
    return {
      turn,
      search,
      fetcher,
      limits,
      signal,
      bounded: (operation, fn) =>
        withTimeout(fn, { operation, timeoutMs: limits.requestTimeoutMs, signal }),
    };
  }

  private createSuccessResult(call: ToolCall, payload: ToolPayload): ToolResult {
    return {
      callId: call.callId,
      name: call.name,
      success: true,
      content: JSON.stringify({ success: true, ...payload }),
    };
  }

  private createErrorResult(call: ToolCall, message: string, errorType: ToolErrorType): ToolResult {
    return {
      callId: call.callId,
      name: call.name,
      success: false,
      content: JSON.stringify({ success: false, error: message, error_type: errorType }),
      error: message,
    };
  }
}
