/**
 * Research Orchestrator
 *
 * Runs one user turn as an async generator of `TurnEvent`s:
 *
 * ```
 * user message -> thinking -> (tool dispatch -> thinking)* -> answer -> complete
 * ```
 *
 * The consumer pulls events one at a time, so a slow transport suspends the
 * loop instead of dropping or reordering events. Turn-level failures end the
 * turn with a single `error` event and keep what it recorded; cancellation
 * (connection closed, session cleared) ends it silently and discards it.
 *
 * @module @citeline/core/engine/orchestrator
 */

import {
  StepLimitError,
  errorMessage,
  type StreamChunkEvent,
  type TurnEvent,
} from "@citeline/shared";
import { Logger, withStreamTimeout } from "@citeline/kernel";
import type { ResearchModel } from "../model/model.js";
import { StreamAccumulator, type ModelOutput } from "../model/stream-accumulator.js";
import type { ResearchSession, TurnHandle } from "../session/session.js";
import type { ToolRegistry } from "../tool/registry.js";
import { resolveCitations } from "../citations/resolver.js";
import type { ResearchConfig } from "../config.js";
import { buildSystemPrompt } from "../prompts.js";
import type { ToolExecutor } from "./tool-executor.js";

const log = Logger.for("Orchestrator");

export interface ResearchOrchestratorOptions {
  model: ResearchModel;
  registry: ToolRegistry;
  executor: ToolExecutor;
  config: ResearchConfig;
}

export interface RunTurnOptions {
  /** Aborted when the connection closes or the session is cleared */
  signal?: AbortSignal;
}

export class ResearchOrchestrator {
  private readonly systemPrompt: string;

  constructor(private readonly options: ResearchOrchestratorOptions) {
    this.systemPrompt = buildSystemPrompt(options.config.systemPromptSuffix);
  }

  async *run(
    session: ResearchSession,
    message: string,
    options: RunTurnOptions = {},
  ): AsyncGenerator<TurnEvent, void, undefined> {
    const { signal } = options;
    const { maxSteps } = this.options.config;
    const turn = session.beginTurn();
    const started = Date.now();
    let settled = false;

    log.info({ sessionId: session.id, turnId: turn.id }, "turn started");
    log.debug({ sessionId: session.id, message }, "user message");

    try {
      turn.record({ role: "user", content: message });
      yield { type: "status", status: "thinking" };

      while (true) {
        const output = yield* this.think(turn, signal);

        if (output.toolCalls.length === 0) {
          const resolution = resolveCitations(output.text, turn.sources());
          turn.record({ role: "assistant", content: output.text });
          settled = true;

          log.info(
            {
              sessionId: session.id,
              turnId: turn.id,
              sources: resolution.sources.length,
              durationMs: Date.now() - started,
            },
            "turn completed",
          );
          yield {
            type: "complete",
            data: { response: resolution.text, sources: resolution.sources },
          };
          return;
        }

        const step = turn.nextStep();
        if (step > maxSteps) {
          throw new StepLimitError(maxSteps);
        }

        log.debug(
          { sessionId: session.id, step, tools: output.toolCalls.map((call) => call.name) },
          "dispatching tool calls",
        );
        turn.record({ role: "assistant", content: output.text, toolCalls: output.toolCalls });

        for (const call of output.toolCalls) {
          const result = yield* this.options.executor.execute(call, turn, signal);
          turn.record({
            role: "tool",
            content: result.content,
            toolCallId: result.callId,
            name: result.name,
          });
        }
      }
    } catch (error) {
      settled = true;

      if (signal?.aborted || !turn.isCurrent) {
        turn.rollback();
        log.info({ sessionId: session.id, turnId: turn.id }, "turn cancelled");
        return;
      }

      // Recorded entries stay, like the notes and sources they produced.
      log.warn(
        { sessionId: session.id, turnId: turn.id, err: error, durationMs: Date.now() - started },
        "turn failed",
      );
      yield { type: "error", message: errorMessage(error) };
    } finally {
      // Consumer stopped pulling mid-turn.
      if (!settled) {
        turn.rollback();
        log.info({ sessionId: session.id, turnId: turn.id }, "turn abandoned");
      }
    }
  }

  /**
   * One model call. Forwards text as it streams and returns the assembled
   * response.
   */
  private async *think(
    turn: TurnHandle,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<StreamChunkEvent, ModelOutput, undefined> {
    const { model, registry, config } = this.options;
    const accumulator = new StreamAccumulator();

    const deltas = withStreamTimeout(
      (callSignal) =>
        model.stream({
          system: this.systemPrompt,
          transcript: turn.transcript(),
          tools: registry.specs(),
          signal: callSignal,
        }),
      { operation: "Model response", timeoutMs: config.modelTimeoutMs, signal },
    );

    for await (const delta of deltas) {
      const text = accumulator.push(delta);
      if (text) {
        yield { type: "stream", content: text };
      }
    }

    const output = accumulator.toOutput();
    log.debug(
      { sessionId: turn.sessionId, stopReason: output.stopReason, usage: output.usage },
      "model response",
    );
    return output;
  }
}
