/**
 * Research engine factory.
 *
 * Wires a model, the tool registry and the search and fetch collaborators into
 * an orchestrator. The gateway holds one engine and one `ResearchSession` per
 * connection.
 *
 * @module @citeline/core/engine
 */

import type { TurnEvent } from "@citeline/shared";
import { Logger } from "@citeline/kernel";
import type { ResearchModel } from "./model/model.js";
import type { PageFetcher, SearchProvider } from "./collaborators/types.js";
import { DuckDuckGoSearch } from "./collaborators/duckduckgo.js";
import { HttpPageFetcher } from "./collaborators/page-fetcher.js";
import { resolveResearchConfig, type ResearchConfig, type ResearchConfigInput } from "./config.js";
import { createResearchToolRegistry, type ToolRegistry } from "./tool/registry.js";
import { ToolExecutor } from "./engine/tool-executor.js";
import { ResearchOrchestrator, type RunTurnOptions } from "./engine/orchestrator.js";
import { ResearchSession } from "./session/session.js";

const log = Logger.for("ResearchEngine");

export interface ResearchEngineOptions {
  model: ResearchModel;
  /** Defaults to DuckDuckGo */
  search?: SearchProvider;
  /** Defaults to the HTTP page fetcher */
  fetcher?: PageFetcher;
  registry?: ToolRegistry;
  config?: ResearchConfigInput;
}

export interface ResearchEngine {
  readonly model: ResearchModel;
  readonly registry: ToolRegistry;
  readonly config: ResearchConfig;
  createSession(id?: string): ResearchSession;
  run(session: ResearchSession, message: string, options?: RunTurnOptions): AsyncGenerator<TurnEvent, void, undefined>;
}

export function createResearchEngine(options: ResearchEngineOptions): ResearchEngine {
  const config = resolveResearchConfig(options.config);
  const registry = options.registry ?? createResearchToolRegistry();
  const search = options.search ?? new DuckDuckGoSearch();
  const fetcher = options.fetcher ?? new HttpPageFetcher();

  const executor = new ToolExecutor({
    registry,
    search,
    fetcher,
    limits: {
      maxSearchResults: config.maxSearchResults,
      maxContentLength: config.maxContentLength,
      requestTimeoutMs: config.requestTimeoutMs,
    },
  });
  const orchestrator = new ResearchOrchestrator({
    model: options.model,
    registry,
    executor,
    config,
  });

  log.info(
    { model: options.model.id, search: search.name, tools: registry.names, maxSteps: config.maxSteps },
    "research engine ready",
  );

  return {
    model: options.model,
    registry,
    config,
    createSession: (id) => new ResearchSession(id),
    run: (session, message, runOptions) => orchestrator.run(session, message, runOptions),
  };
}
