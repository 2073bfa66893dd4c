#!/usr/bin/env node
/**
 * Gateway CLI
 *
 * Starts the research gateway from environment configuration:
 *
 * ```
 * OPENAI_API_KEY=... citeline-gateway
 * ```
 */

import { Logger } from "@citeline/kernel";
import { DuckDuckGoSearch, GoogleSearch, createResearchEngine, type SearchProvider } from "@citeline/core";
import { createOpenAIModel } from "@citeline/openai";
import { createResearchGateway } from "./gateway.js";
import { EnvError, loadEnv, toResearchConfig, type GatewayEnv } from "./env.js";

const log = Logger.for("cli");

function createSearch(env: GatewayEnv): SearchProvider {
  if (env.GOOGLE_API_KEY && env.GOOGLE_CX) {
    return new GoogleSearch({ apiKey: env.GOOGLE_API_KEY, cx: env.GOOGLE_CX });
  }
  return new DuckDuckGoSearch();
}

async function main(): Promise<void> {
  const env = loadEnv();
  Logger.configure({ level: env.LOG_LEVEL });

  if (!env.OPENAI_API_KEY && !env.OPENAI_BASE_URL) {
    log.warn("OPENAI_API_KEY is not set; model calls will fail");
  }

  const engine = createResearchEngine({
    model: createOpenAIModel({
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      model: env.MODEL_NAME,
      maxTokens: env.MAX_TOKENS,
    }),
    search: createSearch(env),
    config: toResearchConfig(env),
  });

  const gateway = createResearchGateway({ engine, port: env.PORT, host: env.HOST });
  await gateway.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "shutting down");
    gateway.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof EnvError) {
    log.fatal(error.message);
  } else {
    log.fatal({ err: error }, "gateway failed to start");
  }
  process.exit(1);
});
