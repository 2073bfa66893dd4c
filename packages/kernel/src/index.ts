/**
 * # Citeline Kernel
 *
 * Low-level primitives the research engine and gateway build on:
 *
 * - **Logger** - pino-backed structured logging with per-component children
 * - **Timeouts** - bounded waits that compose with cancellation signals
 *
 * @module @citeline/kernel
 */

export * from "./logger.js";
export * from "./timeout.js";
