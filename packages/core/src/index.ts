/**
 * Core module exports for @matrica/core
 *
 * This package provides:
 * - Layered configuration (defaults, config files, MATRICA_* env vars, config.set())
 * - Scoped console logging gated on the `debug` flag
 * - Runtime safety primitives (invariant, unreachable)
 */

export {
  config,
  defineConfig,
  type ConfigPath,
  type MatricaConfig,
  type FormatConfig,
} from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { invariant, unreachable } from "./safety.js";
