/**
 * Scoped console logging.
 *
 * Every line is prefixed with `[matrica:<scope>]`. `debug` and `info` are
 * silent unless the `debug` config flag is set (MATRICA_DEBUG=1 or
 * `config.set({ debug: true })`); `warn` always prints.
 *
 * @example
 * ```typescript
 * const log = createLogger("format");
 * log.debug("output width for", name, "set to", width);
 * ```
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[matrica:${scope}]`;

  return {
    scope,
    debug: (...args) => {
      if (config.has("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (config.has("debug")) console.info(prefix, ...args);
    },
    warn: (...args) => {
      console.warn(prefix, ...args);
    },
  };
}
