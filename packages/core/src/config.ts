/**
 * Configuration
 *
 * Two settings, resolved from (lowest to highest priority):
 *
 * 1. Defaults: `debug: false`, `format.width: 5`
 * 2. A config file found by cosmiconfig: `.matricarc`, `.matricarc.json`,
 *    `.matricarc.yaml`, `matrica.config.cjs`, or a `"matrica"` key in package.json
 * 3. Environment: `MATRICA_DEBUG`, `MATRICA_FORMAT_WIDTH`
 * 4. `config.set()`
 *
 * @example
 * ```typescript
 * import { config } from "@matrica/core";
 *
 * config.get("format.width"); // 5
 * config.set({ format: { width: 3 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

export interface FormatConfig {
  /** Default character width of each rendered matrix element */
  width?: number;
}

/** Shape of a config file, and of `config.set()` arguments. */
export interface MatricaConfig {
  /** Print debug-level log lines */
  debug?: boolean;
  format?: FormatConfig;
}

interface ConfigValues {
  debug: boolean;
  "format.width": number;
}

export type ConfigPath = keyof ConfigValues;

const DEFAULTS: ConfigValues = {
  debug: false,
  "format.width": 5,
};

let resolved: ConfigValues | undefined;
let configFilePath: string | undefined;

function warn(message: string, ...details: unknown[]): void {
  // core's logger reads this module, so config warns on the console directly
  console.warn(`[matrica:config] ${message}`, ...details);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Overlay the recognized, well-typed fields of `source` onto `target`. */
function apply(target: ConfigValues, source: Record<string, unknown>, origin: string): void {
  const { debug, format } = source;
  if (typeof debug === "boolean") {
    target.debug = debug;
  } else if (debug !== undefined) {
    warn(`Ignoring debug from ${origin}: expected a boolean`);
  }

  if (!isRecord(format)) return;
  const { width } = format;
  if (typeof width === "number" && Number.isFinite(width)) {
    target["format.width"] = width;
  } else if (width !== undefined) {
    warn(`Ignoring format.width from ${origin}: expected a number`);
  }
}

function readConfigFile(): Record<string, unknown> {
  try {
    const result = cosmiconfigSync("matrica", {
      searchPlaces: [
        "package.json",
        ".matricarc",
        ".matricarc.json",
        ".matricarc.yaml",
        ".matricarc.yml",
        ".matricarc.cjs",
        "matrica.config.cjs",
      ],
    }).search();
    if (!result || result.isEmpty) return {};

    const loaded: unknown = result.config;
    if (!isRecord(loaded)) {
      warn(`Ignoring ${result.filepath}: expected an object`);
      return {};
    }
    configFilePath = result.filepath;
    return loaded;
  } catch (error) {
    warn("Failed to load config file:", error);
    return {};
  }
}

function parseFlag(value: string): boolean {
  return value === "1" || value.toLowerCase() === "true";
}

function readEnvironment(): Record<string, unknown> {
  const env: Record<string, unknown> = {};
  const { MATRICA_DEBUG, MATRICA_FORMAT_WIDTH } = process.env;

  if (MATRICA_DEBUG !== undefined) {
    env.debug = parseFlag(MATRICA_DEBUG);
  }
  if (MATRICA_FORMAT_WIDTH !== undefined) {
    env.format = /^\d+$/.test(MATRICA_FORMAT_WIDTH)
      ? { width: Number(MATRICA_FORMAT_WIDTH) }
      : { width: MATRICA_FORMAT_WIDTH };
  }
  return env;
}

function load(): ConfigValues {
  if (resolved) return resolved;

  const values = { ...DEFAULTS };
  const file = readConfigFile();
  apply(values, file, configFilePath ?? "config file");
  apply(values, readEnvironment(), "environment");
  resolved = values;
  return values;
}

function get<P extends ConfigPath>(path: P): ConfigValues[P] {
  return load()[path];
}

function set(values: MatricaConfig): void {
  const current = load();
  if (values.debug !== undefined) current.debug = values.debug;
  if (values.format?.width !== undefined) current["format.width"] = values.format.width;
}

function has(path: ConfigPath): boolean {
  return Boolean(get(path));
}

function getConfigFilePath(): string | undefined {
  load();
  return configFilePath;
}

/** Forget every resolved value; the next read loads all sources again. */
function reset(): void {
  resolved = undefined;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  has,
  getConfigFilePath,
  reset,
} as const;

/**
 * Typed helper for matrica.config.cjs files.
 */
export function defineConfig(cfg: MatricaConfig): MatricaConfig {
  return cfg;
}
