/**
 * Configuration loading
 *
 * Layers, later wins: schema defaults, `.wit-docs.json` in the working
 * directory, environment variables, then explicit overrides from the CLI.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ErrorCode, WitDocsError } from "../core/errors.js";
import { isLogLevel } from "./logger.js";
import {
  WitDocsConfigSchema,
  formatZodError,
  safeValidate,
  type WitDocsConfig,
} from "./validation.js";

export const CONFIG_FILE = ".wit-docs.json";

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<WitDocsConfig>;
}

export function getConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, CONFIG_FILE);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new WitDocsError(
      `Failed to read ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.CONFIGURATION_ERROR,
      { filePath: configPath }
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new WitDocsError(`${CONFIG_FILE} must contain a JSON object`, ErrorCode.CONFIGURATION_ERROR, {
      filePath: configPath,
    });
  }
  return { ...parsed };
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.WIT_DOCS_WASM_TOOLS) values.wasmTools = env.WIT_DOCS_WASM_TOOLS;
  // Unknown levels are ignored here, as the logger ignores them
  const logLevel = env.LOG_LEVEL?.toLowerCase();
  if (logLevel && isLogLevel(logLevel)) values.logLevel = logLevel;
  if (env.WIT_DOCS_ON_EXISTING) values.onExisting = env.WIT_DOCS_ON_EXISTING;
  return values;
}

function definedEntries(overrides: Partial<WitDocsConfig>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

/**
 * Load and validate the tool configuration
 *
 * @throws WitDocsError with CONFIGURATION_ERROR when a layer is unreadable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): WitDocsConfig {
  const { cwd = process.cwd(), env = process.env, overrides = {} } = options;
  const configPath = getConfigPath(cwd);

  const merged = {
    ...readConfigFile(configPath),
    ...readEnv(env),
    ...definedEntries(overrides),
  };

  const result = safeValidate(WitDocsConfigSchema, merged);
  if (!result.success) {
    throw new WitDocsError(
      `Invalid configuration: ${formatZodError(result.error).join("; ")}`,
      ErrorCode.CONFIGURATION_ERROR,
      { filePath: configPath }
    );
  }
  return result.data;
}
