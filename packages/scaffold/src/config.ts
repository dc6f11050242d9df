/**
 * classforge.json loading and resolution
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import {
  createDiagnostic,
  error,
  ok,
  type Diagnostic,
  type Result,
} from "@classforge/description";
import { createConsoleLogger, type Logger } from "./logging.js";
import type { CompileOptions } from "./registry/compiler.js";

export const CONFIG_FILE_NAME = "classforge.json";

/**
 * Contents of classforge.json
 */
export type ClassforgeConfig = {
  readonly $schema?: string;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly traceResolution?: boolean;
};

/**
 * Values supplied by the caller that take precedence over the file
 */
export type ConfigOverrides = {
  verbose?: boolean;
  quiet?: boolean;
  traceResolution?: boolean;
};

export type ResolvedConfig = {
  readonly configPath?: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
  readonly traceResolution: boolean;
};

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readBoolean = (
  raw: Readonly<Record<string, unknown>>,
  field: "verbose" | "quiet" | "traceResolution",
  configPath: string
): Result<boolean | undefined, Diagnostic> => {
  const value = raw[field];
  if (value === undefined || typeof value === "boolean") {
    return ok(value);
  }
  return error(
    createDiagnostic(
      "CFG1004",
      "error",
      `'${field}' must be a boolean, got ${typeof value}`,
      configPath
    )
  );
};

/**
 * Load and validate a classforge.json file
 */
export const loadConfig = (
  configPath: string
): Result<ClassforgeConfig, Diagnostic> => {
  if (!existsSync(configPath)) {
    return error(
      createDiagnostic(
        "CFG1001",
        "error",
        `Config file not found: ${configPath}`,
        undefined,
        `Create ${CONFIG_FILE_NAME} or pass the options directly`
      )
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    return error(
      createDiagnostic(
        "CFG1002",
        "error",
        `Failed to parse ${CONFIG_FILE_NAME}: ${e instanceof Error ? e.message : String(e)}`,
        configPath
      )
    );
  }

  if (!isRecord(parsed)) {
    return error(
      createDiagnostic(
        "CFG1003",
        "error",
        `${CONFIG_FILE_NAME} must contain a JSON object`,
        configPath
      )
    );
  }

  const verbose = readBoolean(parsed, "verbose", configPath);
  if (!verbose.ok) return verbose;
  const quiet = readBoolean(parsed, "quiet", configPath);
  if (!quiet.ok) return quiet;
  const traceResolution = readBoolean(parsed, "traceResolution", configPath);
  if (!traceResolution.ok) return traceResolution;

  const schema = parsed["$schema"];
  return ok({
    ...(typeof schema === "string" ? { $schema: schema } : {}),
    ...(verbose.value !== undefined ? { verbose: verbose.value } : {}),
    ...(quiet.value !== undefined ? { quiet: quiet.value } : {}),
    ...(traceResolution.value !== undefined
      ? { traceResolution: traceResolution.value }
      : {}),
  });
};

/**
 * Find classforge.json by walking up from `startDir`
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Merge overrides over file values over defaults
 */
export const resolveConfig = (
  config: ClassforgeConfig,
  overrides: ConfigOverrides = {},
  configPath?: string
): ResolvedConfig => ({
  ...(configPath !== undefined ? { configPath } : {}),
  verbose: overrides.verbose ?? config.verbose ?? false,
  quiet: overrides.quiet ?? config.quiet ?? false,
  traceResolution: overrides.traceResolution ?? config.traceResolution ?? false,
});

/**
 * Locate, load and resolve configuration for `startDir`. A missing file is
 * not an error: defaults and overrides apply.
 */
export const loadResolvedConfig = (
  startDir: string,
  overrides: ConfigOverrides = {}
): Result<ResolvedConfig, Diagnostic> => {
  const configPath = findConfig(startDir);
  if (configPath === null) {
    return ok(resolveConfig({}, overrides));
  }

  const loaded = loadConfig(configPath);
  if (!loaded.ok) return loaded;
  return ok(resolveConfig(loaded.value, overrides, configPath));
};

export const createCompileOptions = (
  config: ResolvedConfig,
  logger: Logger = createConsoleLogger(config)
): CompileOptions => ({
  logger,
  traceResolution: config.traceResolution,
});
