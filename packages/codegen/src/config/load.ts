/**
 * Configuration loading: defaults, then an optional JSON file, then CLI
 * overrides. Every field is checked before a run starts.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "@stubgen/core";
import { namingRegistry } from "../api/dispatcher.js";
import { LOG_LEVELS, defaultCodegenConfig, type CodegenConfig, type LogLevelName } from "./schema.js";

type RawConfig = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

/** Read a JSON config file into raw key/value pairs. */
export function loadConfigFile(path: string): Effect.Effect<RawConfig, ConfigError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new ConfigError({ message: `Failed to read config "${path}"`, cause }),
  }).pipe(
    Effect.flatMap((text) =>
      Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (cause) => new ConfigError({ message: `Config "${path}" is not valid JSON`, cause }),
      }),
    ),
    Effect.filterOrFail(isRecord, () => new ConfigError({ message: `Config "${path}" must be a JSON object` })),
  );
}

function field(raw: RawConfig, key: string, errors: string[]): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") {
    errors.push(`${key} must be a non-empty string`);
    return undefined;
  }
  return value;
}

/** Booleans may arrive as JSON booleans or as CLI strings. */
function flag(raw: RawConfig, key: string, errors: string[]): boolean | undefined {
  const value = raw[key];
  if (value === undefined || typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  errors.push(`${key} must be a boolean`);
  return undefined;
}

/**
 * Merge raw layers over the defaults (later layers win) and validate the
 * result. Unknown keys are ignored so a shared config file can carry
 * settings for other commands.
 */
export function resolveCodegenConfig(...layers: readonly RawConfig[]): Effect.Effect<CodegenConfig, ConfigError> {
  return Effect.suspend(() => {
    const raw: Record<string, unknown> = {};
    for (const layer of layers) Object.assign(raw, layer);
    const errors: string[] = [];
    const d = defaultCodegenConfig;

    const logLevel = field(raw, "logLevel", errors) ?? d.logLevel;
    const naming = field(raw, "naming", errors) ?? d.naming;
    if (!isLogLevel(logLevel)) errors.push(`logLevel must be one of ${LOG_LEVELS.join(", ")}`);
    if (!namingRegistry.has(naming)) errors.push(`naming must be one of ${namingRegistry.list().join(", ")}`);

    const config: CodegenConfig = {
      nativeFunctions: field(raw, "nativeFunctions", errors) ?? d.nativeFunctions,
      templateDir: field(raw, "templateDir", errors) ?? d.templateDir,
      outputDir: field(raw, "outputDir", errors) ?? d.outputDir,
      dryRun: flag(raw, "dryRun", errors) ?? d.dryRun,
      naming,
      outputList: field(raw, "outputList", errors),
      logLevel: isLogLevel(logLevel) ? logLevel : d.logLevel,
    };

    if (errors.length > 0) {
      return Effect.fail(new ConfigError({ message: `Invalid config: ${errors.join("; ")}` }));
    }
    return Effect.succeed(config);
  });
}
