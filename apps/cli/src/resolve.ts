/**
 * Config resolution and command running.
 */
import { Effect } from "effect";
import { loadConfigFile, namingRegistry, resolveCodegenConfig, type CodegenConfig } from "@stubgen/codegen";
import { loggerLayer } from "@stubgen/effect-runtime";
import { configOverrides } from "./parse.js";

/** Defaults, then `--config` (if given), then the remaining flags. */
export function resolveCliConfig(kv: Record<string, string>) {
  const overrides = configOverrides(kv);
  const configPath = kv["config"];
  if (!configPath) return resolveCodegenConfig(overrides);
  return loadConfigFile(configPath).pipe(Effect.flatMap((file) => resolveCodegenConfig(file, overrides)));
}

interface TaggedFailure {
  readonly _tag: string;
  readonly message: string;
}

/**
 * Resolve config, run `build` under the configured logger, and report a
 * failure as `<Tag>: <message>` with exit status 1.
 */
export async function runCommand<A, E extends TaggedFailure>(
  kv: Record<string, string>,
  build: (config: CodegenConfig) => Effect.Effect<A, E>,
): Promise<void> {
  const program = resolveCliConfig(kv).pipe(
    Effect.flatMap((config) => build(config).pipe(Effect.provide(loggerLayer(config.logLevel)))),
    Effect.asVoid,
    Effect.catchAll((err) =>
      Effect.sync(() => {
        console.error(`${err._tag}: ${err.message}`);
        process.exitCode = 1;
      }),
    ),
  );
  await Effect.runPromise(program);
}

export function listImplementations(): string {
  return `Naming conventions: ${namingRegistry.list().join(", ")}`;
}
