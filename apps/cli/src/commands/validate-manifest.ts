/**
 * Command: stubgen validate-manifest
 *
 * Checks a manifest against the operator registry and prints the indices it
 * would build, without generating anything.
 *
 * Usage:
 *   stubgen validate-manifest --source=xla_native_functions.yaml --native=native_functions.yaml
 */
import { Effect } from "effect";
import { addBackendIndices, loadBackendManifest } from "@stubgen/codegen";
import { getGroupedNativeFunctions, loadNativeYaml } from "@stubgen/native";
import { KernelNamingLive } from "@stubgen/effect-runtime";
import { parseKV, requireArg } from "../parse.js";
import { runCommand } from "../resolve.js";

export async function validateManifestCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const source = requireArg(kv, "source", "path to the backend manifest");

  await runCommand(kv, (config) =>
    Effect.gen(function* () {
      const registry = yield* loadNativeYaml(config.nativeFunctions);
      const manifest = yield* loadBackendManifest(source);
      const grouped = yield* getGroupedNativeFunctions(registry.nativeFunctions);
      const parsed = yield* addBackendIndices(manifest, grouped, registry.backendIndices);

      yield* Effect.sync(() => {
        console.log(`${source}: backend ${manifest.backend}, namespace ${parsed.cppNamespace}`);
        for (const key of [parsed.backendKey, parsed.autogradKey]) {
          if (key === null) continue;
          const index = parsed.backendIndices.get(key);
          if (!index) continue;
          console.log(`${key}: ${index.index.size} kernel(s)`);
          for (const [op, metadata] of index.index) console.log(`  ${op} -> ${metadata.kernel}`);
        }
      });
    }).pipe(Effect.provide(KernelNamingLive(config.naming))),
  );
}
