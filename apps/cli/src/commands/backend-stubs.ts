/**
 * Command: stubgen backend-stubs
 *
 * Usage:
 *   stubgen backend-stubs --source=xla_native_functions.yaml --out=generated \
 *     --native=native_functions.yaml [--dryRun] [--naming=faithful] [--outputList=generated/outputs.txt]
 */
import { Effect, Layer } from "effect";
import { FileManager, runBackendStubs } from "@stubgen/codegen";
import { ArtifactWriterFrom, KernelNamingLive, withSpan } from "@stubgen/effect-runtime";
import { parseKV, requireArg } from "../parse.js";
import { runCommand } from "../resolve.js";

export async function backendStubsCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const source = requireArg(kv, "source", "path to the backend manifest");

  await runCommand(kv, (config) => {
    const files = new FileManager({
      installDir: config.outputDir,
      templateDir: config.templateDir,
      dryRun: config.dryRun,
    });
    const services = Layer.merge(KernelNamingLive(config.naming), ArtifactWriterFrom(files));

    return withSpan(
      "backend-stubs",
      Effect.gen(function* () {
        const result = yield* runBackendStubs(source, config.nativeFunctions).pipe(Effect.provide(services));
        if (config.outputList) {
          yield* files.writeOutputs(config.outputList);
        }
        yield* Effect.sync(() => {
          if (result.written.length === 0) return;
          console.log(`${config.dryRun ? "Would write" : "Wrote"} ${result.written.length} file(s) to ${config.outputDir}:`);
          for (const name of result.written) console.log(`  ${name}`);
        });
      }),
    );
  });
}
