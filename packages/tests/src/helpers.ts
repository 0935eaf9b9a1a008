/**
 * Shared test fixtures: registry loading and an in-memory artifact writer.
 */
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Effect } from "effect";
import { CodegenError, type ArtifactWriter, type TemplateEnv } from "@stubgen/core";
import { CodeTemplate, DEFAULT_TEMPLATE_DIR, dispatcherNaming } from "@stubgen/codegen";
import { parseNativeYaml, type NativeYaml } from "@stubgen/native";
import { KernelNamingFrom } from "@stubgen/effect-runtime";

export const FIXTURES = fileURLToPath(new URL("../fixtures/", import.meta.url));

export function fixture(name: string): string {
  return join(FIXTURES, name);
}

export function readFixture(name: string): string {
  return readFileSync(fixture(name), "utf-8");
}

export const withDispatcherNaming = KernelNamingFrom(dispatcherNaming);

/** Parse registry text with the dispatcher naming convention. */
export function registryFrom(text: string): NativeYaml {
  return Effect.runSync(parseNativeYaml(text).pipe(Effect.provide(withDispatcherNaming)));
}

export function fixtureRegistry(): NativeYaml {
  return registryFrom(readFixture("native_functions.yaml"));
}

/** Renders bundled templates into a map instead of the filesystem. */
export class MemoryWriter implements ArtifactWriter {
  readonly files = new Map<string, string>();
  readonly envs = new Map<string, TemplateEnv>();

  get filenames(): readonly string[] {
    return [...this.files.keys()];
  }

  writeWithTemplate(filename: string, templateName: string, env: TemplateEnv): Effect.Effect<void, CodegenError> {
    return Effect.try({
      try: () => {
        if (this.files.has(filename)) throw new Error(`Duplicate file write: ${filename}`);
        const template = new CodeTemplate(readFileSync(join(DEFAULT_TEMPLATE_DIR, templateName), "utf-8"), templateName);
        this.envs.set(filename, env);
        this.files.set(filename, template.substitute(env));
      },
      catch: (cause) => new CodegenError({ message: String(cause), cause }),
    });
  }
}
