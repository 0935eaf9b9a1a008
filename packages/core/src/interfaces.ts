/**
 * Collaborator ports. The generator depends on these, never on a concrete
 * implementation; layers in @stubgen/effect-runtime provide them.
 */
import { Context, Effect } from "effect";
import type { CodegenError } from "./errors.js";
import type { FunctionSchema } from "./schema.js";

// ── Kernel naming ──────────────────────────────────────────────────────────

/** Maps a schema to the kernel symbol a backend implements for it. Pure. */
export interface KernelNaming {
  readonly name: string;
  kernelName(func: FunctionSchema): string;
}

export class KernelNamingService extends Context.Tag("KernelNamingService")<
  KernelNamingService,
  KernelNaming
>() {}

// ── Artifact writer ────────────────────────────────────────────────────────

/** Substitution values for one template: a string or a list of lines/blocks. */
export type TemplateEnv = Readonly<Record<string, string | readonly string[]>>;

export interface ArtifactWriter {
  /** Render `templateName` with `env` into the output file `filename`. */
  writeWithTemplate(filename: string, templateName: string, env: TemplateEnv): Effect.Effect<void, CodegenError>;
  /** Files written (or, on a dry run, that would have been written) so far. */
  readonly filenames: readonly string[];
}

export class ArtifactWriterService extends Context.Tag("ArtifactWriterService")<
  ArtifactWriterService,
  ArtifactWriter
>() {}
