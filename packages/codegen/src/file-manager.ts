/**
 * FileManager: renders templates into an output directory.
 *
 * Files are rewritten only when their content changes, so build systems
 * keyed on modification time skip untouched artifacts. Writing the same
 * file twice in one run is an error.
 */
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Effect } from "effect";
import { CodegenError, type ArtifactWriter, type TemplateEnv } from "@stubgen/core";
import { CodeTemplate } from "./template.js";

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL("../templates/", import.meta.url));

export interface FileManagerOptions {
  readonly installDir: string;
  readonly templateDir?: string;
  readonly dryRun?: boolean;
}

function message(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function isMissingFile(cause: unknown): boolean {
  return cause instanceof Error && "code" in cause && cause.code === "ENOENT";
}

export class FileManager implements ArtifactWriter {
  readonly installDir: string;
  readonly templateDir: string;
  readonly dryRun: boolean;

  private readonly _filenames = new Set<string>();
  private readonly _templates = new Map<string, CodeTemplate>();

  constructor(opts: FileManagerOptions) {
    this.installDir = opts.installDir;
    this.templateDir = opts.templateDir ?? DEFAULT_TEMPLATE_DIR;
    this.dryRun = opts.dryRun ?? false;
  }

  get filenames(): readonly string[] {
    return [...this._filenames];
  }

  writeWithTemplate(filename: string, templateName: string, env: TemplateEnv): Effect.Effect<void, CodegenError> {
    return Effect.suspend(() => {
      const path = join(this.installDir, filename);
      if (this._filenames.has(path)) {
        return Effect.fail(new CodegenError({ message: `Duplicate file write: ${path}` }));
      }
      this._filenames.add(path);
      if (this.dryRun) {
        return Effect.logDebug(`[dry run] would write ${path}`);
      }
      const withComment: TemplateEnv = {
        generated_comment: `@generated by stubgen from ${templateName}`,
        ...env,
      };
      return this.template(templateName).pipe(
        Effect.flatMap((template) =>
          Effect.try({
            try: () => template.substitute(withComment),
            catch: (cause) => new CodegenError({ message: message(cause), cause }),
          }),
        ),
        Effect.flatMap((contents) => this.writeIfChanged(path, contents)),
      );
    });
  }

  /** Write the sorted list of generated files, one `path;` per line. */
  writeOutputs(listFile: string): Effect.Effect<void, CodegenError> {
    return Effect.suspend(() => {
      const contents = [...this._filenames].sort().map((name) => `${name};\n`).join("");
      if (this.dryRun) {
        return Effect.logDebug(`[dry run] would write ${listFile}`);
      }
      return this.writeIfChanged(listFile, contents);
    });
  }

  private template(name: string): Effect.Effect<CodeTemplate, CodegenError> {
    const cached = this._templates.get(name);
    if (cached) return Effect.succeed(cached);
    const path = join(this.templateDir, name);
    return Effect.tryPromise({
      try: () => readFile(path, "utf-8"),
      catch: (cause) => new CodegenError({ message: `Failed to read template "${path}": ${message(cause)}`, cause }),
    }).pipe(
      Effect.map((text) => new CodeTemplate(text, path)),
      Effect.tap((template) => Effect.sync(() => this._templates.set(name, template))),
    );
  }

  private writeIfChanged(path: string, contents: string): Effect.Effect<void, CodegenError> {
    return Effect.tryPromise({
      try: async () => {
        let old: string | null = null;
        try {
          old = await readFile(path, "utf-8");
        } catch (cause) {
          if (!isMissingFile(cause)) throw cause;
        }
        if (old === contents) return false;
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, contents, "utf-8");
        return true;
      },
      catch: (cause) => new CodegenError({ message: `Failed to write "${path}": ${message(cause)}`, cause }),
    }).pipe(
      Effect.flatMap((changed) => Effect.logDebug(changed ? `Wrote ${path}` : `Unchanged ${path}`)),
    );
  }
}
