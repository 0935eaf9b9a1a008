/**
 * Backend manifest: loading and schema validation.
 *
 *   backend: XLA
 *   cpp_namespace: torch_xla
 *   supported: [add.Tensor, abs]
 *   autograd: [max_pool2d]
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { parse as parseYaml } from "yaml";
import { DispatchKey, ManifestSchemaError } from "@stubgen/core";

export interface BackendManifest {
  readonly backend: DispatchKey;
  readonly cppNamespace: string;
  readonly supported: readonly string[];
  readonly autograd: readonly string[];
}

export const MANIFEST_KEYS = ["backend", "cpp_namespace", "supported", "autograd"] as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set(MANIFEST_KEYS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function schemaError(source: string, message: string, fields: readonly string[]): ManifestSchemaError {
  return new ManifestSchemaError({ message: `${source}: ${message}`, fields });
}

function operatorList(
  doc: Record<string, unknown>,
  field: "supported" | "autograd",
  source: string,
): Effect.Effect<readonly string[], ManifestSchemaError> {
  const raw = doc[field] ?? [];
  if (!Array.isArray(raw)) {
    return Effect.fail(schemaError(source, `"${field}" must be a list of operator names`, [field]));
  }
  const names: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string") {
      return Effect.fail(schemaError(source, `"${field}" must contain only operator names, got ${JSON.stringify(entry)}`, [field]));
    }
    names.push(entry);
  }
  return Effect.succeed(names);
}

/** Check a parsed manifest document against the manifest schema. */
export function validateManifest(
  doc: unknown,
  source = "<manifest>",
): Effect.Effect<BackendManifest, ManifestSchemaError> {
  return Effect.suspend(() => {
    if (!isRecord(doc)) {
      return Effect.fail(schemaError(source, "manifest must be a mapping", []));
    }

    const missing = (["backend", "cpp_namespace"] as const).filter((k) => doc[k] === undefined || doc[k] === null);
    if (missing.length > 0) {
      return Effect.fail(schemaError(source, `missing required field(s): ${missing.join(", ")}`, missing));
    }
    const { backend, cpp_namespace: cppNamespace } = doc;
    if (typeof backend !== "string") {
      return Effect.fail(schemaError(source, `"backend" must be a string`, ["backend"]));
    }
    if (typeof cppNamespace !== "string") {
      return Effect.fail(schemaError(source, `"cpp_namespace" must be a string`, ["cpp_namespace"]));
    }
    if (!DispatchKey.is(backend)) {
      return Effect.fail(schemaError(source, `"backend" is not a valid dispatch key: "${backend}"`, ["backend"]));
    }

    const extra = Object.keys(doc).filter((k) => !KNOWN_KEYS.has(k));
    if (extra.length > 0) {
      return Effect.fail(
        schemaError(source, `unknown field(s): ${extra.join(", ")}. Expected only ${MANIFEST_KEYS.join(", ")}`, extra),
      );
    }

    return Effect.all([operatorList(doc, "supported", source), operatorList(doc, "autograd", source)]).pipe(
      Effect.map(([supported, autograd]): BackendManifest => ({ backend, cppNamespace, supported, autograd })),
    );
  });
}

/** Parse manifest YAML text. */
export function parseManifest(text: string, source = "<manifest>"): Effect.Effect<BackendManifest, ManifestSchemaError> {
  return Effect.try({
    try: (): unknown => parseYaml(text),
    catch: (cause) =>
      new ManifestSchemaError({
        message: `${source}: invalid YAML: ${cause instanceof Error ? cause.message : String(cause)}`,
        fields: [],
        cause,
      }),
  }).pipe(Effect.flatMap((doc) => validateManifest(doc, source)));
}

/** Read, parse and validate a manifest file. */
export function loadBackendManifest(path: string): Effect.Effect<BackendManifest, ManifestSchemaError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new ManifestSchemaError({ message: `Failed to read manifest "${path}"`, fields: [], cause }),
  }).pipe(
    Effect.flatMap((text) => parseManifest(text, path)),
    Effect.tap((m) =>
      Effect.logDebug(`Manifest ${path}: backend=${m.backend} supported=${m.supported.length} autograd=${m.autograd.length}`),
    ),
  );
}
