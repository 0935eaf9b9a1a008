/**
 * Backend stub generation: manifest + operator registry → three C++
 * artifacts (kernel declarations header, fallback header, fallback source
 * with registrations).
 */
import { Effect } from "effect";
import {
  ArtifactWriterService,
  CodegenError,
  KernelNamingService,
  type BackendIndex,
  type BackendIndexTable,
  type DispatchKey,
  type ManifestError,
  type RegistryError,
} from "@stubgen/core";
import { getGroupedNativeFunctions, loadNativeYaml, type NativeYaml } from "@stubgen/native";
import { addBackendIndices } from "./backend-index.js";
import { backendDeclarations } from "./dest/declarations.js";
import { fallbackArtifacts } from "./dest/fallback.js";
import { loadBackendManifest, type BackendManifest } from "./manifest.js";

export const GENERATED_COMMENT = "@generated by stubgen backend-stubs. Do not edit directly.";

export const TEMPLATES = {
  backendHeader: "aten_backend_type.h",
  fallbackHeader: "aten_backend_type_default.h",
  fallbackSource: "aten_backend_type_default.cpp",
} as const;

export interface BackendStubsResult {
  readonly backendKey: DispatchKey | null;
  readonly autogradKey: DispatchKey | null;
  readonly cppNamespace: string;
  readonly backendIndices: BackendIndexTable;
  /** Artifacts written by this run, empty when generation was skipped. */
  readonly written: readonly string[];
}

export type BackendStubsError = ManifestError | RegistryError | CodegenError;

/** Output file names for a backend: `XLA` → `aten_xla_type.h`, ... */
export function artifactNames(backend: string) {
  const lower = backend.toLowerCase();
  return {
    backendHeader: `aten_${lower}_type.h`,
    fallbackHeader: `aten_${lower}_type_default.h`,
    fallbackSource: `aten_${lower}_type_default.cpp`,
  } as const;
}

function requireIndex(table: BackendIndexTable, key: DispatchKey): Effect.Effect<BackendIndex, CodegenError> {
  const index = table.get(key);
  return index
    ? Effect.succeed(index)
    : Effect.fail(new CodegenError({ message: `No backend index registered for ${key}` }));
}

/** Generate the artifacts for one manifest against a loaded registry. */
export function generateBackendStubs(
  registry: NativeYaml,
  manifest: BackendManifest,
): Effect.Effect<BackendStubsResult, BackendStubsError, KernelNamingService | ArtifactWriterService> {
  return Effect.gen(function* () {
    const grouped = yield* getGroupedNativeFunctions(registry.nativeFunctions);
    const parsed = yield* addBackendIndices(manifest, grouped, registry.backendIndices);
    const { backendKey, autogradKey, cppNamespace, backendIndices } = parsed;

    if (backendKey === null || autogradKey === null) {
      yield* Effect.logWarning(
        `Backend ${manifest.backend} needs both "supported" and "autograd" operators to generate stubs; nothing written`,
      );
      return { ...parsed, written: [] };
    }

    const naming = yield* KernelNamingService;
    const writer = yield* ArtifactWriterService;
    const backendIndex = yield* requireIndex(backendIndices, backendKey);
    const autogradIndex = yield* requireIndex(backendIndices, autogradKey);

    const { declarations, fallbacks } = yield* Effect.try({
      try: () => ({
        declarations: backendDeclarations(grouped, [backendIndex, autogradIndex]),
        fallbacks: fallbackArtifacts(grouped, backendIndex, autogradIndex, naming),
      }),
      catch: (cause) =>
        new CodegenError({
          message: `Failed to render ${backendKey}: ${cause instanceof Error ? cause.message : String(cause)}`,
          cause,
        }),
    });
    yield* Effect.logInfo(
      `${backendKey}: ${declarations.length} kernel declarations, ${fallbacks.declarations.length} fallbacks`,
    );

    const names = artifactNames(backendKey);
    const common = { generated_comment: GENERATED_COMMENT, cpp_namespace: cppNamespace };
    yield* writer.writeWithTemplate(names.backendHeader, TEMPLATES.backendHeader, {
      ...common,
      [`dispatch_${backendKey.toLowerCase()}_declarations`]: declarations,
      dispatch_backend_declarations: declarations,
    });
    yield* writer.writeWithTemplate(names.fallbackHeader, TEMPLATES.fallbackHeader, {
      ...common,
      dispatch_aten_fallback_declarations: fallbacks.declarations,
    });
    yield* writer.writeWithTemplate(names.fallbackSource, TEMPLATES.fallbackSource, {
      ...common,
      dispatch_aten_fallback_definitions: fallbacks.definitions,
      dispatch_registrations: fallbacks.registrations,
      dispatch_autograd_registrations: fallbacks.autogradRegistrations,
    });

    return { ...parsed, written: [names.backendHeader, names.fallbackHeader, names.fallbackSource] };
  }).pipe(Effect.withSpan("generateBackendStubs", { attributes: { backend: manifest.backend } }));
}

/** Load the registry and manifest from disk, then generate. */
export function runBackendStubs(
  manifestPath: string,
  nativeFunctionsPath: string,
): Effect.Effect<BackendStubsResult, BackendStubsError, KernelNamingService | ArtifactWriterService> {
  return Effect.all([loadNativeYaml(nativeFunctionsPath), loadBackendManifest(manifestPath)]).pipe(
    Effect.flatMap(([registry, manifest]) => generateBackendStubs(registry, manifest)),
  );
}
