/**
 * Backend index construction for a manifest.
 *
 * The plain coverage list is indexed under the manifest's backend key, the
 * autograd list under `Autograd<backend>`. Both go into the caller's table;
 * an empty list produces no key.
 */
import { Effect } from "effect";
import {
  BackendIndex,
  BackendIndexTable,
  DuplicateDispatchKeyError,
  KernelNamingService,
  OperatorName,
  UnresolvedOperatorError,
  autogradKeyFor,
  functionsOf,
  type BackendMetadata,
  type DispatchKey,
  type GroupedNativeFunction,
  type KernelNaming,
  type NativeFunction,
} from "@stubgen/core";
import type { BackendManifest } from "./manifest.js";
import { EXTERNAL_BACKEND_POLICY } from "./policy.js";

export interface ParsedBackend {
  readonly backendKey: DispatchKey | null;
  readonly autogradKey: DispatchKey | null;
  readonly cppNamespace: string;
  readonly backendIndices: BackendIndexTable;
}

/** Flatten grouped items into an operator-name → function lookup. */
export function nativeFunctionsByName(grouped: readonly GroupedNativeFunction[]): ReadonlyMap<string, NativeFunction> {
  const map = new Map<string, NativeFunction>();
  for (const item of grouped) {
    for (const f of functionsOf(item)) map.set(f.func.name.toString(), f);
  }
  return map;
}

function resolve(
  op: string,
  functions: ReadonlyMap<string, NativeFunction>,
): Effect.Effect<NativeFunction, UnresolvedOperatorError> {
  return Effect.suspend(() => {
    let key: string;
    try {
      key = OperatorName.parse(op).toString();
    } catch (cause) {
      return Effect.fail(
        new UnresolvedOperatorError({
          message: `Malformed operator name "${op}": ${cause instanceof Error ? cause.message : String(cause)}`,
          operator: op,
        }),
      );
    }
    const f = functions.get(key);
    return f
      ? Effect.succeed(f)
      : Effect.fail(new UnresolvedOperatorError({ message: `Operator "${op}" is not in the registry`, operator: op }));
  });
}

/** One external BackendMetadata per listed operator, in list order. */
export function buildBackendIndex(
  ops: readonly string[],
  dispatchKey: DispatchKey,
  functions: ReadonlyMap<string, NativeFunction>,
  naming: KernelNaming,
): Effect.Effect<BackendIndex, UnresolvedOperatorError> {
  return Effect.forEach(ops, (op) =>
    Effect.map(resolve(op, functions), (f): readonly [string, BackendMetadata] => [
      f.func.name.toString(),
      {
        kernel: naming.kernelName(f.func),
        structured: EXTERNAL_BACKEND_POLICY.structured,
        external: EXTERNAL_BACKEND_POLICY.external,
      },
    ]),
  ).pipe(
    Effect.map((entries) => new BackendIndex(dispatchKey, EXTERNAL_BACKEND_POLICY.useOutAsPrimary, entries)),
  );
}

function registerList(
  ops: readonly string[],
  key: DispatchKey,
  functions: ReadonlyMap<string, NativeFunction>,
  naming: KernelNaming,
  table: BackendIndexTable,
): Effect.Effect<DispatchKey | null, UnresolvedOperatorError | DuplicateDispatchKeyError> {
  if (ops.length === 0) return Effect.succeed(null);
  return buildBackendIndex(ops, key, functions, naming).pipe(
    Effect.tap((index) => table.register(index)),
    Effect.tap((index) => Effect.logDebug(`Registered ${index.index.size} kernel(s) under ${key}`)),
    Effect.as(key),
  );
}

/**
 * Build and register the manifest's indices. Plain is registered before
 * autograd, so a duplicate plain key fails before the autograd list is read.
 */
export function addBackendIndices(
  manifest: BackendManifest,
  grouped: readonly GroupedNativeFunction[],
  table: BackendIndexTable,
): Effect.Effect<ParsedBackend, UnresolvedOperatorError | DuplicateDispatchKeyError, KernelNamingService> {
  const functions = nativeFunctionsByName(grouped);
  return Effect.flatMap(KernelNamingService, (naming) =>
    Effect.all([
      registerList(manifest.supported, manifest.backend, functions, naming, table),
      registerList(manifest.autograd, autogradKeyFor(manifest.backend), functions, naming, table),
    ]).pipe(
      Effect.map(([backendKey, autogradKey]) => ({
        backendKey,
        autogradKey,
        cppNamespace: manifest.cppNamespace,
        backendIndices: table,
      })),
    ),
  );
}
