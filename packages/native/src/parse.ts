/**
 * Loader for the operator registry (`native_functions.yaml`).
 *
 * Each entry declares one operator schema plus the kernels the runtime's
 * built-in backends provide for it. The loader returns the native functions
 * in file order together with one backend index per built-in dispatch key.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { parse as parseYaml } from "yaml";
import {
  BackendIndex,
  BackendIndexTable,
  DispatchKey,
  FunctionSchema,
  KernelNamingService,
  NativeFunction,
  OperatorName,
  RegistryError,
  type BackendMetadata,
  type KernelNaming,
} from "@stubgen/core";

export interface NativeYaml {
  readonly nativeFunctions: readonly NativeFunction[];
  /** Built-in backend indices, one per dispatch key named in a `dispatch` section. */
  readonly backendIndices: BackendIndexTable;
}

const COMPOSITE_IMPLICIT = "CompositeImplicitAutograd";
const COMPOSITE_EXPLICIT = "CompositeExplicitAutograd";

const VALID_KEYS: ReadonlySet<string> = new Set([
  "func",
  "dispatch",
  "structured",
  "structured_delegate",
  "structured_inherits",
  "variants",
  "python_module",
  "device_guard",
  "device_check",
  "manual_kernel_registration",
  "manual_cpp_binding",
  "category_override",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** `{ "CPU, CUDA": "add_out" }` → `[["CPU", "add_out"], ["CUDA", "add_out"]]` */
function parseDispatch(raw: unknown, func: string): [DispatchKey, string][] {
  if (!isRecord(raw)) {
    throw new Error(`"${func}": "dispatch" must be a mapping`);
  }
  const out: [DispatchKey, string][] = [];
  for (const [keys, kernel] of Object.entries(raw)) {
    if (typeof kernel !== "string") {
      throw new Error(`"${func}": kernel for "${keys}" must be a string`);
    }
    for (const key of keys.split(",").map((k) => k.trim())) {
      if (!DispatchKey.is(key)) {
        throw new Error(`"${func}": invalid dispatch key "${key}"`);
      }
      out.push([key, kernel]);
    }
  }
  return out;
}

function parseEntries(text: string, naming: KernelNaming): NativeYaml {
  const doc: unknown = parseYaml(text);
  if (!Array.isArray(doc)) {
    throw new Error("expected a sequence of operator entries");
  }

  const nativeFunctions: NativeFunction[] = [];
  const seen = new Set<string>();
  const indices = new Map<DispatchKey, [string, BackendMetadata][]>();

  doc.forEach((entry: unknown, i: number) => {
    const funcText = isRecord(entry) ? entry.func : undefined;
    if (!isRecord(entry) || typeof funcText !== "string") {
      throw new Error(`entry ${i} must be a mapping with a "func" string`);
    }
    const extra = Object.keys(entry).filter((k) => !VALID_KEYS.has(k));
    if (extra.length > 0) {
      throw new Error(`"${funcText}" has unknown key(s): ${extra.join(", ")}`);
    }

    const func = FunctionSchema.parse(funcText);
    const opName = func.name.toString();
    if (seen.has(opName)) {
      throw new Error(`operator "${opName}" is declared more than once`);
    }
    seen.add(opName);

    const structured = entry.structured ?? false;
    if (typeof structured !== "boolean") {
      throw new Error(`"${opName}": "structured" must be a boolean`);
    }
    const delegate = entry.structured_delegate;
    let structuredDelegate: OperatorName | undefined;
    if (delegate !== undefined) {
      if (typeof delegate !== "string") {
        throw new Error(`"${opName}": "structured_delegate" must be an operator name`);
      }
      structuredDelegate = OperatorName.parse(delegate);
    }

    const dispatch: (readonly [string, string])[] = entry.dispatch === undefined
      ? structuredDelegate === undefined
        ? [[COMPOSITE_IMPLICIT, naming.kernelName(func)]]
        : []
      : parseDispatch(entry.dispatch, opName);

    for (const [key, kernel] of dispatch) {
      const dispatchKey = DispatchKey(key);
      let list = indices.get(dispatchKey);
      if (!list) {
        list = [];
        indices.set(dispatchKey, list);
      }
      list.push([opName, { kernel, structured, external: false }]);
    }

    const keys = new Set<string>(dispatch.map(([key]) => key));
    nativeFunctions.push(
      new NativeFunction({
        func,
        structured,
        structuredDelegate,
        hasCompositeImplicitAutogradKernel: keys.has(COMPOSITE_IMPLICIT),
        hasCompositeExplicitAutogradKernel: keys.has(COMPOSITE_EXPLICIT),
      }),
    );
  });

  return {
    nativeFunctions,
    backendIndices: new BackendIndexTable(
      [...indices].map(([key, entries]) => new BackendIndex(key, true, entries)),
    ),
  };
}

/** Parse registry YAML text. `source` names the document in error messages. */
export function parseNativeYaml(
  text: string,
  source = "native_functions.yaml",
): Effect.Effect<NativeYaml, RegistryError, KernelNamingService> {
  return Effect.flatMap(KernelNamingService, (naming) =>
    Effect.try({
      try: () => parseEntries(text, naming),
      catch: (cause) =>
        new RegistryError({
          message: `${source}: ${cause instanceof Error ? cause.message : String(cause)}`,
          cause,
        }),
    }),
  );
}

/** Read and parse a registry file. */
export function loadNativeYaml(path: string): Effect.Effect<NativeYaml, RegistryError, KernelNamingService> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new RegistryError({ message: `Failed to read operator registry "${path}"`, cause }),
  }).pipe(
    Effect.flatMap((text) => parseNativeYaml(text, path)),
    Effect.tap(({ nativeFunctions, backendIndices }) =>
      Effect.logDebug(`Loaded ${nativeFunctions.length} native functions, ${backendIndices.size} built-in indices from ${path}`),
    ),
  );
}
