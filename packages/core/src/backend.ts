/**
 * Dispatch keys and backend indices.
 *
 * A backend index maps operator names to the kernel a backend provides for
 * them under one dispatch key. Indices are immutable; the table that owns
 * them for a generation run is an explicit object handed from stage to stage.
 */
import { Brand, Effect } from "effect";
import { DuplicateDispatchKeyError } from "./errors.js";
import { NativeFunctionsGroup, type GroupedNativeFunction, type NativeFunction } from "./native-function.js";

// ── DispatchKey ────────────────────────────────────────────────────────────

export type DispatchKey = string & Brand.Brand<"DispatchKey">;

const DISPATCH_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;

export const DispatchKey = Brand.refined<DispatchKey>(
  (name) => DISPATCH_KEY_PATTERN.test(name),
  (name) => Brand.error(`Invalid dispatch key "${name}": expected letters and digits, starting with a letter`),
);

export const AUTOGRAD_PREFIX = "Autograd";

/** Autograd counterpart of a backend key: `XLA` → `AutogradXLA`. */
export function autogradKeyFor(backend: DispatchKey): DispatchKey {
  return DispatchKey(`${AUTOGRAD_PREFIX}${backend}`);
}

// ── BackendMetadata ────────────────────────────────────────────────────────

export interface BackendMetadata {
  /** Kernel symbol the dispatcher calls. */
  readonly kernel: string;
  readonly structured: boolean;
  /** Kernel lives outside the runtime (an out-of-tree backend). */
  readonly external: boolean;
}

// ── BackendIndex ───────────────────────────────────────────────────────────

export class BackendIndex {
  readonly index: ReadonlyMap<string, BackendMetadata>;

  constructor(
    readonly dispatchKey: DispatchKey,
    readonly useOutAsPrimary: boolean,
    index: Iterable<readonly [string, BackendMetadata]>,
  ) {
    this.index = new Map(index);
  }

  /** The variant whose kernel stands for the whole group. */
  primary(g: NativeFunctionsGroup): NativeFunction {
    return this.useOutAsPrimary ? g.out : g.functional;
  }

  getKernel(item: GroupedNativeFunction): BackendMetadata | undefined {
    const f = item instanceof NativeFunctionsGroup ? this.primary(item) : item;
    return this.index.get(f.func.name.toString());
  }

  hasKernel(item: GroupedNativeFunction): boolean {
    return this.getKernel(item) !== undefined;
  }
}

// ── BackendIndexTable ──────────────────────────────────────────────────────

export class BackendIndexTable {
  private readonly _indices = new Map<DispatchKey, BackendIndex>();

  constructor(indices: Iterable<BackendIndex> = []) {
    for (const index of indices) {
      if (this._indices.has(index.dispatchKey)) {
        throw new Error(`Dispatch key "${index.dispatchKey}" is already registered`);
      }
      this._indices.set(index.dispatchKey, index);
    }
  }

  /** Add an index. Fails if its dispatch key already has one. */
  register(index: BackendIndex): Effect.Effect<void, DuplicateDispatchKeyError> {
    return Effect.suspend(() => {
      if (this._indices.has(index.dispatchKey)) {
        return Effect.fail(
          new DuplicateDispatchKeyError({
            message: `Dispatch key "${index.dispatchKey}" is already registered`,
            dispatchKey: index.dispatchKey,
          }),
        );
      }
      this._indices.set(index.dispatchKey, index);
      return Effect.void;
    });
  }

  get(key: DispatchKey): BackendIndex | undefined {
    return this._indices.get(key);
  }

  has(key: DispatchKey): boolean {
    return this._indices.has(key);
  }

  keys(): DispatchKey[] {
    return [...this._indices.keys()];
  }

  get size(): number {
    return this._indices.size;
  }
}
