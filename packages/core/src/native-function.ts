/**
 * Native functions and their variant groups.
 */
import type { OperatorName } from "./operator-name.js";
import type { FunctionSchema } from "./schema.js";

export interface NativeFunctionInit {
  readonly func: FunctionSchema;
  readonly structured?: boolean;
  readonly structuredDelegate?: OperatorName;
  readonly hasCompositeImplicitAutogradKernel?: boolean;
  readonly hasCompositeExplicitAutogradKernel?: boolean;
}

/** One operator variant as declared in the registry. */
export class NativeFunction {
  readonly func: FunctionSchema;
  readonly structured: boolean;
  readonly structuredDelegate: OperatorName | undefined;
  readonly hasCompositeImplicitAutogradKernel: boolean;
  readonly hasCompositeExplicitAutogradKernel: boolean;

  constructor(init: NativeFunctionInit) {
    this.func = init.func;
    this.structured = init.structured ?? false;
    this.structuredDelegate = init.structuredDelegate;
    this.hasCompositeImplicitAutogradKernel = init.hasCompositeImplicitAutogradKernel ?? false;
    this.hasCompositeExplicitAutogradKernel = init.hasCompositeExplicitAutogradKernel ?? false;
  }

  get hasCompositeKernel(): boolean {
    return this.hasCompositeImplicitAutogradKernel || this.hasCompositeExplicitAutogradKernel;
  }

  /**
   * Functional and in-place variants of a structured operator get a kernel
   * generated from the out variant, so they never need a hand-written one.
   */
  get hasAutogeneratedCompositeKernel(): boolean {
    const kind = this.func.kind();
    return (this.structured || this.structuredDelegate !== undefined)
      && (kind === "functional" || kind === "inplace");
  }
}

/** Functional, out and (optionally) in-place variants of one operator. */
export class NativeFunctionsGroup {
  constructor(
    readonly functional: NativeFunction,
    readonly out: NativeFunction,
    readonly inplace?: NativeFunction,
  ) {
    const signature = functional.func.signature().toString();
    for (const f of this.functions()) {
      if (f.func.signature().toString() !== signature) {
        throw new Error(`"${f.func.name}" does not share the signature of group "${functional.func.name}"`);
      }
    }
  }

  get structured(): boolean {
    return this.out.structured;
  }

  *functions(): Generator<NativeFunction> {
    yield this.functional;
    yield this.out;
    if (this.inplace) yield this.inplace;
  }
}

export type GroupedNativeFunction = NativeFunction | NativeFunctionsGroup;

/** Every variant of a grouped item, in group order. */
export function functionsOf(item: GroupedNativeFunction): NativeFunction[] {
  return item instanceof NativeFunctionsGroup ? [...item.functions()] : [item];
}
