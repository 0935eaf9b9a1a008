/**
 * Dispatcher signatures and kernel naming conventions.
 */
import { Registry, type FunctionSchema, type KernelNaming } from "@stubgen/core";
import { argumentType, returnsType } from "./types.js";

// ── Naming conventions ─────────────────────────────────────────────────────

/** `add` → `add`, `add_` → `add_`, `add.out` → `add_out`. */
export const dispatcherNaming: KernelNaming = {
  name: "dispatcher",
  kernelName: (func) => `${func.name.name}${func.isOutFn() ? "_out" : ""}`,
};

/** Like `dispatcher`, but out variants take the `_outf` suffix of the faithful C++ API. */
export const faithfulNaming: KernelNaming = {
  name: "faithful",
  kernelName: (func) => `${func.name.name}${func.isOutFn() ? "_outf" : ""}`,
};

export const namingRegistry = new Registry<KernelNaming>("naming");
namingRegistry.register(dispatcherNaming.name, () => dispatcherNaming);
namingRegistry.register(faithfulNaming.name, () => faithfulNaming);

// ── DispatcherSignature ────────────────────────────────────────────────────

export interface CppArgument {
  readonly name: string;
  readonly type: string;
}

export class DispatcherSignature {
  constructor(
    readonly func: FunctionSchema,
    readonly name: string,
  ) {}

  static fromSchema(func: FunctionSchema, naming: KernelNaming): DispatcherSignature {
    return new DispatcherSignature(func, naming.kernelName(func));
  }

  returnsType(): string {
    return returnsType(this.func.returns);
  }

  arguments(): CppArgument[] {
    return this.func.arguments.map((a) => ({ name: a.name, type: argumentType(a.type, a.annotation) }));
  }

  /** `at::Tensor add(const at::Tensor & self, const at::Tensor & other)` */
  decl(name = this.name): string {
    const args = this.arguments().map((a) => `${a.type} ${a.name}`).join(", ");
    return `${this.returnsType()} ${name}(${args})`;
  }

  /** Dispatcher arguments carry no defaults, so a definition reads like the declaration. */
  defn(name = this.name): string {
    return this.decl(name);
  }

  /** Function pointer type: `at::Tensor (*)(const at::Tensor &, const at::Tensor &)`. */
  ptrType(): string {
    return `${this.returnsType()} (*)(${this.arguments().map((a) => a.type).join(", ")})`;
  }
}
