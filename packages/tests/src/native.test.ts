import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { DispatchKey, NativeFunctionsGroup, functionsOf, type GroupedNativeFunction } from "@stubgen/core";
import { getGroupedNativeFunctions, parseNativeYaml } from "@stubgen/native";
import { fixtureRegistry, withDispatcherNaming } from "./helpers.js";

function names(item: GroupedNativeFunction): string[] {
  return functionsOf(item).map((f) => f.func.name.toString());
}

function parseError(text: string) {
  return Effect.runSync(Effect.flip(parseNativeYaml(text, "test.yaml")).pipe(Effect.provide(withDispatcherNaming)));
}

describe("parseNativeYaml", () => {
  const registry = fixtureRegistry();

  it("keeps functions in file order", () => {
    expect(registry.nativeFunctions.map((f) => f.func.name.toString())).toEqual([
      "abs", "add.Tensor", "add_.Tensor", "add.out", "sub.Tensor", "sub.out",
      "mul.Tensor", "mul.out", "relu", "matmul", "max.dim",
    ]);
  });

  it("builds one built-in index per dispatch key", () => {
    expect(registry.backendIndices.keys()).toEqual([
      "CPU", "CUDA", "CompositeExplicitAutograd", "CompositeImplicitAutograd",
    ]);
    const cuda = registry.backendIndices.get(DispatchKey("CUDA"));
    expect(cuda?.useOutAsPrimary).toBe(true);
    expect([...(cuda?.index.keys() ?? [])]).toEqual(["abs"]);
    expect(cuda?.index.get("abs")).toEqual({ kernel: "abs", structured: false, external: false });
  });

  it("records structured kernels", () => {
    const cpu = registry.backendIndices.get(DispatchKey("CPU"));
    expect(cpu?.index.get("mul.out")).toEqual({ kernel: "mul_out", structured: true, external: false });
  });

  it("gives entries without dispatch an implicit composite kernel", () => {
    const matmul = registry.nativeFunctions.find((f) => f.func.name.toString() === "matmul");
    expect(matmul?.hasCompositeImplicitAutogradKernel).toBe(true);
    const composite = registry.backendIndices.get(DispatchKey("CompositeImplicitAutograd"));
    expect(composite?.index.get("matmul")?.kernel).toBe("matmul");
  });

  it("does not add a composite kernel to structured delegates", () => {
    const mul = registry.nativeFunctions.find((f) => f.func.name.toString() === "mul.Tensor");
    expect(mul?.hasCompositeKernel).toBe(false);
    expect(mul?.hasAutogeneratedCompositeKernel).toBe(true);
    expect(mul?.structuredDelegate?.toString()).toBe("mul.out");
  });

  it("rejects unknown entry keys", () => {
    const err = parseError("- func: abs(Tensor self) -> Tensor\n  colour: red\n");
    expect(err._tag).toBe("RegistryError");
    expect(err.message).toBe('test.yaml: "abs(Tensor self) -> Tensor" has unknown key(s): colour');
  });

  it("rejects duplicate operators", () => {
    const err = parseError("- func: abs(Tensor self) -> Tensor\n- func: abs(Tensor self) -> Tensor\n");
    expect(err.message).toBe('test.yaml: operator "abs" is declared more than once');
  });

  it("rejects a document that is not a sequence", () => {
    const err = parseError("func: abs(Tensor self) -> Tensor\n");
    expect(err.message).toBe("test.yaml: expected a sequence of operator entries");
  });
});

describe("getGroupedNativeFunctions", () => {
  const registry = fixtureRegistry();
  const grouped = Effect.runSync(getGroupedNativeFunctions(registry.nativeFunctions));

  it("groups functional, out and in-place variants in first-seen order", () => {
    expect(grouped.map(names)).toEqual([
      ["abs"],
      ["add.Tensor", "add.out", "add_.Tensor"],
      ["sub.Tensor", "sub.out"],
      ["mul.Tensor", "mul.out"],
      ["relu"],
      ["matmul"],
      ["max.dim"],
    ]);
  });

  it("builds NativeFunctionsGroup only for functional + out pairs", () => {
    expect(grouped.map((item) => item instanceof NativeFunctionsGroup)).toEqual([
      false, true, true, true, false, false, false,
    ]);
  });

  it("leaves a lone in-place variant standalone", () => {
    const text = [
      "- func: relu(Tensor self) -> Tensor",
      "  dispatch: {CPU: relu}",
      "- func: relu_(Tensor(a!) self) -> Tensor(a!)",
      "  dispatch: {CPU: relu_}",
    ].join("\n");
    const { nativeFunctions } = Effect.runSync(parseNativeYaml(text).pipe(Effect.provide(withDispatcherNaming)));
    const items = Effect.runSync(getGroupedNativeFunctions(nativeFunctions));
    expect(items.map(names)).toEqual([["relu"], ["relu_"]]);
  });

  it("rejects two variants of the same kind", () => {
    const text = [
      "- func: add.Tensor(Tensor self, Tensor other) -> Tensor",
      "- func: add.Other(Tensor self, Tensor other) -> Tensor",
    ].join("\n");
    const { nativeFunctions } = Effect.runSync(parseNativeYaml(text).pipe(Effect.provide(withDispatcherNaming)));
    const err = Effect.runSync(Effect.flip(getGroupedNativeFunctions(nativeFunctions)));
    expect(err.message).toBe(
      'Failed to group native functions: "add.Other" and "add.Tensor" are both functional variants of add(Tensor self, Tensor other) -> Tensor',
    );
  });
});
