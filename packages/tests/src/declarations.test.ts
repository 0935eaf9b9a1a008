import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { BackendIndex, DispatchKey, type BackendMetadata } from "@stubgen/core";
import { getGroupedNativeFunctions } from "@stubgen/native";
import { backendDeclarations, computeNativeFunctionDeclaration } from "@stubgen/codegen";
import { fixtureRegistry } from "./helpers.js";

const registry = fixtureRegistry();
const grouped = Effect.runSync(getGroupedNativeFunctions(registry.nativeFunctions));
const [abs, addGroup, , mulGroup, , , max] = grouped;

function external(kernel: string): BackendMetadata {
  return { kernel, structured: false, external: true };
}

function index(key: string, entries: [string, BackendMetadata][]): BackendIndex {
  return new BackendIndex(DispatchKey(key), false, entries);
}

describe("computeNativeFunctionDeclaration", () => {
  it("declares external kernels as static members", () => {
    expect(computeNativeFunctionDeclaration(abs, index("Foo", [["abs", external("abs")]]))).toEqual([
      "static at::Tensor abs(const at::Tensor & self);",
    ]);
  });

  it("declares built-in kernels with TORCH_API", () => {
    const cpu = registry.backendIndices.get(DispatchKey("CPU"));
    expect(cpu && computeNativeFunctionDeclaration(abs, cpu)).toEqual([
      "TORCH_API at::Tensor abs(const at::Tensor & self);",
    ]);
  });

  it("declares every implemented variant of an unstructured group", () => {
    const foo = index("Foo", [["add.Tensor", external("add")], ["add_.Tensor", external("add_")]]);
    expect(computeNativeFunctionDeclaration(addGroup, foo)).toEqual([
      "static at::Tensor add(const at::Tensor & self, const at::Tensor & other, const at::Scalar & alpha);",
      "static at::Tensor & add_(at::Tensor & self, const at::Tensor & other, const at::Scalar & alpha);",
    ]);
  });

  it("declares a structured kernel class for structured groups", () => {
    const cpu = registry.backendIndices.get(DispatchKey("CPU"));
    expect(cpu && computeNativeFunctionDeclaration(mulGroup, cpu)).toEqual([
      [
        "struct TORCH_API structured_mul_out : public at::meta::structured_mul_Tensor {",
        "void impl(const at::Tensor & self, const at::Tensor & other, at::Tensor & out);",
        "};",
      ].join("\n"),
    ]);
  });

  it("skips missing and legacy kernels", () => {
    expect(computeNativeFunctionDeclaration(abs, index("Foo", []))).toEqual([]);
    expect(computeNativeFunctionDeclaration(abs, index("Foo", [["abs", external("legacy::abs")]]))).toEqual([]);
  });
});

describe("backendDeclarations", () => {
  it("merges identical declarations from the plain and autograd indices", () => {
    const plain = index("Foo", [["abs", external("abs")]]);
    const autograd = index("AutogradFoo", [["abs", external("abs")]]);
    expect(backendDeclarations(grouped, [plain, autograd])).toEqual([
      "static at::Tensor abs(const at::Tensor & self);",
    ]);
  });

  it("concatenates items in registry order", () => {
    const plain = index("Foo", [["max.dim", external("max")], ["abs", external("abs")]]);
    const autograd = index("AutogradFoo", [["add.Tensor", external("add")]]);
    expect(backendDeclarations(grouped, [plain, autograd])).toEqual([
      "static at::Tensor abs(const at::Tensor & self);",
      "static at::Tensor add(const at::Tensor & self, const at::Tensor & other, const at::Scalar & alpha);",
      "static ::std::tuple<at::Tensor,at::Tensor> max(const at::Tensor & self, int64_t dim, bool keepdim);",
    ]);
  });

  it("keeps the first of two identical declarations for one item", () => {
    const plain = index("Foo", [["add.Tensor", external("add")]]);
    const autograd = index("AutogradFoo", [["add_.Tensor", external("add_")], ["add.Tensor", external("add")]]);
    expect(backendDeclarations([addGroup, max], [plain, autograd])).toEqual([
      "static at::Tensor add(const at::Tensor & self, const at::Tensor & other, const at::Scalar & alpha);",
      "static at::Tensor & add_(at::Tensor & self, const at::Tensor & other, const at::Scalar & alpha);",
    ]);
  });
});
