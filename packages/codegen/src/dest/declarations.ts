/**
 * Kernel forward declarations for a backend header.
 */
import {
  NativeFunctionsGroup,
  concatMap,
  orderedUnion,
  type BackendIndex,
  type BackendMetadata,
  type GroupedNativeFunction,
  type NativeFunction,
} from "@stubgen/core";
import { DispatcherSignature } from "../api/dispatcher.js";

function unstructuredDeclaration(f: NativeFunction, index: BackendIndex): string | undefined {
  const metadata = index.getKernel(f);
  if (!metadata || metadata.kernel.includes("legacy::")) return undefined;
  const sig = new DispatcherSignature(f.func, metadata.kernel);
  return metadata.external ? `static ${sig.decl()};` : `TORCH_API ${sig.decl()};`;
}

function structuredDeclaration(g: NativeFunctionsGroup, metadata: BackendMetadata): string {
  const args = new DispatcherSignature(g.out.func, "impl").arguments().map((a) => `${a.type} ${a.name}`);
  return [
    `struct TORCH_API structured_${metadata.kernel} : public at::meta::structured_${g.functional.func.name.unambiguousName()} {`,
    `void impl(${args.join(", ")});`,
    "};",
  ].join("\n");
}

/** Declarations one index contributes for one grouped item. */
export function computeNativeFunctionDeclaration(item: GroupedNativeFunction, index: BackendIndex): string[] {
  if (item instanceof NativeFunctionsGroup) {
    const metadata = index.getKernel(item);
    if (metadata?.structured) return [structuredDeclaration(item, metadata)];
    return [...item.functions()].flatMap((f) => unstructuredDeclaration(f, index) ?? []);
  }
  const decl = unstructuredDeclaration(item, index);
  return decl === undefined ? [] : [decl];
}

/**
 * Declarations for every item across `indices`: merged per item so an
 * identical declaration from two indices appears once, then concatenated in
 * registry order.
 */
export function backendDeclarations(
  grouped: readonly GroupedNativeFunction[],
  indices: readonly BackendIndex[],
): string[] {
  return concatMap(grouped, (item) =>
    orderedUnion(...indices.map((index) => computeNativeFunctionDeclaration(item, index))),
  );
}
