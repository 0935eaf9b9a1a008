/**
 * CPU fallback kernels.
 *
 * Every operator a backend does not implement (and the runtime cannot
 * compose from other kernels) gets a fallback that copies its tensor
 * arguments to the CPU, runs the CPU kernel, and moves the result back.
 */
import { absurd } from "effect";
import {
  NativeFunctionsGroup,
  concatMap,
  functionsOf,
  isTensorLike,
  orderedUnion,
  type Argument,
  type BackendIndex,
  type GroupedNativeFunction,
  type KernelNaming,
  type NativeFunction,
} from "@stubgen/core";
import { DispatcherSignature } from "../api/dispatcher.js";

export type Target = "declaration" | "definition" | "registration";

export const FALLBACK_CLASS = "AtenTypeDefault";

/** No composite kernel, no generated composite, and no kernel in `index`. */
export function requiresBackendWrapper(f: NativeFunction, index: BackendIndex): boolean {
  return !f.hasCompositeKernel && !f.hasAutogeneratedCompositeKernel && !index.hasKernel(f);
}

/** Out and in-place variants whose functional variant has a kernel get a runtime-generated wrapper. */
function getsGeneratedWrapper(f: NativeFunction, g: NativeFunctionsGroup | undefined, index: BackendIndex): boolean {
  return g !== undefined && f.func.kind() !== "functional" && index.hasKernel(g.functional);
}

// ── Definition body ────────────────────────────────────────────────────────

function isPlainTensor(a: Argument): boolean {
  return a.type.kind === "base" && a.type.name === "Tensor";
}

function copyBack(a: Argument): string[] {
  switch (a.type.kind) {
    case "base":
      return [`  ${a.name}.copy_(${a.name}_cpu);`];
    case "optional":
      return [`  if (${a.name}.has_value()) ${a.name}->copy_(*${a.name}_cpu);`];
    case "list":
      return [
        `  for (size_t i = 0; i < ${a.name}.size(); ++i) {`,
        `    ${a.name}[i].copy_(${a.name}_cpu[i]);`,
        "  }",
      ];
  }
}

function definition(f: NativeFunction, sig: DispatcherSignature): string {
  const args = f.func.arguments;
  const tensors = args.filter((a) => isTensorLike(a.type));
  const written = tensors.filter((a) => a.annotation?.isWrite === true);
  const call = `at::_ops::${f.func.name.unambiguousName()}::call(${
    args.map((a) => (isTensorLike(a.type) ? `${a.name}_cpu` : a.name)).join(", ")
  })`;

  // Returns aliasing a written argument hand that argument back.
  const aliased = f.func.returns.map((r) =>
    r.annotation ? written.find((a) => a.annotation?.alias === r.annotation?.alias) : undefined,
  );
  const returnsAliases = f.func.returns.length > 0 && aliased.every((a) => a !== undefined);
  const device = tensors.find(isPlainTensor);

  const lines = [`${sig.defn(`${FALLBACK_CLASS}::${sig.name}`)} {`];
  for (const a of tensors) lines.push(`  auto ${a.name}_cpu = to_cpu(${a.name});`);
  lines.push(f.func.returns.length === 0 || returnsAliases ? `  ${call};` : `  auto result = ${call};`);
  for (const a of written) lines.push(...copyBack(a));

  if (returnsAliases) {
    const names = aliased.flatMap((a) => (a ? [a.name] : []));
    lines.push(names.length === 1 ? `  return ${names[0]};` : `  return ${sig.returnsType()}(${names.join(", ")});`);
  } else if (f.func.returns.length > 0) {
    lines.push(device ? `  return to_device(result, ${device.name}.device());` : "  return result;");
  }
  lines.push("}");
  return lines.join("\n");
}

// ── Generation ─────────────────────────────────────────────────────────────

function genFunction(
  target: Target,
  f: NativeFunction,
  g: NativeFunctionsGroup | undefined,
  index: BackendIndex,
  naming: KernelNaming,
): string[] {
  if (!requiresBackendWrapper(f, index)) return [];
  const sig = DispatcherSignature.fromSchema(f.func, naming);
  switch (target) {
    case "declaration":
      return [`static ${sig.decl()};`];
    case "definition":
      return [definition(f, sig)];
    case "registration":
      if (getsGeneratedWrapper(f, g, index)) return [];
      return [`m.impl("${f.func.name}", static_cast<${sig.ptrType()}>(&${FALLBACK_CLASS}::${sig.name}));`];
    default:
      return absurd(target);
  }
}

/** Fallback text of one target for one grouped item under `index`. */
export function genExternalFallback(
  target: Target,
  item: GroupedNativeFunction,
  index: BackendIndex,
  naming: KernelNaming,
): string[] {
  const g = item instanceof NativeFunctionsGroup ? item : undefined;
  return concatMap(functionsOf(item), (f) => genFunction(target, f, g, index, naming));
}

export interface FallbackArtifacts {
  readonly declarations: readonly string[];
  readonly definitions: readonly string[];
  readonly registrations: readonly string[];
  readonly autogradRegistrations: readonly string[];
}

/**
 * Declarations and definitions are the union over the plain and autograd
 * indices; registrations stay per index.
 */
export function fallbackArtifacts(
  grouped: readonly GroupedNativeFunction[],
  backendIndex: BackendIndex,
  autogradIndex: BackendIndex,
  naming: KernelNaming,
): FallbackArtifacts {
  const gen = (target: Target, index: BackendIndex): string[] =>
    concatMap(grouped, (item) => genExternalFallback(target, item, index, naming));
  return {
    declarations: orderedUnion(gen("declaration", backendIndex), gen("declaration", autogradIndex)),
    definitions: orderedUnion(gen("definition", backendIndex), gen("definition", autogradIndex)),
    registrations: gen("registration", backendIndex),
    autogradRegistrations: gen("registration", autogradIndex),
  };
}
