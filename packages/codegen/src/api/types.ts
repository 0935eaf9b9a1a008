/**
 * C++ types of the dispatcher calling convention.
 *
 * Arguments: tensors and scalars by const reference (written tensors by
 * mutable reference), small value types by value, lists as array views.
 * Throws on a type this convention does not cover.
 */
import type { Annotation, BaseTy, Return, SchemaType } from "@stubgen/core";

const VALUE_TYPES: Readonly<Record<BaseTy, string>> = {
  Tensor: "at::Tensor",
  Scalar: "at::Scalar",
  int: "int64_t",
  float: "double",
  bool: "bool",
  str: "c10::string_view",
  ScalarType: "at::ScalarType",
  Layout: "at::Layout",
  Device: "at::Device",
  MemoryFormat: "at::MemoryFormat",
  Generator: "at::Generator",
  Dimname: "at::Dimname",
  Storage: "at::Storage",
  Stream: "at::Stream",
  QScheme: "at::QScheme",
};

function listType(elem: SchemaType, size: number | null): string {
  if (elem.kind === "base") {
    switch (elem.name) {
      case "Tensor": return "at::TensorList";
      case "int": return "at::IntArrayRef";
      case "Dimname": return "at::DimnameList";
      case "bool": return size !== null ? `::std::array<bool,${size}>` : "at::ArrayRef<bool>";
      default: return `at::ArrayRef<${VALUE_TYPES[elem.name]}>`;
    }
  }
  if (elem.kind === "optional" && elem.elem.kind === "base" && elem.elem.name === "Tensor") {
    return "const c10::List<c10::optional<at::Tensor>> &";
  }
  throw new Error(`Unsupported list element type in dispatcher signature`);
}

export function argumentType(type: SchemaType, annotation?: Annotation): string {
  switch (type.kind) {
    case "base":
      if (type.name === "Tensor") return annotation?.isWrite ? "at::Tensor &" : "const at::Tensor &";
      if (type.name === "Scalar") return "const at::Scalar &";
      return VALUE_TYPES[type.name];
    case "optional": {
      const elem = type.elem;
      if (elem.kind === "base") {
        if (elem.name === "Tensor" || elem.name === "Scalar") {
          return `const c10::optional<${VALUE_TYPES[elem.name]}> &`;
        }
        return `c10::optional<${VALUE_TYPES[elem.name]}>`;
      }
      if (elem.kind === "list") return `c10::optional<${listType(elem.elem, elem.size)}>`;
      throw new Error(`Nested optional types are not supported`);
    }
    case "list":
      return listType(type.elem, type.size);
  }
}

function returnType(r: Return): string {
  const { type } = r;
  if (type.kind === "base") {
    if (type.name === "Tensor" && r.annotation?.isWrite) return "at::Tensor &";
    return VALUE_TYPES[type.name];
  }
  if (type.kind === "list" && type.elem.kind === "base" && type.elem.name === "Tensor") {
    return "::std::vector<at::Tensor>";
  }
  throw new Error(`Unsupported return type in dispatcher signature`);
}

export function returnsType(returns: readonly Return[]): string {
  if (returns.length === 0) return "void";
  if (returns.length === 1) return returnType(returns[0]);
  return `::std::tuple<${returns.map(returnType).join(",")}>`;
}
