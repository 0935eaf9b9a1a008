/**
 * Operator schemas.
 *
 * Parses and prints the schema text carried by every registry entry, e.g.
 *
 *   add.out(Tensor self, Tensor other, *, Scalar alpha=1, Tensor(a!) out) -> Tensor(a!)
 *
 * Only the structure needed for code generation is modelled: argument and
 * return types, alias annotations, keyword-only markers and defaults
 * (kept verbatim).
 */
import { OperatorName } from "./operator-name.js";

// ── Types ──────────────────────────────────────────────────────────────────

export const BASE_TYPES = [
  "Tensor", "Scalar", "int", "float", "bool", "str", "ScalarType", "Layout",
  "Device", "MemoryFormat", "Generator", "Dimname", "Storage", "Stream", "QScheme",
] as const;

export type BaseTy = (typeof BASE_TYPES)[number];

const BASE_TYPE_SET: ReadonlySet<string> = new Set(BASE_TYPES);

export function isBaseTy(name: string): name is BaseTy {
  return BASE_TYPE_SET.has(name);
}

export type SchemaType =
  | { readonly kind: "base"; readonly name: BaseTy }
  | { readonly kind: "optional"; readonly elem: SchemaType }
  | { readonly kind: "list"; readonly elem: SchemaType; readonly size: number | null };

/** Alias annotation: `(a)` for a view, `(a!)` for a written alias. */
export interface Annotation {
  readonly alias: string;
  readonly isWrite: boolean;
}

export interface Argument {
  readonly name: string;
  readonly type: SchemaType;
  readonly annotation?: Annotation;
  readonly default?: string;
  readonly kwargOnly: boolean;
}

export interface Return {
  readonly name?: string;
  readonly type: SchemaType;
  readonly annotation?: Annotation;
}

export type SchemaKind = "functional" | "inplace" | "out";

/** True for `Tensor`, `Tensor?`, `Tensor[]` and `Tensor?[]`. */
export function isTensorLike(type: SchemaType): boolean {
  switch (type.kind) {
    case "base": return type.name === "Tensor";
    case "optional": return isTensorLike(type.elem);
    case "list": return isTensorLike(type.elem);
  }
}

export function formatType(type: SchemaType, annotation?: Annotation): string {
  switch (type.kind) {
    case "base":
      return annotation ? `${type.name}(${annotation.alias}${annotation.isWrite ? "!" : ""})` : type.name;
    case "optional":
      return `${formatType(type.elem, annotation)}?`;
    case "list":
      return `${formatType(type.elem, annotation)}[${type.size ?? ""}]`;
  }
}

// ── Parsing helpers ────────────────────────────────────────────────────────

const TYPE_PATTERN = /^([A-Za-z]\w*)(?:\(([a-z][a-z0-9]*)(!?)\))?(\?)?(?:\[(\d*)\])?(\?)?$/;
const ARGUMENT_PATTERN = /^(\S+)\s+([A-Za-z_]\w*)(?:=(.+))?$/;
const RETURN_PATTERN = /^(\S+)(?:\s+([A-Za-z_]\w*))?$/;

function parseType(text: string): { type: SchemaType; annotation?: Annotation } {
  const m = TYPE_PATTERN.exec(text);
  if (!m) {
    throw new Error(`Unsupported type "${text}"`);
  }
  const [, base, alias, bang, elemOptional, listSize, listOptional] = m;
  if (!isBaseTy(base)) {
    throw new Error(`Unknown base type "${base}" in "${text}"`);
  }
  let type: SchemaType = { kind: "base", name: base };
  if (elemOptional) type = { kind: "optional", elem: type };
  if (listSize !== undefined) {
    type = { kind: "list", elem: type, size: listSize === "" ? null : Number(listSize) };
  }
  if (listOptional) type = { kind: "optional", elem: type };
  const annotation = alias ? { alias, isWrite: bang === "!" } : undefined;
  return annotation ? { type, annotation } : { type };
}

/** Split on commas that are not nested inside brackets or parentheses. */
function splitTopLevel(text: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "(" || ch === "[") depth++;
    else if (ch === ")" || ch === "]") depth--;
    else if (ch === "," && depth === 0) {
      parts.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }
  const last = text.slice(start).trim();
  if (last.length > 0 || parts.length > 0) parts.push(last);
  return parts;
}

function parseArguments(text: string): Argument[] {
  const args: Argument[] = [];
  let kwargOnly = false;
  for (const part of splitTopLevel(text)) {
    if (part === "*") {
      kwargOnly = true;
      continue;
    }
    const m = ARGUMENT_PATTERN.exec(part);
    if (!m) {
      throw new Error(`Malformed argument "${part}"`);
    }
    const [, typeText, name, defaultValue] = m;
    const { type, annotation } = parseType(typeText);
    args.push({
      name,
      type,
      kwargOnly,
      ...(annotation ? { annotation } : {}),
      ...(defaultValue !== undefined ? { default: defaultValue } : {}),
    });
  }
  return args;
}

function parseReturns(text: string): Return[] {
  const inner = text.startsWith("(") && text.endsWith(")") ? text.slice(1, -1) : text;
  return splitTopLevel(inner).map((part) => {
    const m = RETURN_PATTERN.exec(part);
    if (!m) {
      throw new Error(`Malformed return "${part}"`);
    }
    const [, typeText, name] = m;
    const { type, annotation } = parseType(typeText);
    return {
      type,
      ...(name !== undefined ? { name } : {}),
      ...(annotation ? { annotation } : {}),
    };
  });
}

function formatArgument(a: Argument): string {
  const text = `${formatType(a.type, a.annotation)} ${a.name}`;
  return a.default !== undefined ? `${text}=${a.default}` : text;
}

function formatReturn(r: Return): string {
  const text = formatType(r.type, r.annotation);
  return r.name !== undefined ? `${text} ${r.name}` : text;
}

// ── FunctionSchema ─────────────────────────────────────────────────────────

export class FunctionSchema {
  readonly arguments: readonly Argument[];

  constructor(
    readonly name: OperatorName,
    args: readonly Argument[],
    readonly returns: readonly Return[],
  ) {
    this.arguments = args;
    if (name.name.inplace && this.outArguments.length > 0) {
      throw new Error(`Schema "${name}" cannot be both in-place and out`);
    }
  }

  static parse(text: string): FunctionSchema {
    const src = text.trim();
    const open = src.indexOf("(");
    if (open <= 0) {
      throw new Error(`Malformed schema "${text}": missing argument list`);
    }
    let depth = 0;
    let close = -1;
    for (let i = open; i < src.length; i++) {
      if (src[i] === "(") depth++;
      else if (src[i] === ")" && --depth === 0) {
        close = i;
        break;
      }
    }
    if (close < 0) {
      throw new Error(`Malformed schema "${text}": unbalanced parentheses`);
    }
    const rest = src.slice(close + 1).trim();
    if (!rest.startsWith("->")) {
      throw new Error(`Malformed schema "${text}": missing "->"`);
    }
    return new FunctionSchema(
      OperatorName.parse(src.slice(0, open)),
      parseArguments(src.slice(open + 1, close)),
      parseReturns(rest.slice(2).trim()),
    );
  }

  /** Keyword-only arguments written by the operator. */
  get outArguments(): readonly Argument[] {
    return this.arguments.filter((a) => a.kwargOnly && a.annotation?.isWrite === true);
  }

  isOutFn(): boolean {
    return this.outArguments.length > 0;
  }

  kind(): SchemaKind {
    if (this.name.name.inplace) return "inplace";
    if (this.isOutFn()) return "out";
    return "functional";
  }

  /**
   * The schema shared by all variants of one operator: no overload, no
   * in-place marker, no out arguments and no alias annotations.
   */
  signature(): FunctionSchema {
    const outNames = new Set(this.outArguments.map((a) => a.name));
    return new FunctionSchema(
      new OperatorName(this.name.name.functional(), ""),
      this.arguments
        .filter((a) => !outNames.has(a.name))
        .map(({ annotation: _annotation, ...rest }) => rest),
      this.returns.map(({ annotation: _annotation, ...rest }) => rest),
    );
  }

  toString(): string {
    const parts: string[] = [];
    let kwargs = false;
    for (const a of this.arguments) {
      if (a.kwargOnly && !kwargs) {
        parts.push("*");
        kwargs = true;
      }
      parts.push(formatArgument(a));
    }
    const returns = this.returns.length === 1 && this.returns[0].name === undefined
      ? formatReturn(this.returns[0])
      : `(${this.returns.map(formatReturn).join(", ")})`;
    return `${this.name}(${parts.join(", ")}) -> ${returns}`;
  }
}
