/**
 * Operator names.
 *
 * An operator name is a base name, an in-place marker and an optional
 * overload tag: `add`, `add.Tensor`, `add_.Tensor`, `add.out`. Dunder
 * names (`__and__`, `__iand__`) are recognised; the `i` prefix of an
 * augmented-assignment dunder is the in-place marker.
 */

const AUGMENTED_ASSIGNMENT_NAMES: ReadonlySet<string> = new Set([
  "add", "sub", "mul", "div", "mod", "pow", "lshift", "rshift", "and", "xor", "or",
]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ── BaseOperatorName ───────────────────────────────────────────────────────

export class BaseOperatorName {
  constructor(
    readonly base: string,
    readonly inplace: boolean,
    readonly dunderMethod: boolean,
  ) {}

  static parse(text: string): BaseOperatorName {
    if (!IDENTIFIER.test(text)) {
      throw new Error(`Invalid operator base name: "${text}"`);
    }
    if (text.length > 4 && text.startsWith("__") && text.endsWith("__")) {
      const inner = text.slice(2, -2);
      const inplace = inner.startsWith("i") && AUGMENTED_ASSIGNMENT_NAMES.has(inner.slice(1));
      return new BaseOperatorName(inplace ? inner.slice(1) : inner, inplace, true);
    }
    const inplace = text.endsWith("_");
    const base = inplace ? text.slice(0, -1) : text;
    if (base.length === 0) {
      throw new Error(`Invalid operator base name: "${text}"`);
    }
    return new BaseOperatorName(base, inplace, false);
  }

  /** Same name with the in-place marker removed. */
  functional(): BaseOperatorName {
    return this.inplace ? new BaseOperatorName(this.base, false, this.dunderMethod) : this;
  }

  toString(): string {
    if (this.dunderMethod) {
      return `__${this.inplace ? "i" : ""}${this.base}__`;
    }
    return this.inplace ? `${this.base}_` : this.base;
  }
}

// ── OperatorName ───────────────────────────────────────────────────────────

export class OperatorName {
  constructor(
    readonly name: BaseOperatorName,
    readonly overloadName: string,
  ) {}

  /** Parse `name` or `name.overload`. Throws on malformed text. */
  static parse(text: string): OperatorName {
    const parts = text.trim().split(".");
    if (parts.length > 2) {
      throw new Error(`Invalid operator name: "${text}"`);
    }
    const [name, overload = ""] = parts;
    if (parts.length === 2 && !IDENTIFIER.test(overload)) {
      throw new Error(`Invalid overload name in operator "${text}"`);
    }
    return new OperatorName(BaseOperatorName.parse(name), overload);
  }

  /**
   * Name used by the unboxed operator entry points: the base name and the
   * overload joined by `_` (`add_Tensor`, `add__Tensor`, `add_out`).
   */
  unambiguousName(): string {
    return this.overloadName ? `${this.name}_${this.overloadName}` : `${this.name}`;
  }

  toString(): string {
    return this.overloadName ? `${this.name}.${this.overloadName}` : `${this.name}`;
  }
}
