/**
 * Code templates with `$key` / `${key}` placeholders.
 *
 * A placeholder alone on its line expands a list one entry per line, each
 * line carrying the placeholder's indentation. Inline, list entries are
 * joined with ", "; `${,key}` and `${key,}` add a leading or trailing comma
 * when the list is non-empty.
 */
import type { TemplateEnv } from "@stubgen/core";

const KEY = String.raw`\$([A-Za-z_][A-Za-z0-9_]*|\{,?[A-Za-z_][A-Za-z0-9_]*,?\})`;
const SUBSTITUTION = new RegExp(String.raw`^([^\S\n]*)${KEY}(?=[^\S\n]*$)|${KEY}`, "gm");

function splitLines(text: string): string[] {
  if (text === "") return [];
  return (text.endsWith("\n") ? text.slice(0, -1) : text).split("\n");
}

function indentLines(indent: string, values: readonly string[]): string {
  return values
    .flatMap(splitLines)
    .map((line) => `${indent}${line}\n`)
    .join("")
    .trimEnd();
}

export class CodeTemplate {
  constructor(
    readonly pattern: string,
    readonly filename = "<template>",
  ) {}

  /** Throws when the template names a key `env` lacks. */
  substitute(env: TemplateEnv): string {
    return this.pattern.replace(SUBSTITUTION, (match: string, indent?: string, block?: string, inline?: string) => {
      let key = block ?? inline ?? match;
      let comma = "";
      if (key.startsWith("{")) {
        key = key.slice(1, -1);
        if (key.startsWith(",")) {
          comma = "before";
          key = key.slice(1);
        } else if (key.endsWith(",")) {
          comma = "after";
          key = key.slice(0, -1);
        }
      }
      const value = env[key];
      if (value === undefined) {
        throw new Error(`${this.filename}: no value for template key "${key}"`);
      }
      if (indent !== undefined) {
        return indentLines(indent, typeof value === "string" ? [value] : value);
      }
      if (typeof value === "string") return value;
      const joined = value.join(", ");
      if (joined === "" || comma === "") return joined;
      return comma === "before" ? `, ${joined}` : `${joined}, `;
    });
  }
}
