import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { FileManager } from "@stubgen/codegen";

describe("FileManager", () => {
  let root: string;
  let templates: string;
  let out: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "stubgen-fm-"));
    templates = join(root, "templates");
    out = join(root, "out");
    await mkdir(templates);
    await writeFile(join(templates, "a.h"), "// ${generated_comment}\nnamespace ${ns} {}\n");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("renders a template into the install directory", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates });
    await Effect.runPromise(fm.writeWithTemplate("foo.h", "a.h", { ns: "foo" }));
    expect(await readFile(join(out, "foo.h"), "utf-8")).toBe("// @generated by stubgen from a.h\nnamespace foo {}\n");
    expect(fm.filenames).toEqual([join(out, "foo.h")]);
  });

  it("keeps a caller-supplied generated_comment", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates });
    await Effect.runPromise(fm.writeWithTemplate("foo.h", "a.h", { ns: "foo", generated_comment: "custom" }));
    expect(await readFile(join(out, "foo.h"), "utf-8")).toBe("// custom\nnamespace foo {}\n");
  });

  it("does not rewrite unchanged files", async () => {
    await Effect.runPromise(
      new FileManager({ installDir: out, templateDir: templates }).writeWithTemplate("a.h", "a.h", { ns: "foo" }),
    );
    const before = (await stat(join(out, "a.h"))).mtimeMs;
    await new Promise((resolve) => setTimeout(resolve, 20));
    await Effect.runPromise(
      new FileManager({ installDir: out, templateDir: templates }).writeWithTemplate("a.h", "a.h", { ns: "foo" }),
    );
    expect((await stat(join(out, "a.h"))).mtimeMs).toBe(before);
  });

  it("rejects a second write of the same file", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates });
    await Effect.runPromise(fm.writeWithTemplate("a.h", "a.h", { ns: "foo" }));
    const err = await Effect.runPromise(Effect.flip(fm.writeWithTemplate("a.h", "a.h", { ns: "bar" })));
    expect(err._tag).toBe("CodegenError");
    expect(err.message).toBe(`Duplicate file write: ${join(out, "a.h")}`);
  });

  it("records names without writing on a dry run", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates, dryRun: true });
    await Effect.runPromise(fm.writeWithTemplate("foo.h", "a.h", { ns: "foo" }));
    expect(fm.filenames).toEqual([join(out, "foo.h")]);
    await expect(stat(out)).rejects.toThrow();
  });

  it("fails on a missing template key", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates });
    const err = await Effect.runPromise(Effect.flip(fm.writeWithTemplate("foo.h", "a.h", {})));
    expect(err.message).toBe(`${join(templates, "a.h")}: no value for template key "ns"`);
  });

  it("fails on a missing template", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates });
    const err = await Effect.runPromise(Effect.flip(fm.writeWithTemplate("foo.h", "nope.h", {})));
    expect(err.message.startsWith(`Failed to read template "${join(templates, "nope.h")}"`)).toBe(true);
  });

  it("writes the sorted output list", async () => {
    const fm = new FileManager({ installDir: out, templateDir: templates });
    await Effect.runPromise(fm.writeWithTemplate("z.h", "a.h", { ns: "z" }));
    await Effect.runPromise(fm.writeWithTemplate("b.h", "a.h", { ns: "b" }));
    const list = join(root, "outputs.txt");
    await Effect.runPromise(fm.writeOutputs(list));
    expect(await readFile(list, "utf-8")).toBe(`${join(out, "b.h")};\n${join(out, "z.h")};\n`);
  });
});
