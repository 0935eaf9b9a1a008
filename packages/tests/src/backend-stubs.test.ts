import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Layer } from "effect";
import { DispatchKey } from "@stubgen/core";
import {
  FileManager,
  GENERATED_COMMENT,
  artifactNames,
  dispatcherNaming,
  generateBackendStubs,
  runBackendStubs,
  type BackendManifest,
} from "@stubgen/codegen";
import { ArtifactWriterFrom, KernelNamingFrom } from "@stubgen/effect-runtime";
import { MemoryWriter, fixture, registryFrom } from "./helpers.js";

const REGISTRY = [
  "- func: add(Tensor self, Tensor other) -> Tensor",
  "  dispatch: {CPU: add}",
  "- func: sub(Tensor self, Tensor other) -> Tensor",
  "  dispatch: {CPU: sub}",
  "- func: mul(Tensor self, Tensor other) -> Tensor",
  "  dispatch: {CPU: mul}",
].join("\n");

const FOO: BackendManifest = {
  backend: DispatchKey("Foo"),
  cppNamespace: "foo",
  supported: ["add"],
  autograd: ["sub"],
};

function decl(name: string): string {
  return `static at::Tensor ${name}(const at::Tensor & self, const at::Tensor & other);`;
}

function reg(name: string): string {
  return `m.impl("${name}", static_cast<at::Tensor (*)(const at::Tensor &, const at::Tensor &)>(&AtenTypeDefault::${name}));`;
}

function generate(manifest: BackendManifest, writer = new MemoryWriter()) {
  const services = Layer.merge(KernelNamingFrom(dispatcherNaming), ArtifactWriterFrom(writer));
  const result = Effect.runSync(generateBackendStubs(registryFrom(REGISTRY), manifest).pipe(Effect.provide(services)));
  return { result, writer };
}

describe("generateBackendStubs", () => {
  it("builds the plain and autograd indices", () => {
    const { result } = generate(FOO);
    expect(result.backendKey).toBe("Foo");
    expect(result.autogradKey).toBe("AutogradFoo");
    expect(result.cppNamespace).toBe("foo");
    expect([...(result.backendIndices.get(DispatchKey("Foo"))?.index.keys() ?? [])]).toEqual(["add"]);
    expect([...(result.backendIndices.get(DispatchKey("AutogradFoo"))?.index.keys() ?? [])]).toEqual(["sub"]);
    expect(result.backendIndices.keys()).toEqual(["CPU", "Foo", "AutogradFoo"]);
  });

  it("writes the three artifacts", () => {
    const { result, writer } = generate(FOO);
    expect(result.written).toEqual(["aten_foo_type.h", "aten_foo_type_default.h", "aten_foo_type_default.cpp"]);
    expect(writer.filenames).toEqual(result.written);
    expect(artifactNames("Foo").backendHeader).toBe("aten_foo_type.h");
  });

  it("declares the backend's kernels", () => {
    const { writer } = generate(FOO);
    expect(writer.envs.get("aten_foo_type.h")?.dispatch_foo_declarations).toEqual([decl("add"), decl("sub")]);
    expect(writer.files.get("aten_foo_type.h")).toBe(
      [
        "#pragma once",
        "",
        `// ${GENERATED_COMMENT}`,
        "",
        "#include <ATen/Tensor.h>",
        "",
        "namespace foo {",
        "",
        "class AtenBackendType {",
        " public:",
        `  ${decl("add")}`,
        `  ${decl("sub")}`,
        "};",
        "",
        "}  // namespace foo",
        "",
      ].join("\n"),
    );
  });

  it("lower-cases the backend in the declarations key", () => {
    const { writer } = generate({ ...FOO, backend: DispatchKey("XLA"), cppNamespace: "torch_xla" });
    const env = writer.envs.get("aten_xla_type.h");
    expect(env?.dispatch_xla_declarations).toEqual([decl("add"), decl("sub")]);
    expect(env?.dispatch_XLA_declarations).toBeUndefined();
  });

  it("covers every operator exactly once in the fallback declarations", () => {
    const { writer } = generate(FOO);
    expect(writer.envs.get("aten_foo_type_default.h")?.dispatch_aten_fallback_declarations).toEqual([
      decl("sub"),
      decl("mul"),
      decl("add"),
    ]);
    expect(writer.envs.get("aten_foo_type_default.cpp")?.dispatch_aten_fallback_definitions).toHaveLength(3);
  });

  it("keeps plain and autograd registrations separate", () => {
    const { writer } = generate(FOO);
    const env = writer.envs.get("aten_foo_type_default.cpp");
    expect(env?.dispatch_registrations).toEqual([reg("sub"), reg("mul")]);
    expect(env?.dispatch_autograd_registrations).toEqual([reg("add"), reg("mul")]);
  });

  it("renders the fallback source", () => {
    const { writer } = generate(FOO);
    const text = writer.files.get("aten_foo_type_default.cpp") ?? "";
    expect(text).toContain(
      [
        "void RegisterFallbacks(torch::Library & m) {",
        `  ${reg("sub")}`,
        `  ${reg("mul")}`,
        "}",
      ].join("\n"),
    );
    expect(text).toContain(
      [
        "at::Tensor AtenTypeDefault::mul(const at::Tensor & self, const at::Tensor & other) {",
        "  auto self_cpu = to_cpu(self);",
        "  auto other_cpu = to_cpu(other);",
        "  auto result = at::_ops::mul::call(self_cpu, other_cpu);",
        "  return to_device(result, self.device());",
        "}",
      ].join("\n"),
    );
  });

  it("produces byte-identical output for identical input", () => {
    const first = generate(FOO).writer.files;
    const second = generate(FOO).writer.files;
    expect([...second]).toEqual([...first]);
  });

  it("writes nothing when only one coverage list is given", () => {
    const { result, writer } = generate({ ...FOO, autograd: [] });
    expect(result.backendKey).toBe("Foo");
    expect(result.autogradKey).toBeNull();
    expect(result.written).toEqual([]);
    expect(writer.filenames).toEqual([]);
  });

  it("fails on an unknown operator without writing", () => {
    const writer = new MemoryWriter();
    const services = Layer.merge(KernelNamingFrom(dispatcherNaming), ArtifactWriterFrom(writer));
    const err = Effect.runSync(
      Effect.flip(generateBackendStubs(registryFrom(REGISTRY), { ...FOO, supported: ["div"] })).pipe(
        Effect.provide(services),
      ),
    );
    expect(err._tag).toBe("UnresolvedOperatorError");
    expect(writer.filenames).toEqual([]);
  });
});

describe("runBackendStubs", () => {
  let out: string | undefined;

  afterEach(async () => {
    if (out) await rm(out, { recursive: true, force: true });
  });

  it("generates from files on disk", async () => {
    out = await mkdtemp(join(tmpdir(), "stubgen-e2e-"));
    const files = new FileManager({ installDir: out });
    const services = Layer.merge(KernelNamingFrom(dispatcherNaming), ArtifactWriterFrom(files));
    const result = await Effect.runPromise(
      runBackendStubs(fixture("foo_backend.yaml"), fixture("native_functions.yaml")).pipe(Effect.provide(services)),
    );

    expect(result.backendKey).toBe("Foo");
    expect((await readdir(out)).sort()).toEqual([
      "aten_foo_type.h",
      "aten_foo_type_default.cpp",
      "aten_foo_type_default.h",
    ]);
    const header = await readFile(join(out, "aten_foo_type.h"), "utf-8");
    expect(header).toContain("namespace foo {");
    expect(header).toContain(
      "  static ::std::tuple<at::Tensor,at::Tensor> max(const at::Tensor & self, int64_t dim, bool keepdim);",
    );
  });
});
