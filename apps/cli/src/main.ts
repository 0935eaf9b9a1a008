#!/usr/bin/env -S node --import tsx
/**
 * stubgen CLI: the main entry point.
 *
 * Commands: backend-stubs, validate-manifest
 */
import { backendStubsCmd } from "./commands/backend-stubs.js";
import { validateManifestCmd } from "./commands/validate-manifest.js";
import { listImplementations } from "./resolve.js";

const USAGE = `
stubgen - external backend stub generator

Commands:
  backend-stubs      Generate kernel declarations, CPU fallbacks and registrations
  validate-manifest  Check a backend manifest against the operator registry

Options:
  --source=PATH      Backend manifest (YAML)            [required]
  --native=PATH      Operator registry                  [native_functions.yaml]
  --out=DIR          Output directory                   [.]
  --templates=DIR    Template directory                 [bundled templates]
  --naming=NAME      Kernel naming convention           [dispatcher]
  --dryRun           List the files without writing them
  --outputList=PATH  Also write the sorted list of generated files
  --config=PATH      JSON config file (flags override it)
  --logLevel=LEVEL   debug | info | warn | error        [info]
  --help, -h         Show this help

Examples:
  stubgen backend-stubs --source=xla_native_functions.yaml --native=native_functions.yaml --out=generated
  stubgen validate-manifest --source=xla_native_functions.yaml --native=native_functions.yaml
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    console.log();
    console.log(listImplementations());
    process.exit(0);
  }

  const command = args[0];

  if (command === "backend-stubs") {
    await backendStubsCmd(args.slice(1));
  } else if (command === "validate-manifest") {
    await validateManifestCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
