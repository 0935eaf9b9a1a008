/**
 * Generator configuration and defaults.
 */
import { DEFAULT_TEMPLATE_DIR } from "../file-manager.js";

export const LOG_LEVELS = ["debug", "info", "warn", "warning", "error"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export interface CodegenConfig {
  /** Operator registry file. */
  readonly nativeFunctions: string;
  readonly templateDir: string;
  /** Directory the three artifacts are written to. */
  readonly outputDir: string;
  /** Record file names without writing anything. */
  readonly dryRun: boolean;
  /** Kernel naming convention: a name registered in `namingRegistry`. */
  readonly naming: string;
  /** Also write the sorted list of generated files here. */
  readonly outputList?: string;
  readonly logLevel: LogLevelName;
}

export const defaultCodegenConfig: CodegenConfig = {
  nativeFunctions: "native_functions.yaml",
  templateDir: DEFAULT_TEMPLATE_DIR,
  outputDir: ".",
  dryRun: false,
  naming: "dispatcher",
  logLevel: "info",
};
