/**
 * Typed error classes for every stage of a generation run.
 *
 * Every failure is fatal: a run either produces all of its artifacts or
 * none of them.
 */
import { Data } from "effect";

/** Manifest is missing a required field, carries an unknown one, or is ill-typed. */
export class ManifestSchemaError extends Data.TaggedError("ManifestSchemaError")<{
  readonly message: string;
  readonly fields: readonly string[];
  readonly cause?: unknown;
}> {}

/** A manifest lists an operator the registry does not contain. */
export class UnresolvedOperatorError extends Data.TaggedError("UnresolvedOperatorError")<{
  readonly message: string;
  readonly operator: string;
}> {}

/** A dispatch key was registered twice in one index table. */
export class DuplicateDispatchKeyError extends Data.TaggedError("DuplicateDispatchKeyError")<{
  readonly message: string;
  readonly dispatchKey: string;
}> {}

export class RegistryError extends Data.TaggedError("RegistryError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CodegenError extends Data.TaggedError("CodegenError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Errors a manifest can produce while its indices are built. */
export type ManifestError =
  | ManifestSchemaError
  | UnresolvedOperatorError
  | DuplicateDispatchKeyError;
