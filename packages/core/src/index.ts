/**
 * @stubgen/core -- data model, errors and collaborator ports shared by every
 * stubgen package.
 */
export {
  ManifestSchemaError,
  UnresolvedOperatorError,
  DuplicateDispatchKeyError,
  RegistryError,
  CodegenError,
  ConfigError,
} from "./errors.js";
export type { ManifestError } from "./errors.js";

export { BaseOperatorName, OperatorName } from "./operator-name.js";

export { BASE_TYPES, FunctionSchema, formatType, isBaseTy, isTensorLike } from "./schema.js";
export type { Annotation, Argument, BaseTy, Return, SchemaKind, SchemaType } from "./schema.js";

export { NativeFunction, NativeFunctionsGroup, functionsOf } from "./native-function.js";
export type { GroupedNativeFunction, NativeFunctionInit } from "./native-function.js";

export {
  AUTOGRAD_PREFIX,
  BackendIndex,
  BackendIndexTable,
  DispatchKey,
  autogradKeyFor,
} from "./backend.js";
export type { BackendMetadata } from "./backend.js";

export { KernelNamingService, ArtifactWriterService } from "./interfaces.js";
export type { ArtifactWriter, KernelNaming, TemplateEnv } from "./interfaces.js";

export { Registry } from "./registry.js";
export { concatMap, dedupe, orderedUnion } from "./ordered.js";
