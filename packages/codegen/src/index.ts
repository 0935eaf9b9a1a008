/**
 * @stubgen/codegen -- manifest handling, backend indices, C++ rendering and
 * artifact writing for external backend stubs.
 */
export { argumentType, returnsType } from "./api/types.js";
export { DispatcherSignature, dispatcherNaming, faithfulNaming, namingRegistry } from "./api/dispatcher.js";
export type { CppArgument } from "./api/dispatcher.js";

export { EXTERNAL_BACKEND_POLICY } from "./policy.js";
export type { BackendPolicy } from "./policy.js";

export { MANIFEST_KEYS, loadBackendManifest, parseManifest, validateManifest } from "./manifest.js";
export type { BackendManifest } from "./manifest.js";
export { addBackendIndices, buildBackendIndex, nativeFunctionsByName } from "./backend-index.js";
export type { ParsedBackend } from "./backend-index.js";

export { backendDeclarations, computeNativeFunctionDeclaration } from "./dest/declarations.js";
export {
  FALLBACK_CLASS,
  fallbackArtifacts,
  genExternalFallback,
  requiresBackendWrapper,
} from "./dest/fallback.js";
export type { FallbackArtifacts, Target } from "./dest/fallback.js";

export { CodeTemplate } from "./template.js";
export { DEFAULT_TEMPLATE_DIR, FileManager } from "./file-manager.js";
export type { FileManagerOptions } from "./file-manager.js";

export { LOG_LEVELS, defaultCodegenConfig } from "./config/schema.js";
export type { CodegenConfig, LogLevelName } from "./config/schema.js";
export { loadConfigFile, resolveCodegenConfig } from "./config/load.js";

export {
  GENERATED_COMMENT,
  TEMPLATES,
  artifactNames,
  generateBackendStubs,
  runBackendStubs,
} from "./gen-backend-stubs.js";
export type { BackendStubsError, BackendStubsResult } from "./gen-backend-stubs.js";
