/**
 * Effect layers for the generator's service ports.
 */
import { Effect, Layer } from "effect";
import {
  ArtifactWriterService,
  KernelNamingService,
  type ArtifactWriter,
  type ConfigError,
  type KernelNaming,
} from "@stubgen/core";
import { namingRegistry } from "@stubgen/codegen";

// ── Kernel naming ──────────────────────────────────────────────────────────

export const KernelNamingFrom = (naming: KernelNaming) =>
  Layer.succeed(KernelNamingService, naming);

/** Naming convention looked up by name in `namingRegistry`. */
export const KernelNamingLive = (name: string): Layer.Layer<KernelNamingService, ConfigError> =>
  Layer.effect(
    KernelNamingService,
    namingRegistry.get(name).pipe(Effect.tap((n) => Effect.logDebug(`Kernel naming: ${n.name}`))),
  );

// ── Artifact writer ────────────────────────────────────────────────────────

export const ArtifactWriterFrom = (writer: ArtifactWriter) =>
  Layer.succeed(ArtifactWriterService, writer);
