/**
 * Variant grouping.
 *
 * Functions sharing a signature (same base name and arguments once the
 * overload, in-place marker and out arguments are stripped) are bundled into
 * one NativeFunctionsGroup when both a functional and an out variant exist.
 * Anything else stays standalone. Output follows first-seen order.
 */
import { Effect } from "effect";
import {
  NativeFunctionsGroup,
  RegistryError,
  type GroupedNativeFunction,
  type NativeFunction,
  type SchemaKind,
} from "@stubgen/core";

function fromBucket(bucket: ReadonlyMap<SchemaKind, NativeFunction>): GroupedNativeFunction[] {
  const functional = bucket.get("functional");
  const out = bucket.get("out");
  if (bucket.size > 1 && functional && out) {
    return [new NativeFunctionsGroup(functional, out, bucket.get("inplace"))];
  }
  return [...bucket.values()];
}

export function getGroupedNativeFunctions(
  nativeFunctions: readonly NativeFunction[],
): Effect.Effect<GroupedNativeFunction[], RegistryError> {
  return Effect.try({
    try: () => {
      const buckets = new Map<string, Map<SchemaKind, NativeFunction>>();
      for (const f of nativeFunctions) {
        const key = f.func.signature().toString();
        let bucket = buckets.get(key);
        if (!bucket) {
          bucket = new Map();
          buckets.set(key, bucket);
        }
        const kind = f.func.kind();
        const existing = bucket.get(kind);
        if (existing) {
          throw new Error(`"${f.func.name}" and "${existing.func.name}" are both ${kind} variants of ${key}`);
        }
        bucket.set(kind, f);
      }
      return [...buckets.values()].flatMap(fromBucket);
    },
    catch: (cause) =>
      new RegistryError({
        message: `Failed to group native functions: ${cause instanceof Error ? cause.message : String(cause)}`,
        cause,
      }),
  });
}
