/**
 * Index policy for out-of-tree backends.
 *
 * A backend registered from a manifest implements functional variants as its
 * group primaries, never structured kernels, and lives outside the runtime.
 */
export interface BackendPolicy {
  readonly useOutAsPrimary: boolean;
  readonly structured: boolean;
  readonly external: boolean;
}

export const EXTERNAL_BACKEND_POLICY = {
  useOutAsPrimary: false,
  structured: false,
  external: true,
} as const satisfies BackendPolicy;
