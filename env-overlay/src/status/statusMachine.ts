import type { CacheEntry } from "../cache/directoryCache.js";
import type { EnvironmentDiff } from "../env/envDiff.js";

export type EnvStatus = "none" | "on" | "error";

export type BindingState = Readonly<{
  status: EnvStatus;
  appliedDiff: EnvironmentDiff | undefined;
  message: string | undefined;
}>;

export const INITIAL_STATE: BindingState = Object.freeze({
  status: "none",
  appliedDiff: undefined,
  message: undefined,
});

/**
 * State of a binding after adopting `entry`, whatever it was before. A null
 * entry means no loader configuration was found for the binding's directory.
 *
 * The overlay is replaced wholesale, never patched: keys applied before and
 * missing from the new diff are gone, and `error` keeps no overlay at all.
 */
export function adopt(entry: CacheEntry | null): BindingState {
  if (!entry) return INITIAL_STATE;

  switch (entry.outcome.kind) {
    case "no_change":
      return INITIAL_STATE;
    case "success":
      return Object.freeze({ status: "on", appliedDiff: entry.diff, message: undefined });
    case "denied":
    case "error":
      return Object.freeze({ status: "error", appliedDiff: undefined, message: entry.outcome.message });
  }
}
