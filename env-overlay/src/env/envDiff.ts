import type { BaseEnvironmentSnapshot } from "./baseSnapshot.js";

export type EnvChange =
  | { readonly name: string; readonly op: "set"; readonly value: string }
  | { readonly name: string; readonly op: "unset" };

/** Ordered changes relative to one base snapshot. Names are unique. */
export type EnvironmentDiff = {
  readonly changes: readonly EnvChange[];
};

export type EnvRecord = Record<string, string>;

export function createDiff(changes: Iterable<EnvChange>): EnvironmentDiff {
  const byName = new Map<string, EnvChange>();
  for (const change of changes) {
    // later entries win but keep the position of the first occurrence
    byName.set(change.name, Object.freeze({ ...change }));
  }
  return Object.freeze({ changes: Object.freeze([...byName.values()]) });
}

/**
 * Delta between `base` and a complete resulting environment. Variables present
 * in `base` but missing from `result` become unsets.
 */
export function diffEnvironments(base: BaseEnvironmentSnapshot, result: EnvRecord): EnvironmentDiff {
  const changes: EnvChange[] = [];
  for (const [name, value] of Object.entries(result)) {
    if (base.values.get(name) !== value) changes.push({ name, op: "set", value });
  }
  for (const [name] of base.pairs) {
    if (!Object.hasOwn(result, name)) changes.push({ name, op: "unset" });
  }
  return createDiff(changes);
}

/**
 * Delta from a partial update where `null` means unset. Entries that would not
 * change `base` are dropped.
 */
export function diffFromUpdates(
  base: BaseEnvironmentSnapshot,
  updates: Record<string, string | null>,
): EnvironmentDiff {
  const changes: EnvChange[] = [];
  for (const [name, value] of Object.entries(updates)) {
    if (value === null) {
      if (base.values.has(name)) changes.push({ name, op: "unset" });
    } else if (base.values.get(name) !== value) {
      changes.push({ name, op: "set", value });
    }
  }
  return createDiff(changes);
}

export function applyDiff(base: BaseEnvironmentSnapshot, diff: EnvironmentDiff | undefined): EnvRecord {
  const out: EnvRecord = Object.fromEntries(base.pairs);
  if (!diff) return out;
  for (const change of diff.changes) {
    if (change.op === "set") out[change.name] = change.value;
    else delete out[change.name];
  }
  return out;
}

export function diffsEqual(a: EnvironmentDiff | undefined, b: EnvironmentDiff | undefined): boolean {
  if (a === b) return true;
  if (!a || !b || a.changes.length !== b.changes.length) return false;
  return a.changes.every((change, i) => {
    const other = b.changes[i];
    if (!other || other.name !== change.name || other.op !== change.op) return false;
    return change.op === "unset" || (other.op === "set" && other.value === change.value);
  });
}

export function formatDiff(diff: EnvironmentDiff): string[] {
  return diff.changes.map((c) => (c.op === "set" ? `+${c.name}=${c.value}` : `-${c.name}`));
}
