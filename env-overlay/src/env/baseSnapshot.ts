export type EnvSource = () => Record<string, string | undefined>;

/**
 * Immutable copy of the base environment. `text` is the serialized form used
 * for equality; pairs are sorted by name so insertion order of the source
 * does not matter.
 */
export type BaseEnvironmentSnapshot = {
  readonly pairs: ReadonlyArray<readonly [string, string]>;
  readonly values: ReadonlyMap<string, string>;
  readonly text: string;
};

export const processEnvSource: EnvSource = () => process.env;

export function captureSnapshot(source: EnvSource = processEnvSource): BaseEnvironmentSnapshot {
  // one pass over the source, so a concurrently mutated object is read once
  const raw = Object.entries({ ...source() });
  const pairs: Array<readonly [string, string]> = [];
  for (const [name, value] of raw) {
    if (typeof value !== "string") continue;
    pairs.push(Object.freeze([name, value] as const));
  }
  pairs.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  return Object.freeze({
    pairs: Object.freeze(pairs),
    values: new Map(pairs),
    text: pairs.map(([name, value]) => `${name}=${value}`).join("\0"),
  });
}

export function snapshotFromRecord(env: Record<string, string | undefined>): BaseEnvironmentSnapshot {
  return captureSnapshot(() => env);
}

export function snapshotsEqual(a: BaseEnvironmentSnapshot, b: BaseEnvironmentSnapshot): boolean {
  return a === b || a.text === b.text;
}

export function snapshotToRecord(snapshot: BaseEnvironmentSnapshot): Record<string, string> {
  return Object.fromEntries(snapshot.pairs);
}
