import { setTimeout as delay } from "node:timers/promises";

import {
  captureSnapshot,
  processEnvSource,
  snapshotsEqual,
  type BaseEnvironmentSnapshot,
  type EnvSource,
} from "../env/baseSnapshot.js";
import type { EnvironmentDiff } from "../env/envDiff.js";
import { errorMessage } from "../errors.js";
import type { LoaderInvoker, LoaderMode, LoaderOutcome, LoaderResult } from "../loader/loaderInvoker.js";
import type { LoggerFn } from "../logger.js";
import type { DirectoryKey } from "./directoryKey.js";

export type CacheEntry = Readonly<{
  key: DirectoryKey;
  baseSnapshot: BaseEnvironmentSnapshot;
  outcome: LoaderOutcome;
  /** present iff outcome is success */
  diff: EnvironmentDiff | undefined;
  computedAt: number;
}>;

type InFlight = {
  mode: LoaderMode;
  promise: Promise<CacheEntry>;
};

export class DirectoryCache {
  private readonly entries = new Map<DirectoryKey, CacheEntry>();
  private readonly inflight = new Map<DirectoryKey, InFlight>();
  private readonly tails = new Map<DirectoryKey, Promise<void>>();
  private readonly envSource: EnvSource;
  private clock = 0;

  constructor(
    private readonly opts: {
      invoker: LoaderInvoker;
      log: LoggerFn;
      envSource?: EnvSource;
      /** how long callers wait for the loader; 0 or unset waits forever */
      timeoutMs?: number;
    },
  ) {
    this.envSource = opts.envSource ?? processEnvSource;
  }

  currentBase(): BaseEnvironmentSnapshot {
    return captureSnapshot(this.envSource);
  }

  peek(key: DirectoryKey): CacheEntry | null {
    return this.entries.get(key) ?? null;
  }

  async lookup(key: DirectoryKey): Promise<CacheEntry> {
    const pending = this.inflight.get(key);
    if (pending) return await this.awaitWork(key, pending.promise);

    const hit = this.entries.get(key);
    if (hit && snapshotsEqual(hit.baseSnapshot, this.currentBase())) return hit;

    this.opts.log("directory cache miss", { key, reason: hit ? "base changed" : "absent" });
    return await this.refresh(key, "query");
  }

  /** Always invokes the loader. Work for one key runs one at a time. */
  refresh(key: DirectoryKey, mode: LoaderMode): Promise<CacheEntry> {
    const pending = this.inflight.get(key);
    if (pending && pending.mode === "query" && mode === "query") return this.awaitWork(key, pending.promise);

    const prev = this.tails.get(key) ?? Promise.resolve();
    const token: InFlight = { mode, promise: prev.then(() => this.compute(key, mode, token)) };
    this.inflight.set(key, token);
    this.tails.set(
      key,
      token.promise.then(
        () => {},
        () => {},
      ),
    );
    return this.awaitWork(key, token.promise);
  }

  invalidate(key: DirectoryKey): void {
    this.entries.delete(key);
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  keys(): DirectoryKey[] {
    return [...this.entries.keys()];
  }

  /**
   * The per-key queue always chains on the real loader run, so a caller that
   * stops waiting never lets a second process start for the same key. The
   * late result is still stored when it arrives.
   */
  private async awaitWork(key: DirectoryKey, work: Promise<CacheEntry>): Promise<CacheEntry> {
    const timeoutMs = this.opts.timeoutMs;
    if (!timeoutMs) return await work;

    const ac = new AbortController();
    const timedOut = delay(timeoutMs, undefined, { signal: ac.signal }).then(
      (): CacheEntry | null => {
        this.opts.log("loader wait timed out", { key, timeoutMs });
        return Object.freeze<CacheEntry>({
          key,
          baseSnapshot: this.currentBase(),
          outcome: { kind: "error", message: `loader timed out after ${timeoutMs}ms` },
          diff: undefined,
          computedAt: this.clock,
        });
      },
      (): CacheEntry | null => null,
    );
    try {
      return (await Promise.race([work, timedOut])) ?? (await work);
    } finally {
      ac.abort();
    }
  }

  private async compute(key: DirectoryKey, mode: LoaderMode, token: InFlight): Promise<CacheEntry> {
    const base = this.currentBase();
    let result: LoaderResult;
    try {
      result = await this.opts.invoker.invoke(key, mode, base);
    } catch (err) {
      result = { outcome: { kind: "error", message: errorMessage(err) } };
    }

    const entry: CacheEntry = Object.freeze({
      key,
      baseSnapshot: base,
      outcome: result.outcome,
      diff: result.diff,
      computedAt: ++this.clock,
    });
    this.entries.set(key, entry);
    if (this.inflight.get(key) === token) {
      // nothing queued behind this one
      this.inflight.delete(key);
      this.tails.delete(key);
    }
    return entry;
  }
}
