import type { CacheEntry, DirectoryCache } from "../cache/directoryCache.js";
import type { DirectoryKey, KeyResolver } from "../cache/directoryKey.js";
import { applyDiff, diffsEqual, type EnvRecord, type EnvironmentDiff } from "../env/envDiff.js";
import { EnvOverlayError } from "../errors.js";
import type { LoaderMode } from "../loader/loaderInvoker.js";
import type { LoggerFn } from "../logger.js";
import { adopt, INITIAL_STATE, type BindingState, type EnvStatus } from "../status/statusMachine.js";

export type ContextBinding = Readonly<{
  contextId: string;
  directory: string;
  /** null when no loader configuration exists at or above `directory` */
  directoryKey: DirectoryKey | null;
  state: BindingState;
}>;

export type StatusChange = {
  contextId: string;
  previous: EnvStatus;
  status: EnvStatus;
};

export type StatusListener = (change: StatusChange) => void;

type Slot = {
  binding: ContextBinding;
  opQueue: Promise<void>;
};

function validateContextId(v: unknown): string {
  const id = String(v ?? "").trim();
  if (!id) throw new EnvOverlayError("INVALID_CONTEXT_ID", "context id is empty");
  return id;
}

export class ContextBindings {
  private readonly slots = new Map<string, Slot>();
  private readonly listeners = new Set<StatusListener>();

  constructor(
    private readonly opts: {
      cache: DirectoryCache;
      resolveKey: KeyResolver;
      log: LoggerFn;
    },
  ) {}

  async bind(contextId: string, directory: string): Promise<EnvStatus> {
    const id = validateContextId(contextId);
    const existing = this.slots.get(id);
    const slot: Slot = existing ?? {
      binding: { contextId: id, directory, directoryKey: null, state: INITIAL_STATE },
      opQueue: Promise.resolve(),
    };
    this.slots.set(id, slot);

    return await this.enqueue(slot, async () => {
      const directoryKey = await this.opts.resolveKey(directory);
      const entry = directoryKey ? await this.opts.cache.lookup(directoryKey) : null;
      return this.adoptInto(slot, { directory, directoryKey }, entry);
    });
  }

  async allow(contextId: string): Promise<EnvStatus> {
    return await this.refreshFor(contextId, "allow");
  }

  async deny(contextId: string): Promise<EnvStatus> {
    return await this.refreshFor(contextId, "deny");
  }

  async reload(contextId: string): Promise<EnvStatus> {
    return await this.refreshFor(contextId, "query");
  }

  /** Drops every cached entry and re-adopts for each bound context. */
  async reloadAll(): Promise<Map<string, EnvStatus>> {
    this.opts.cache.invalidateAll();
    const ids = [...this.slots.keys()];
    const statuses = await Promise.all(
      ids.map(async (id) => {
        const slot = this.requireSlot(id);
        const status = await this.enqueue(slot, async () => {
          const { directory } = slot.binding;
          const directoryKey = slot.binding.directoryKey ?? (await this.opts.resolveKey(directory));
          const entry = directoryKey ? await this.opts.cache.lookup(directoryKey) : null;
          return this.adoptInto(slot, { directory, directoryKey }, entry);
        });
        return [id, status] as const;
      }),
    );
    return new Map(statuses);
  }

  unbind(contextId: string): void {
    const id = validateContextId(contextId);
    if (!this.slots.delete(id)) return;
    this.opts.log("context unbound", { contextId: id });
  }

  status(contextId: string): EnvStatus {
    return this.requireSlot(contextId).binding.state.status;
  }

  message(contextId: string): string | undefined {
    return this.requireSlot(contextId).binding.state.message;
  }

  appliedDiff(contextId: string): EnvironmentDiff | undefined {
    return this.requireSlot(contextId).binding.state.appliedDiff;
  }

  /** Effective environment: the current base with this context's overlay on top. */
  environment(contextId: string): EnvRecord {
    const { state } = this.requireSlot(contextId).binding;
    return applyDiff(this.opts.cache.currentBase(), state.appliedDiff);
  }

  get(contextId: string): ContextBinding | null {
    return this.slots.get(contextId)?.binding ?? null;
  }

  bindings(): ContextBinding[] {
    return [...this.slots.values()].map((s) => s.binding);
  }

  onStatusChange(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async refreshFor(contextId: string, mode: LoaderMode): Promise<EnvStatus> {
    const slot = this.requireSlot(contextId);
    return await this.enqueue(slot, async () => {
      const { directory } = slot.binding;
      // a config file may have appeared since bind
      const directoryKey = slot.binding.directoryKey ?? (await this.opts.resolveKey(directory));
      const entry = directoryKey ? await this.opts.cache.refresh(directoryKey, mode) : null;
      return this.adoptInto(slot, { directory, directoryKey }, entry);
    });
  }

  private adoptInto(
    slot: Slot,
    target: { directory: string; directoryKey: DirectoryKey | null },
    entry: CacheEntry | null,
  ): EnvStatus {
    const { contextId } = slot.binding;
    // unbound while the loader was running
    if (this.slots.get(contextId) !== slot) return slot.binding.state.status;

    const before = slot.binding.state;
    const previous = before.status;
    const state = adopt(entry);
    slot.binding = Object.freeze({ contextId, ...target, state });

    this.opts.log("context adopted", {
      contextId,
      key: target.directoryKey,
      status: state.status,
      overlayChanged: !diffsEqual(before.appliedDiff, state.appliedDiff),
      computedAt: entry?.computedAt,
    });
    if (previous !== state.status) this.emit({ contextId, previous, status: state.status });
    return state.status;
  }

  private emit(change: StatusChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        this.opts.log("status listener failed", { contextId: change.contextId, err: String(err) });
      }
    }
  }

  private requireSlot(contextId: string): Slot {
    const id = validateContextId(contextId);
    const slot = this.slots.get(id);
    if (!slot) throw new EnvOverlayError("CONTEXT_NOT_BOUND", `context not bound: ${id}`);
    return slot;
  }

  private enqueue<T>(slot: Slot, task: () => Promise<T>): Promise<T> {
    const next = slot.opQueue.then(task, task);
    slot.opQueue = next.then(
      () => {},
      () => {},
    );
    return next;
  }
}
