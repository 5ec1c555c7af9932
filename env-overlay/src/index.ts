import { DirectoryCache } from "./cache/directoryCache.js";
import { createKeyResolver, type KeyResolver } from "./cache/directoryKey.js";
import type { EnvOverlayConfig } from "./config.js";
import type { EnvSource } from "./env/baseSnapshot.js";
import { ContextBindings } from "./context/contextBindings.js";
import { CommandLoaderInvoker, type LoaderInvoker } from "./loader/loaderInvoker.js";
import type { ProcessRunner } from "./loader/spawnCapture.js";
import { silentLog, type LoggerFn } from "./logger.js";

export type EnvOverlay = {
  cache: DirectoryCache;
  bindings: ContextBindings;
};

export type CreateEnvOverlayOpts = {
  config: EnvOverlayConfig;
  log?: LoggerFn;
  envSource?: EnvSource;
  runner?: ProcessRunner;
  invoker?: LoaderInvoker;
  resolveKey?: KeyResolver;
};

export function createEnvOverlay(opts: CreateEnvOverlayOpts): EnvOverlay {
  const log = opts.log ?? silentLog;
  const invoker =
    opts.invoker ?? new CommandLoaderInvoker({ config: opts.config.loader, log, runner: opts.runner });
  const cache = new DirectoryCache({
    invoker,
    log,
    envSource: opts.envSource,
    timeoutMs: opts.config.loader.timeout_ms,
  });
  const bindings = new ContextBindings({
    cache,
    resolveKey: opts.resolveKey ?? createKeyResolver(opts.config.config_files),
    log,
  });
  return { cache, bindings };
}

export { DirectoryCache, type CacheEntry } from "./cache/directoryCache.js";
export { canonicalDirectory, findConfigDirectory, type DirectoryKey, type KeyResolver } from "./cache/directoryKey.js";
export { loadConfig, resolveConfig, type EnvOverlayConfig, type LoaderConfig } from "./config.js";
export {
  ContextBindings,
  type ContextBinding,
  type StatusChange,
  type StatusListener,
} from "./context/contextBindings.js";
export {
  captureSnapshot,
  snapshotFromRecord,
  snapshotsEqual,
  type BaseEnvironmentSnapshot,
  type EnvSource,
} from "./env/baseSnapshot.js";
export {
  applyDiff,
  createDiff,
  diffEnvironments,
  diffFromUpdates,
  type EnvChange,
  type EnvironmentDiff,
  type EnvRecord,
} from "./env/envDiff.js";
export { EnvOverlayError, type EnvOverlayErrorCode } from "./errors.js";
export {
  CommandLoaderInvoker,
  type LoaderInvoker,
  type LoaderMode,
  type LoaderOutcome,
  type LoaderResult,
} from "./loader/loaderInvoker.js";
export type { CaptureResult, ProcessRunner } from "./loader/spawnCapture.js";
export { createLogger, toLoggerFn, type LoggerFn } from "./logger.js";
export type { BindingState, EnvStatus } from "./status/statusMachine.js";
