import type { LoaderConfig } from "../config.js";
import { snapshotToRecord, type BaseEnvironmentSnapshot } from "../env/baseSnapshot.js";
import type { EnvironmentDiff } from "../env/envDiff.js";
import { errorMessage } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import { parseLoaderOutput } from "./parseLoaderOutput.js";
import { spawnCapture, type CaptureResult, type ProcessRunner } from "./spawnCapture.js";

export type LoaderMode = "query" | "allow" | "deny";

export type LoaderOutcome =
  | { kind: "success" }
  | { kind: "no_change" }
  | { kind: "denied"; message: string }
  | { kind: "error"; message: string };

export type LoaderResult =
  | { outcome: { kind: "success" }; diff: EnvironmentDiff }
  | { outcome: Exclude<LoaderOutcome, { kind: "success" }>; diff?: undefined };

export interface LoaderInvoker {
  invoke(directory: string, mode: LoaderMode, base: BaseEnvironmentSnapshot): Promise<LoaderResult>;
}

function diagnostic(run: CaptureResult): string {
  if (run.spawnError) return run.spawnError;
  if (run.stderr.trim()) return run.stderr;
  if (run.stdout.trim()) return run.stdout;
  return `loader exited with code ${run.code ?? "null"}`;
}

export class CommandLoaderInvoker implements LoaderInvoker {
  private readonly run: ProcessRunner;
  private readonly deniedPattern: RegExp;

  constructor(
    private readonly opts: {
      config: LoaderConfig;
      log: LoggerFn;
      runner?: ProcessRunner;
    },
  ) {
    this.run = opts.runner ?? spawnCapture;
    this.deniedPattern = new RegExp(opts.config.denied_pattern, "i");
  }

  async invoke(directory: string, mode: LoaderMode, base: BaseEnvironmentSnapshot): Promise<LoaderResult> {
    const env = snapshotToRecord(base);
    const cfg = this.opts.config;
    const [cmd, ...prefix] = cfg.command;

    if (mode !== "query") {
      const trustArgs = [...prefix, ...(mode === "allow" ? cfg.allow_args : cfg.deny_args), directory];
      this.opts.log("loader trust", { cmd, args: trustArgs, cwd: directory, mode });
      const trust = await this.runSafely(cmd, trustArgs, directory, env);
      if (trust.spawnError || trust.code !== 0) {
        return { outcome: { kind: "error", message: diagnostic(trust) } };
      }
    }

    const args = [...prefix, ...cfg.export_args];
    this.opts.log("loader export", { cmd, args, cwd: directory, mode });
    const exported = await this.runSafely(cmd, args, directory, env);
    const result = this.interpret(exported, base);
    this.opts.log("loader finished", { cwd: directory, mode, outcome: result.outcome.kind });
    return result;
  }

  private async runSafely(
    cmd: string,
    args: string[],
    cwd: string,
    env: Record<string, string>,
  ): Promise<CaptureResult> {
    try {
      return await this.run(cmd, args, { cwd, env });
    } catch (err) {
      return { code: null, stdout: "", stderr: "", spawnError: errorMessage(err) };
    }
  }

  private interpret(run: CaptureResult, base: BaseEnvironmentSnapshot): LoaderResult {
    if (run.spawnError) return { outcome: { kind: "error", message: run.spawnError } };
    if (run.code !== 0) {
      const message = diagnostic(run);
      if (this.deniedPattern.test(run.stderr)) return { outcome: { kind: "denied", message } };
      return { outcome: { kind: "error", message } };
    }
    // some loader versions report a blocked config on stderr with exit 0
    if (!run.stdout.trim() && this.deniedPattern.test(run.stderr)) {
      return { outcome: { kind: "denied", message: diagnostic(run) } };
    }

    const parsed = parseLoaderOutput(run.stdout, this.opts.config.output, base);
    switch (parsed.kind) {
      case "empty":
        return { outcome: { kind: "no_change" } };
      case "malformed":
        return { outcome: { kind: "error", message: parsed.message } };
      case "diff":
        return { outcome: { kind: "success" }, diff: parsed.diff };
    }
  }
}
