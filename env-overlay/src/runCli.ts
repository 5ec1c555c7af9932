import { existsSync } from "node:fs";
import path from "node:path";

import { loadConfig, type EnvOverlayConfig } from "./config.js";
import { formatDiff } from "./env/envDiff.js";
import { EnvOverlayError } from "./errors.js";
import { createEnvOverlay, type CreateEnvOverlayOpts } from "./index.js";
import { createLogger, toLoggerFn, type LoggerFn } from "./logger.js";
import type { EnvStatus } from "./status/statusMachine.js";
import { pickArg, positionalArgs } from "./utils/args.js";

const COMMANDS = ["status", "env", "allow", "deny", "reload"] as const;
type Command = (typeof COMMANDS)[number];

const CLI_CONTEXT = "cli";

const USAGE = `usage: env-overlay [--config <file>] [--profile <name>] <${COMMANDS.join("|")}> [dir]`;

function isCommand(v: string | undefined): v is Command {
  return COMMANDS.some((c) => c === v);
}

type RunCliOpts = {
  argv?: string[];
  cwd?: string;
  write?: (line: string) => void;
  log?: LoggerFn;
  /** test seams; the real loader and process env are used otherwise */
  overlay?: Omit<CreateEnvOverlayOpts, "config" | "log">;
};

function exitCodeFor(status: EnvStatus): number {
  return status === "error" ? 1 : 0;
}

export async function runCli(opts?: RunCliOpts): Promise<number> {
  const argv = opts?.argv ?? process.argv.slice(2);
  const write = opts?.write ?? ((line: string) => process.stdout.write(`${line}\n`));

  const [command, dir] = positionalArgs(argv, ["--config", "--profile"]);
  if (!isCommand(command)) {
    write(USAGE);
    return 2;
  }

  const cwd = opts?.cwd ?? process.cwd();
  const defaultConfig = path.join(cwd, "env-overlay.toml");
  const configPath = pickArg(argv, "--config") ?? (existsSync(defaultConfig) ? defaultConfig : null);
  const profile = pickArg(argv, "--profile") ?? undefined;

  let config: EnvOverlayConfig;
  try {
    config = await loadConfig(configPath, { profile });
  } catch (err) {
    if (!(err instanceof EnvOverlayError)) throw err;
    write(`env-overlay: ${err.message}${err.details ? `\n${err.details}` : ""}`);
    return 2;
  }

  const log = opts?.log ?? toLoggerFn(createLogger(), "debug");
  const { bindings } = createEnvOverlay({ ...opts?.overlay, config, log });

  const directory = dir ? path.resolve(cwd, dir) : cwd;
  let status = await bindings.bind(CLI_CONTEXT, directory);
  if (command === "allow") status = await bindings.allow(CLI_CONTEXT);
  else if (command === "deny") status = await bindings.deny(CLI_CONTEXT);
  else if (command === "reload") status = await bindings.reload(CLI_CONTEXT);

  const binding = bindings.get(CLI_CONTEXT);
  write(`status: ${status}`);
  if (binding?.directoryKey) write(`directory: ${binding.directoryKey}`);
  const message = bindings.message(CLI_CONTEXT);
  if (message?.trim()) write(`message: ${message.trim()}`);

  if (command === "env") {
    const env = bindings.environment(CLI_CONTEXT);
    for (const name of Object.keys(env).sort()) write(`${name}=${env[name]}`);
  } else {
    const diff = bindings.appliedDiff(CLI_CONTEXT);
    if (diff) for (const line of formatDiff(diff)) write(line);
  }

  bindings.unbind(CLI_CONTEXT);
  return exitCodeFor(status);
}
