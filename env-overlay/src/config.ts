import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";

import { EnvOverlayError } from "./errors.js";

const commandSchema = z.array(z.string().min(1)).min(1);

const loaderSchema = z.object({
  command: commandSchema.default(["direnv"]),
  export_args: z.array(z.string().min(1)).default(["export", "json"]),
  allow_args: z.array(z.string().min(1)).default(["allow"]),
  deny_args: z.array(z.string().min(1)).default(["deny"]),
  output: z.enum(["delta", "full"]).default("delta"),
  denied_pattern: z.string().min(1).default("is blocked"),
  timeout_ms: z.coerce.number().int().nonnegative().optional(),
});

const configCoreSchema = z.object({
  config_files: z.array(z.string().min(1)).min(1).default([".envrc", ".env"]),
  loader: loaderSchema.default({}),
});

const configOverrideSchema = z.object({
  config_files: z.array(z.string().min(1)).min(1).optional(),
  loader: loaderSchema.partial().optional(),
});

const configSchema = configCoreSchema.extend({
  profiles: z.record(z.string().min(1), configOverrideSchema).optional(),
});

export type EnvOverlayConfig = z.infer<typeof configCoreSchema>;
export type LoaderConfig = EnvOverlayConfig["loader"];
type ConfigOverride = z.infer<typeof configOverrideSchema>;

function mergeConfig(base: EnvOverlayConfig, override: ConfigOverride): EnvOverlayConfig {
  return {
    config_files: override.config_files ?? base.config_files,
    loader: { ...base.loader, ...override.loader },
  };
}

function envOverride(env: NodeJS.ProcessEnv): ConfigOverride {
  const loader: NonNullable<ConfigOverride["loader"]> = {};
  const command = env.ENV_OVERLAY_LOADER_COMMAND?.trim();
  if (command) loader.command = command.split(/\s+/);
  const output = env.ENV_OVERLAY_LOADER_OUTPUT?.trim();
  if (output === "delta" || output === "full") loader.output = output;
  // 0 turns a configured timeout off
  const timeoutRaw = env.ENV_OVERLAY_TIMEOUT_MS?.trim();
  const timeout = timeoutRaw ? Number(timeoutRaw) : NaN;
  if (Number.isInteger(timeout) && timeout >= 0) loader.timeout_ms = timeout;
  return Object.keys(loader).length ? { loader } : {};
}

function parseConfigData(raw: string, file: string): unknown {
  try {
    return path.extname(file).toLowerCase() === ".toml" ? parseToml(raw) : JSON.parse(raw);
  } catch (err) {
    throw new EnvOverlayError("CONFIG_INVALID", `cannot parse config ${file}`, String(err));
  }
}

export function resolveConfig(
  data: unknown,
  opts?: { profile?: string; env?: NodeJS.ProcessEnv },
): EnvOverlayConfig {
  const result = configSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new EnvOverlayError("CONFIG_INVALID", "invalid config", result.error.message);
  }
  const { profiles, ...core } = result.data;

  const profile = opts?.profile?.trim() ? opts.profile.trim() : null;
  const override = profile ? (profiles?.[profile] ?? null) : null;
  if (profile && !override) {
    throw new EnvOverlayError("PROFILE_NOT_FOUND", `profile not found: ${profile}`);
  }

  const merged = override ? mergeConfig(core, override) : core;
  return configCoreSchema.parse(mergeConfig(merged, envOverride(opts?.env ?? process.env)));
}

/** Missing config files are not an error: every field has a default. */
export async function loadConfig(
  configPath: string | null,
  opts?: { profile?: string; env?: NodeJS.ProcessEnv },
): Promise<EnvOverlayConfig> {
  if (!configPath) return resolveConfig({}, opts);
  const abs = path.isAbsolute(configPath) ? configPath : path.join(process.cwd(), configPath);

  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return resolveConfig({}, opts);
    throw err;
  }
  return resolveConfig(parseConfigData(raw, abs), opts);
}
