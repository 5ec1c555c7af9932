import type { BaseEnvironmentSnapshot } from "../env/baseSnapshot.js";
import {
  diffEnvironments,
  diffFromUpdates,
  type EnvRecord,
  type EnvironmentDiff,
} from "../env/envDiff.js";

export type LoaderOutputFormat = "delta" | "full";

export type ParsedOutput =
  | { kind: "empty" }
  | { kind: "diff"; diff: EnvironmentDiff }
  | { kind: "malformed"; message: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function parseJsonObject(text: string): Record<string, unknown> | string {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return `loader output is not valid JSON: ${String(err)}`;
  }
  if (!isRecord(data)) return "loader output is not a JSON object";
  return data;
}

function parseUpdates(text: string): Record<string, string | null> | string {
  const data = parseJsonObject(text);
  if (typeof data === "string") return data;
  const out: Record<string, string | null> = {};
  for (const [name, value] of Object.entries(data)) {
    if (typeof value !== "string" && value !== null) return `invalid value for ${name}`;
    out[name] = value;
  }
  return out;
}

const RECORD_START = /^[^\s=]+=/;

/**
 * `KEY=VALUE` records, NUL separated (`env -0`) or one per line. In the line
 * form, a line that does not start a record continues the previous value, so
 * multi-line values such as exported shell functions survive.
 */
export function parseEnvLines(text: string): EnvRecord | string {
  const out: EnvRecord = {};

  if (text.includes("\0")) {
    for (const record of text.split("\0")) {
      if (!record.trim()) continue;
      if (!RECORD_START.test(record)) return `malformed record in loader output: ${record}`;
      const eq = record.indexOf("=");
      out[record.slice(0, eq)] = record.slice(eq + 1);
    }
    return out;
  }

  let current: string | null = null;
  for (const line of text.replace(/\r?\n$/, "").split(/\r?\n/)) {
    if (RECORD_START.test(line)) {
      const eq = line.indexOf("=");
      current = line.slice(0, eq);
      out[current] = line.slice(eq + 1);
    } else if (current !== null) {
      out[current] += `\n${line}`;
    } else {
      return `malformed line in loader output: ${line}`;
    }
  }
  return out;
}

function parseFull(text: string): EnvRecord | string {
  if (!text.trimStart().startsWith("{")) return parseEnvLines(text);
  const data = parseJsonObject(text);
  if (typeof data === "string") return data;
  const out: EnvRecord = {};
  for (const [name, value] of Object.entries(data)) {
    if (typeof value !== "string") return `invalid value for ${name}`;
    out[name] = value;
  }
  return out;
}

/**
 * `delta`: JSON object, strings set and nulls unset (direnv `export json`).
 * `full`: the complete resulting environment, JSON object or KEY=VALUE lines.
 * Empty output means the loader had nothing to do.
 */
export function parseLoaderOutput(
  stdout: string,
  format: LoaderOutputFormat,
  base: BaseEnvironmentSnapshot,
): ParsedOutput {
  if (!stdout.trim()) return { kind: "empty" };

  if (format === "delta") {
    const updates = parseUpdates(stdout);
    if (typeof updates === "string") return { kind: "malformed", message: updates };
    return { kind: "diff", diff: diffFromUpdates(base, updates) };
  }

  const full = parseFull(stdout);
  if (typeof full === "string") return { kind: "malformed", message: full };
  return { kind: "diff", diff: diffEnvironments(base, full) };
}
