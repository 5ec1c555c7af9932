import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadConfig, resolveConfig } from "./config.js";
import { EnvOverlayError } from "./errors.js";

function tmpConfigPath(ext: string): string {
  return path.join(tmpdir(), `env-overlay-config-${Date.now()}-${Math.random()}${ext}`);
}

describe("loadConfig", () => {
  it("fills direnv defaults", () => {
    const cfg = resolveConfig({}, { env: {} });
    expect(cfg.config_files).toEqual([".envrc", ".env"]);
    expect(cfg.loader).toEqual({
      command: ["direnv"],
      export_args: ["export", "json"],
      allow_args: ["allow"],
      deny_args: ["deny"],
      output: "delta",
      denied_pattern: "is blocked",
    });
  });

  it("returns defaults when the file does not exist", async () => {
    const cfg = await loadConfig(tmpConfigPath(".toml"), { env: {} });
    expect(cfg.loader.command).toEqual(["direnv"]);
  });

  it("parses toml and applies a profile", async () => {
    const p = tmpConfigPath(".toml");
    await writeFile(
      p,
      [
        'config_files = [".envrc"]',
        "[loader]",
        'command = ["/opt/direnv"]',
        "timeout_ms = 5000",
        "[profiles.full]",
        "[profiles.full.loader]",
        'output = "full"',
        'export_args = ["exec", ".", "env"]',
        "",
      ].join("\n"),
      "utf8",
    );

    const cfg = await loadConfig(p, { profile: "full", env: {} });
    expect(cfg.config_files).toEqual([".envrc"]);
    expect(cfg.loader.command).toEqual(["/opt/direnv"]);
    expect(cfg.loader.timeout_ms).toBe(5000);
    expect(cfg.loader.output).toBe("full");
    expect(cfg.loader.export_args).toEqual(["exec", ".", "env"]);
  });

  it("environment overrides win over the file", async () => {
    const p = tmpConfigPath(".json");
    await writeFile(p, JSON.stringify({ loader: { command: ["direnv"] } }), "utf8");

    const cfg = await loadConfig(p, {
      env: { ENV_OVERLAY_LOADER_COMMAND: "nix run .#loader --", ENV_OVERLAY_TIMEOUT_MS: "250" },
    });
    expect(cfg.loader.command).toEqual(["nix", "run", ".#loader", "--"]);
    expect(cfg.loader.timeout_ms).toBe(250);
  });

  it("ENV_OVERLAY_TIMEOUT_MS=0 clears a timeout from the file", async () => {
    const p = tmpConfigPath(".json");
    await writeFile(p, JSON.stringify({ loader: { timeout_ms: 5000 } }), "utf8");

    expect((await loadConfig(p, { env: { ENV_OVERLAY_TIMEOUT_MS: "0" } })).loader.timeout_ms).toBe(0);
    expect((await loadConfig(p, { env: { ENV_OVERLAY_TIMEOUT_MS: "" } })).loader.timeout_ms).toBe(5000);
    expect((await loadConfig(p, { env: { ENV_OVERLAY_TIMEOUT_MS: "-1" } })).loader.timeout_ms).toBe(5000);
  });

  it("rejects unknown profiles and invalid values", async () => {
    expect(() => resolveConfig({}, { profile: "missing", env: {} })).toThrow(/profile not found: missing/);
    expect(() => resolveConfig({ loader: { output: "yaml" } }, { env: {} })).toThrow(EnvOverlayError);
  });

  it("reports unparsable files", async () => {
    const p = tmpConfigPath(".json");
    await writeFile(p, "{nope", "utf8");
    await expect(loadConfig(p, { env: {} })).rejects.toMatchObject({ code: "CONFIG_INVALID" });
  });
});
