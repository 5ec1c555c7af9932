import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";

import { beforeEach, describe, expect, it, vi } from "vitest";

const { spawnMock } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
}));

vi.mock("node:child_process", () => {
  return {
    spawn: spawnMock,
  };
});

import { spawnCapture } from "./spawnCapture.js";

function makeFakeChildProcess() {
  return Object.assign(new EventEmitter(), {
    stdout: new PassThrough(),
    stderr: new PassThrough(),
  });
}

describe("loader/spawnCapture", () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  it("collects output and exit code", async () => {
    const proc = makeFakeChildProcess();
    spawnMock.mockImplementation(() => proc);

    const pending = spawnCapture("direnv", ["export", "json"], { cwd: "/proj", env: { PATH: "/bin" } });
    proc.stdout.write('{"FOO":"BAR"}');
    proc.stderr.write("direnv: loading .envrc\n");
    await new Promise((resolve) => setImmediate(resolve));
    proc.emit("close", 0);

    await expect(pending).resolves.toEqual({
      code: 0,
      stdout: '{"FOO":"BAR"}',
      stderr: "direnv: loading .envrc\n",
    });
    const [cmd, args, opts] = spawnMock.mock.calls[0] ?? [];
    expect(cmd).toBe("direnv");
    expect(args).toEqual(["export", "json"]);
    expect(opts).toMatchObject({ cwd: "/proj", env: { PATH: "/bin" } });
  });

  it("reports spawn errors instead of rejecting", async () => {
    const proc = makeFakeChildProcess();
    spawnMock.mockImplementation(() => proc);

    const pending = spawnCapture("missing-loader", [], { cwd: "/", env: {} });
    proc.emit("error", new Error("spawn missing-loader ENOENT"));

    await expect(pending).resolves.toEqual({
      code: null,
      stdout: "",
      stderr: "",
      spawnError: "Error: spawn missing-loader ENOENT",
    });
  });
});
