import { spawn } from "node:child_process";

export type CaptureResult = {
  code: number | null;
  stdout: string;
  stderr: string;
  /** set when the process could not be started at all */
  spawnError?: string;
};

export type CaptureOpts = {
  cwd: string;
  env: Record<string, string>;
};

export type ProcessRunner = (cmd: string, args: string[], opts: CaptureOpts) => Promise<CaptureResult>;

export const spawnCapture: ProcessRunner = async (cmd, args, opts) => {
  const child = spawn(cmd, args, {
    cwd: opts.cwd,
    env: opts.env,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

  let stdout = "";
  let stderr = "";
  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");
  child.stdout.on("data", (d) => (stdout += String(d ?? "")));
  child.stderr.on("data", (d) => (stderr += String(d ?? "")));

  return await new Promise<CaptureResult>((resolve) => {
    child.once("close", (c) => resolve({ code: c ?? null, stdout, stderr }));
    child.once("error", (err) => resolve({ code: null, stdout, stderr, spawnError: String(err) }));
  });
};
