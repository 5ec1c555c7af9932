import { describe, expect, it } from "vitest";

import { snapshotFromRecord } from "../env/baseSnapshot.js";
import { formatDiff } from "../env/envDiff.js";
import { parseEnvLines, parseLoaderOutput } from "./parseLoaderOutput.js";

describe("loader/parseLoaderOutput", () => {
  const base = snapshotFromRecord({ PATH: "/bin", KEEP: "1", DROP: "x" });

  it("treats blank output as empty", () => {
    expect(parseLoaderOutput("  \n", "delta", base)).toEqual({ kind: "empty" });
    expect(parseLoaderOutput("", "full", base)).toEqual({ kind: "empty" });
  });

  it("delta: strings set and nulls unset", () => {
    const parsed = parseLoaderOutput('{"FOO":"BAR","DROP":null,"KEEP":"1"}', "delta", base);
    expect(parsed.kind).toBe("diff");
    if (parsed.kind !== "diff") return;
    expect(formatDiff(parsed.diff)).toEqual(["+FOO=BAR", "-DROP"]);
  });

  it("delta: rejects non-object JSON and non-string values", () => {
    expect(parseLoaderOutput("[1]", "delta", base)).toEqual({
      kind: "malformed",
      message: "loader output is not a JSON object",
    });
    expect(parseLoaderOutput('{"N":1}', "delta", base)).toEqual({
      kind: "malformed",
      message: "invalid value for N",
    });
    expect(parseLoaderOutput("not json", "delta", base).kind).toBe("malformed");
  });

  it("full: KEY=VALUE lines describe the whole environment", () => {
    const parsed = parseLoaderOutput("PATH=/opt/bin:/bin\nKEEP=1\nFOO=a=b\n", "full", base);
    if (parsed.kind !== "diff") throw new Error(`unexpected ${parsed.kind}`);
    expect(formatDiff(parsed.diff)).toEqual(["+PATH=/opt/bin:/bin", "+FOO=a=b", "-DROP"]);
  });

  it("full: lines that do not start a record continue the previous value", () => {
    const parsed = parseLoaderOutput("PATH=/bin\nBASH_FUNC_f%%=() {  echo hi\n}\nFOO=BAR\n", "full", base);
    if (parsed.kind !== "diff") throw new Error(`unexpected ${parsed.kind}`);
    expect(formatDiff(parsed.diff)).toEqual(["+BASH_FUNC_f%%=() {  echo hi\n}", "+FOO=BAR", "-DROP", "-KEEP"]);
  });

  it("full: reads NUL separated records from `env -0`", () => {
    expect(parseEnvLines("PATH=/bin\0PS1=line one\nline two\0EMPTY=\0")).toEqual({
      PATH: "/bin",
      PS1: "line one\nline two",
      EMPTY: "",
    });
  });

  it("full: accepts a JSON object", () => {
    const parsed = parseLoaderOutput('{"PATH":"/bin","KEEP":"1","DROP":"x"}', "full", base);
    if (parsed.kind !== "diff") throw new Error(`unexpected ${parsed.kind}`);
    expect(parsed.diff.changes).toEqual([]);
  });

  it("parseEnvLines rejects output that does not start with a record", () => {
    expect(parseEnvLines("=oops")).toBe("malformed line in loader output: =oops");
    expect(parseEnvLines("A=1\0 not a record\0")).toBe("malformed record in loader output:  not a record");
  });
});
