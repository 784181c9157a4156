import { describe, expect, it } from "vitest";

import { classifyLine } from "./log-line.js";

describe("classifyLine", () => {
  it("recognizes platform markers by prefix", () => {
    expect(classifyLine("START RequestId: abc Version: $LATEST\n")).toEqual({ kind: "start" });
    expect(classifyLine("END RequestId: abc\n")).toEqual({ kind: "end" });
    expect(classifyLine("REPORT RequestId: abc\tDuration: 12.3 ms\n")).toEqual({ kind: "report" });
  });

  it("extracts level and detail from runtime-formatted lines", () => {
    const line = classifyLine("[ERROR]\t2023-11-14T22:13:20.050Z\treq-1\tboom detail\n");

    expect(line).toEqual({ kind: "tagged", level: "ERROR", detail: "boom detail\n" });
  });

  it("keeps multi-line details intact", () => {
    const line = classifyLine("[WARNING]\t2023-11-14T22:13:20.050Z\treq-1\tline one\nline two");

    expect(line).toEqual({ kind: "tagged", level: "WARNING", detail: "line one\nline two" });
  });

  it("allows leading whitespace before the tag", () => {
    expect(classifyLine("  [INFO] origin ts detail")).toEqual({
      kind: "tagged",
      level: "INFO",
      detail: "detail",
    });
  });

  it("treats lines without two tokens before the detail as plain", () => {
    expect(classifyLine("[ERROR] boom detail")).toEqual({
      kind: "plain",
      message: "[ERROR] boom detail",
    });
  });

  it("requires an upper-case tag", () => {
    expect(classifyLine("[error] a b c")).toEqual({ kind: "plain", message: "[error] a b c" });
  });

  it("passes other text through verbatim", () => {
    expect(classifyLine("hello world")).toEqual({ kind: "plain", message: "hello world" });
    expect(classifyLine("")).toEqual({ kind: "plain", message: "" });
  });
});
