import { describe, expect, it } from "vitest";

import { createMemoryLogger, createStdoutLogger, normalizeEvent, type LogStream } from "./logger.js";

function captureStream(): LogStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
}

describe("createStdoutLogger", () => {
  it("writes one JSON line per event with default fields", () => {
    const stream = captureStream();
    const chunks = stream.chunks;

    const logger = createStdoutLogger({ level: "debug", stream }).withDefaults({
      functionName: "orders-sync",
    });
    logger.info({ type: "run.reported", requestId: "r1", payload: { errors: 0 } });

    expect(chunks).toHaveLength(1);
    const record = JSON.parse(chunks[0] ?? "") as Record<string, unknown>;
    expect(record).toMatchObject({
      level: "info",
      type: "run.reported",
      function: "orders-sync",
      request_id: "r1",
      payload: { errors: 0 },
    });
    expect(new Date(String(record.ts)).toString()).not.toBe("Invalid Date");
  });

  it("drops events below the configured level", () => {
    const stream = captureStream();
    const chunks = stream.chunks;

    const logger = createStdoutLogger({ level: "warn", stream });
    logger.debug({ type: "noise" });
    logger.info({ type: "noise" });
    logger.warn({ type: "kept" });

    expect(chunks.map((line) => (JSON.parse(line) as { type: string }).type)).toEqual(["kept"]);
  });
});

describe("createMemoryLogger", () => {
  it("layers defaults from child loggers", () => {
    const logger = createMemoryLogger("info");
    const child = logger.withDefaults({ functionName: "fn" }).withDefaults({ requestId: "r9" });

    child.error({ type: "run.failed", ts: "2023-11-14T22:13:20.000Z" });
    logger.debug({ type: "hidden" });

    expect(logger.records).toEqual([
      {
        ts: "2023-11-14T22:13:20.000Z",
        level: "error",
        type: "run.failed",
        function: "fn",
        request_id: "r9",
      },
    ]);
  });
});

describe("normalizeEvent", () => {
  it("omits empty payloads and converts Date timestamps", () => {
    const record = normalizeEvent("info", {
      type: "batch.start",
      ts: new Date(Date.UTC(2023, 10, 14, 22, 13, 20)),
      payload: {},
    });

    expect(record).toEqual({ ts: "2023-11-14T22:13:20.000Z", level: "info", type: "batch.start" });
  });
});
