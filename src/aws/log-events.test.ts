import { describe, expect, it } from "vitest";

import { FakeLogEventsTransport } from "../__tests__/helpers/fakes.js";
import { createMemoryLogger } from "../core/logger.js";

import { CloudWatchRunEventSource, requestFilterPattern, toLogEvent } from "./log-events.js";

const location = {
  logGroupName: "/aws/lambda/orders-sync",
  logStreamName: "2023/11/14/[$LATEST]abc",
};

describe("CloudWatchRunEventSource", () => {
  it("filters the stream by request id", async () => {
    const transport = new FakeLogEventsTransport().setEvents("r1", [
      { timestamp: 1, message: "START RequestId: r1" },
    ]);
    const source = new CloudWatchRunEventSource({ transport });

    await source.fetchRunEvents("r1", location);

    expect(transport.calls).toEqual([
      {
        logGroupName: "/aws/lambda/orders-sync",
        logStreamNames: ["2023/11/14/[$LATEST]abc"],
        filterPattern: "[level,ts,id=r1,...]",
      },
    ]);
  });

  it("follows continuation tokens and keeps page order", async () => {
    const transport = new FakeLogEventsTransport().setPages("r1", [
      [
        { timestamp: 30, message: "START RequestId: r1" },
        { timestamp: 10, message: "first" },
      ],
      [],
      [{ timestamp: 20, message: "END RequestId: r1" }],
    ]);
    const logger = createMemoryLogger();
    const source = new CloudWatchRunEventSource({ transport, logger });

    const events = await source.fetchRunEvents("r1", location);

    expect(events).toEqual([
      { timestamp: 30, message: "START RequestId: r1" },
      { timestamp: 10, message: "first" },
      { timestamp: 20, message: "END RequestId: r1" },
    ]);
    expect(transport.calls.map((call) => call.nextToken)).toEqual([undefined, "page-1", "page-2"]);
    expect(logger.records.map((record) => record.payload)).toEqual([{ events: 3, pages: 3 }]);
  });

  it("skips events without a message or timestamp", async () => {
    const transport = new FakeLogEventsTransport().setPages("r1", [
      [
        { timestamp: 1, message: "kept", eventId: "e1" },
        { timestamp: 2 },
        { message: "no timestamp" },
      ],
    ]);
    const source = new CloudWatchRunEventSource({ transport });

    expect(await source.fetchRunEvents("r1", location)).toEqual([{ timestamp: 1, message: "kept" }]);
  });

  it("propagates transport errors unchanged", async () => {
    const failure = new Error("ThrottlingException");
    const transport = new FakeLogEventsTransport().failFor("r1", failure);
    const source = new CloudWatchRunEventSource({ transport });

    await expect(source.fetchRunEvents("r1", location)).rejects.toBe(failure);
  });
});

describe("helpers", () => {
  it("builds the space-delimited filter pattern", () => {
    expect(requestFilterPattern("8f5a-11")).toBe("[level,ts,id=8f5a-11,...]");
  });

  it("maps SDK events to log events", () => {
    expect(toLogEvent({ timestamp: 5, message: "x", ingestionTime: 6, logStreamName: "s" })).toEqual({
      timestamp: 5,
      message: "x",
    });
    expect(toLogEvent({ timestamp: 5 })).toBeNull();
  });
});
