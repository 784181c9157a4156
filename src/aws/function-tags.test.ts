import { describe, expect, it } from "vitest";

import { FakeLambdaTagsTransport } from "../__tests__/helpers/fakes.js";

import {
  LambdaTagDisplayNameSource,
  resolveDisplayName,
  StaticDisplayNameSource,
} from "./function-tags.js";

describe("LambdaTagDisplayNameSource", () => {
  it("reads the configured tag", async () => {
    const transport = new FakeLambdaTagsTransport({ FriendlyName: "  Orders Sync  " });
    const source = new LambdaTagDisplayNameSource({ tagName: "FriendlyName", transport });

    expect(await source.resolveDisplayName("orders-sync")).toBe("Orders Sync");
    expect(transport.calls).toEqual([{ FunctionName: "orders-sync" }]);
  });

  it("uses DISPLAY_NAME by default", async () => {
    const source = new LambdaTagDisplayNameSource({
      transport: new FakeLambdaTagsTransport({ DISPLAY_NAME: "Nightly Export" }),
    });

    expect(await source.resolveDisplayName("export")).toBe("Nightly Export");
  });

  it("returns undefined when the tag is missing or blank", async () => {
    const blank = new LambdaTagDisplayNameSource({
      transport: new FakeLambdaTagsTransport({ DISPLAY_NAME: "   " }),
    });
    const untagged = new LambdaTagDisplayNameSource({
      transport: new FakeLambdaTagsTransport(undefined),
    });

    expect(await blank.resolveDisplayName("fn")).toBeUndefined();
    expect(await untagged.resolveDisplayName("fn")).toBeUndefined();
  });
});

describe("resolveDisplayName", () => {
  it("falls back to the function name", async () => {
    const source = new StaticDisplayNameSource({ "orders-sync": "Orders Sync" });

    expect(await resolveDisplayName(source, "orders-sync")).toBe("Orders Sync");
    expect(await resolveDisplayName(source, "billing")).toBe("billing");
  });
});
