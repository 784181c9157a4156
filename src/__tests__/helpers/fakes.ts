import { gzipSync } from "node:zlib";

import type {
  FilterLogEventsCommandInput,
  FilteredLogEvent,
} from "@aws-sdk/client-cloudwatch-logs";
import type { GetFunctionCommandInput } from "@aws-sdk/client-lambda";
import type { PublishCommandInput } from "@aws-sdk/client-sns";

import type { FilterLogEventsPage, LogEventsTransport } from "../../aws/log-events.js";
import type { LambdaTagsTransport } from "../../aws/function-tags.js";
import type { SnsTransport } from "../../aws/notifications.js";
import type { LogEvent } from "../../core/types.js";

// =============================================================================
// CLOUDWATCH LOGS
// =============================================================================

/**
 * Serves pages of filtered events per request id. Each page after the first is keyed
 * by the token the previous page returned.
 */
export class FakeLogEventsTransport implements LogEventsTransport {
  readonly calls: FilterLogEventsCommandInput[] = [];
  private readonly pagesByRequest = new Map<string, FilteredLogEvent[][]>();
  private readonly failures = new Map<string, Error>();

  setPages(requestId: string, pages: FilteredLogEvent[][]): this {
    this.pagesByRequest.set(requestId, pages);
    return this;
  }

  setEvents(requestId: string, events: LogEvent[]): this {
    return this.setPages(requestId, [
      events.map((e) => ({ timestamp: e.timestamp, message: e.message })),
    ]);
  }

  failFor(requestId: string, error: Error): this {
    this.failures.set(requestId, error);
    return this;
  }

  async filterLogEvents(input: FilterLogEventsCommandInput): Promise<FilterLogEventsPage> {
    this.calls.push(input);
    const requestId = parseRequestId(input.filterPattern ?? "");
    const failure = this.failures.get(requestId);
    if (failure) throw failure;

    const pages = this.pagesByRequest.get(requestId) ?? [[]];
    const index = input.nextToken ? Number(input.nextToken.replace("page-", "")) : 0;
    const events = pages[index] ?? [];
    const hasMore = index + 1 < pages.length;
    return hasMore ? { events, nextToken: `page-${index + 1}` } : { events };
  }
}

function parseRequestId(filterPattern: string): string {
  const match = /id=([^,\]]+)/.exec(filterPattern);
  return match?.[1] ?? "";
}

// =============================================================================
// SNS
// =============================================================================

export class FakeSnsTransport implements SnsTransport {
  readonly calls: PublishCommandInput[] = [];
  private counter = 0;

  constructor(private readonly failure?: Error) {}

  async publish(input: PublishCommandInput): Promise<{ MessageId?: string }> {
    this.calls.push(input);
    if (this.failure) throw this.failure;
    this.counter += 1;
    return { MessageId: `msg-${this.counter}` };
  }
}

// =============================================================================
// LAMBDA
// =============================================================================

export class FakeLambdaTagsTransport implements LambdaTagsTransport {
  readonly calls: GetFunctionCommandInput[] = [];

  constructor(private readonly tags: Record<string, string> | undefined) {}

  async getFunction(input: GetFunctionCommandInput): Promise<{ Tags?: Record<string, string> }> {
    this.calls.push(input);
    return this.tags ? { Tags: this.tags } : {};
  }
}

// =============================================================================
// PAYLOADS
// =============================================================================

export function encodeSubscriptionPayload(batch: unknown): string {
  return gzipSync(Buffer.from(JSON.stringify(batch), "utf8")).toString("base64");
}

export function endMarker(requestId: string, timestamp = 0): LogEvent {
  return {
    timestamp,
    message: `END RequestId: ${requestId}\n`,
    extractedFields: { type: "END", requestId },
  };
}

export function runEvents(requestId: string, start: number, lines: string[] = []): LogEvent[] {
  const body = lines.map((message, index) => ({ timestamp: start + 10 * (index + 1), message }));
  const end = start + 10 * (lines.length + 1);
  return [
    { timestamp: start, message: `START RequestId: ${requestId} Version: $LATEST\n` },
    ...body,
    { timestamp: end, message: `END RequestId: ${requestId}\n` },
    {
      timestamp: end,
      message: `REPORT RequestId: ${requestId}\tDuration: ${end - start} ms\tBilled Duration: ${end - start} ms\n`,
    },
  ];
}
