import {
  CloudWatchLogsClient,
  FilterLogEventsCommand,
  type FilterLogEventsCommandInput,
  type FilterLogEventsCommandOutput,
  type FilteredLogEvent,
} from "@aws-sdk/client-cloudwatch-logs";

import type { Logger } from "../core/logger.js";
import type { LogEvent, LogSourceLocation } from "../core/types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface RunEventSource {
  fetchRunEvents(requestId: string, location: LogSourceLocation): Promise<LogEvent[]>;
}

export type FilterLogEventsPage = Pick<FilterLogEventsCommandOutput, "events" | "nextToken">;

export type LogEventsTransport = {
  filterLogEvents: (input: FilterLogEventsCommandInput) => Promise<FilterLogEventsPage>;
};

type CloudWatchRunEventSourceOptions = {
  region?: string;
  client?: CloudWatchLogsClient;
  transport?: LogEventsTransport;
  logger?: Logger;
};

// =============================================================================
// CLOUDWATCH
// =============================================================================

/**
 * Fetches every log line of one Lambda request from its log stream.
 *
 * Pages through `FilterLogEvents` until no `nextToken` is returned and keeps the
 * service's order. Errors from the SDK propagate unchanged; retries are left to the
 * SDK client's own configuration.
 */
export class CloudWatchRunEventSource implements RunEventSource {
  private readonly transport: LogEventsTransport;
  private readonly logger?: Logger;

  constructor(options: CloudWatchRunEventSourceOptions = {}) {
    this.transport =
      options.transport ??
      createTransport(options.client ?? new CloudWatchLogsClient({ region: options.region }));
    this.logger = options.logger;
  }

  async fetchRunEvents(requestId: string, location: LogSourceLocation): Promise<LogEvent[]> {
    const baseInput: FilterLogEventsCommandInput = {
      logGroupName: location.logGroupName,
      logStreamNames: [location.logStreamName],
      filterPattern: requestFilterPattern(requestId),
    };

    const events: LogEvent[] = [];
    let nextToken: string | undefined;
    let pages = 0;

    do {
      const input: FilterLogEventsCommandInput = nextToken
        ? { ...baseInput, nextToken }
        : baseInput;
      const page = await this.transport.filterLogEvents(input);
      pages += 1;

      for (const raw of page.events ?? []) {
        const event = toLogEvent(raw);
        if (event) events.push(event);
      }
      nextToken = page.nextToken;
    } while (nextToken);

    this.logger?.debug({
      type: "events.fetched",
      requestId,
      payload: { events: events.length, pages },
    });

    return events;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

// Lambda's default line layout is "<level> <timestamp> <request id> ..."; START/END/REPORT
// lines carry the request id in the same position.
export function requestFilterPattern(requestId: string): string {
  return `[level,ts,id=${requestId},...]`;
}

export function toLogEvent(raw: FilteredLogEvent): LogEvent | null {
  if (raw.message === undefined || raw.timestamp === undefined) return null;
  return { timestamp: raw.timestamp, message: raw.message };
}

function createTransport(client: CloudWatchLogsClient): LogEventsTransport {
  return {
    filterLogEvents: (input) => client.send(new FilterLogEventsCommand(input)),
  };
}
