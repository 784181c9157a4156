import {
  DuplicateMarkerError,
  EmptyInputError,
  MissingEndError,
  MissingStartError,
  NegativeDurationError,
} from "./errors.js";
import type { LogEvent, RunSummary } from "./types.js";

// =============================================================================
// ANALYSIS
// =============================================================================

type RunTally = {
  start?: number;
  end?: number;
  errors: number;
  warnings: number;
};

/**
 * Fold one run's events (in arrival order) into a summary.
 *
 * Counting uses literal `[ERROR]` / `[WARNING]` prefixes only. This is narrower than
 * the tagged-line pattern used for rendering, so a line can render with a level
 * without being counted.
 */
export function analyzeRunEvents(requestId: string, events: readonly LogEvent[]): RunSummary {
  if (events.length === 0) {
    throw new EmptyInputError(requestId);
  }

  const tally: RunTally = { errors: 0, warnings: 0 };

  for (const event of events) {
    const message = event.message;
    if (message.startsWith("START")) {
      if (tally.start !== undefined) throw new DuplicateMarkerError(requestId, "START");
      tally.start = event.timestamp;
    } else if (message.startsWith("END")) {
      if (tally.end !== undefined) throw new DuplicateMarkerError(requestId, "END");
      tally.end = event.timestamp;
    } else if (message.startsWith("[ERROR]")) {
      tally.errors += 1;
    } else if (message.startsWith("[WARNING]")) {
      tally.warnings += 1;
    }
  }

  if (tally.start === undefined) throw new MissingStartError(requestId);
  if (tally.end === undefined) throw new MissingEndError(requestId);
  if (tally.end < tally.start) {
    throw new NegativeDurationError(requestId, tally.start, tally.end);
  }

  return Object.freeze({
    requestId,
    start: tally.start,
    end: tally.end,
    durationMs: tally.end - tally.start,
    errors: tally.errors,
    warnings: tally.warnings,
    events: Object.freeze([...events]),
  });
}
