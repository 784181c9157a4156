import { DuplicateIdError, EmptyResultError } from "./errors.js";
import type { LogEvent } from "./types.js";

export const END_EVENT_TYPE = "END";

/**
 * Request ids of the runs that completed inside a subscription batch.
 *
 * Only END markers are trusted: a batch may carry a partial or reordered slice of
 * each run, so full event sets are fetched separately per id. The ids come from the
 * subscription filter's extracted fields (`type`, `requestId`), never from the text.
 */
export function extractRequestIds(events: readonly LogEvent[]): string[] {
  const ids: string[] = [];
  for (const event of events) {
    const fields = event.extractedFields;
    if (fields?.type !== END_EVENT_TYPE) continue;
    const requestId = fields.requestId;
    if (requestId === undefined) continue;
    ids.push(requestId);
  }

  if (ids.length === 0) {
    throw new EmptyResultError();
  }

  const duplicates = findDuplicates(ids);
  if (duplicates.length > 0) {
    throw new DuplicateIdError(duplicates);
  }

  return ids;
}

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) duplicates.add(id);
    seen.add(id);
  }
  return [...duplicates];
}
