/**
 * RunContext carries the per-batch facts every run report needs.
 * Purpose: resolve function + display name once per subscription batch.
 * Assumptions: the batch came from a Lambda log group; config is already validated.
 * Usage: const ctx = await createRunContext({ batch, dryRun, displayNames }).
 */

import { resolveDisplayName, type DisplayNameSource } from "../aws/function-tags.js";
import { batchLocation, functionNameFromLogGroup, type SubscriptionBatch } from "../core/subscription.js";
import type { RunContext } from "../core/types.js";

export type CreateRunContextInput = {
  batch: SubscriptionBatch;
  dryRun: boolean;
  displayNames: DisplayNameSource;
};

export async function createRunContext(input: CreateRunContextInput): Promise<RunContext> {
  const functionName = functionNameFromLogGroup(input.batch.logGroup);
  const displayName = await resolveDisplayName(input.displayNames, functionName);

  return Object.freeze({
    functionName,
    displayName,
    dryRun: input.dryRun,
    location: batchLocation(input.batch),
  });
}
