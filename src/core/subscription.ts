/*
Purpose: decode CloudWatch Logs subscription payloads and derive the monitored function.
Assumptions: payloads are base64-encoded gzip JSON as delivered to Lambda under `awslogs.data`.
Usage: const batch = decodeSubscriptionPayload(event.awslogs.data);
       const functionName = functionNameFromLogGroup(batch.logGroup);
*/

import { gunzipSync } from "node:zlib";

import { z } from "zod";

import { ConfigError, PayloadError } from "./errors.js";
import type { LogEvent, LogSourceLocation } from "./types.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const LAMBDA_LOG_GROUP_PREFIX = "/aws/lambda/";

const SubscriptionLogEventSchema = z.object({
  id: z.string().optional(),
  timestamp: z.number().int(),
  message: z.string(),
  extractedFields: z.record(z.string()).optional(),
});

export const SubscriptionBatchSchema = z.object({
  messageType: z.string().default("DATA_MESSAGE"),
  owner: z.string().optional(),
  logGroup: z.string(),
  logStream: z.string(),
  subscriptionFilters: z.array(z.string()).optional(),
  logEvents: z.array(SubscriptionLogEventSchema),
});

export type SubscriptionBatch = z.infer<typeof SubscriptionBatchSchema>;

export const LambdaTriggerSchema = z.object({
  awslogs: z.object({ data: z.string().min(1) }),
});

export type LambdaTriggerEvent = z.infer<typeof LambdaTriggerSchema>;

// =============================================================================
// DECODING
// =============================================================================

export function decodeSubscriptionPayload(data: string): SubscriptionBatch {
  let json: string;
  try {
    json = gunzipSync(Buffer.from(data, "base64")).toString("utf8");
  } catch (err) {
    throw new PayloadError("Subscription payload is not base64-encoded gzip data.", err);
  }

  let doc: unknown;
  try {
    doc = JSON.parse(json);
  } catch (err) {
    throw new PayloadError("Subscription payload is not valid JSON.", err);
  }

  return parseSubscriptionBatch(doc);
}

export function parseSubscriptionBatch(doc: unknown): SubscriptionBatch {
  const parsed = SubscriptionBatchSchema.safeParse(doc);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("\n");
    throw new PayloadError(`Subscription payload has an unexpected shape:\n${details}`, parsed.error);
  }
  return parsed.data;
}

export function isControlMessage(batch: SubscriptionBatch): boolean {
  return batch.messageType === "CONTROL_MESSAGE";
}

// =============================================================================
// DERIVED VALUES
// =============================================================================

export function functionNameFromLogGroup(logGroup: string): string {
  if (!logGroup.startsWith(LAMBDA_LOG_GROUP_PREFIX)) {
    throw new ConfigError(`Log group ${logGroup} is not a lambda`);
  }
  const functionName = logGroup.slice(LAMBDA_LOG_GROUP_PREFIX.length);
  if (functionName.length === 0) {
    throw new ConfigError(`Log group ${logGroup} does not name a function`);
  }
  return functionName;
}

export function batchLocation(batch: SubscriptionBatch): LogSourceLocation {
  return { logGroupName: batch.logGroup, logStreamName: batch.logStream };
}

export function batchEvents(batch: SubscriptionBatch): LogEvent[] {
  return batch.logEvents.map(({ timestamp, message, extractedFields }) =>
    extractedFields ? { timestamp, message, extractedFields } : { timestamp, message },
  );
}
