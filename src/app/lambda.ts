/*
Purpose: Lambda entry-point factory for CloudWatch Logs subscription triggers.
Assumptions: config is read once when the handler is created (cold start); a bad config
  fails initialization before any event is processed.
Usage: export const handler = createLambdaHandler();
*/

import { loadMonitorConfig, type MonitorConfig } from "../core/config.js";
import { BatchProcessingError, PayloadError } from "../core/errors.js";
import { decodeSubscriptionPayload, LambdaTriggerSchema } from "../core/subscription.js";
import { createRuntimeDependencies } from "./runtime.js";
import {
  RunMonitorService,
  type BatchReport,
  type RunMonitorDependencies,
} from "./services/run-monitor-service.js";

export type LambdaHandler = (event: unknown) => Promise<BatchReport>;

export type CreateLambdaHandlerOptions = {
  config?: MonitorConfig;
  env?: NodeJS.ProcessEnv;
  deps?: RunMonitorDependencies;
};

export function createLambdaHandler(options: CreateLambdaHandlerOptions = {}): LambdaHandler {
  const config = options.config ?? loadMonitorConfig(options.env);
  const deps = options.deps ?? createRuntimeDependencies(config);
  const service = new RunMonitorService(deps);

  return async (event: unknown): Promise<BatchReport> => {
    const trigger = LambdaTriggerSchema.safeParse(event);
    if (!trigger.success) {
      throw new PayloadError("Lambda event is not a CloudWatch Logs subscription trigger.", trigger.error);
    }

    const batch = decodeSubscriptionPayload(trigger.data.awslogs.data);
    deps.logger.debug({
      type: "batch.received",
      payload: {
        log_group: batch.logGroup,
        log_stream: batch.logStream,
        events: batch.logEvents.length,
      },
    });

    const report = await service.processBatch(batch, { dryRun: config.dryRun });
    if (report.failed.length > 0) {
      throw new BatchProcessingError(
        report.functionName ?? batch.logGroup,
        report.failed.map((failure) => failure.requestId),
      );
    }
    return report;
  };
}
