/*
Purpose: turn one subscription batch into one published report per completed Lambda run.
Key assumptions: runs are independent; one failing run must not block the others in the batch.
Usage: new RunMonitorService({ events, publisher, displayNames, logger }).processBatch(batch, { dryRun }).
*/

import type { DisplayNameSource } from "../../aws/function-tags.js";
import type { RunEventSource } from "../../aws/log-events.js";
import type { NotificationPublisher } from "../../aws/notifications.js";
import { formatErrorMessage } from "../../core/error-format.js";
import type { Logger } from "../../core/logger.js";
import { buildNotification } from "../../core/notification.js";
import { analyzeRunEvents } from "../../core/run-analyzer.js";
import { extractRequestIds } from "../../core/run-extractor.js";
import { batchEvents, isControlMessage, type SubscriptionBatch } from "../../core/subscription.js";
import type { PublishReceipt, RunContext, RunStatus } from "../../core/types.js";
import { createRunContext } from "../context.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunMonitorDependencies = {
  events: RunEventSource;
  publisher: NotificationPublisher;
  displayNames: DisplayNameSource;
  logger: Logger;
};

export type RunOutcome = {
  requestId: string;
  status: RunStatus;
  messageId: string;
};

export type RunFailure = {
  requestId: string;
  error: unknown;
};

export type BatchReport = {
  functionName: string | null;
  requestIds: string[];
  published: RunOutcome[];
  failed: RunFailure[];
};

// =============================================================================
// SERVICE
// =============================================================================

export class RunMonitorService {
  constructor(private readonly deps: RunMonitorDependencies) {}

  async processBatch(batch: SubscriptionBatch, options: { dryRun: boolean }): Promise<BatchReport> {
    if (isControlMessage(batch)) {
      this.deps.logger.info({
        type: "batch.control_message",
        payload: { log_group: batch.logGroup },
      });
      return { functionName: null, requestIds: [], published: [], failed: [] };
    }

    const context = await createRunContext({
      batch,
      dryRun: options.dryRun,
      displayNames: this.deps.displayNames,
    });
    const logger = this.deps.logger.withDefaults({ functionName: context.functionName });

    const requestIds = extractRequestIds(batchEvents(batch));
    logger.debug({
      type: "batch.start",
      payload: { runs: requestIds.length, log_stream: context.location.logStreamName },
    });

    const report: BatchReport = {
      functionName: context.functionName,
      requestIds,
      published: [],
      failed: [],
    };

    for (const requestId of requestIds) {
      try {
        report.published.push(await this.processRun(requestId, context, logger));
      } catch (error) {
        logger.error({
          type: "run.failed",
          requestId,
          payload: {
            error: formatErrorMessage(error),
            name: error instanceof Error ? error.name : "Error",
          },
        });
        report.failed.push({ requestId, error });
      }
    }

    logger.info({
      type: "batch.complete",
      payload: { published: report.published.length, failed: report.failed.length },
    });
    return report;
  }

  async processRun(requestId: string, context: RunContext, logger: Logger): Promise<RunOutcome> {
    const runLogger = logger.withDefaults({ requestId });
    runLogger.debug({ type: "run.start" });

    const events = await this.deps.events.fetchRunEvents(requestId, context.location);
    runLogger.debug({ type: "run.events", payload: { count: events.length } });

    const summary = analyzeRunEvents(requestId, events);
    const notification = buildNotification(summary, context);
    const receipt: PublishReceipt = await this.deps.publisher.publish(notification, context);

    runLogger.info({
      type: "run.reported",
      payload: {
        status: notification.attributes.status,
        errors: summary.errors,
        warnings: summary.warnings,
        duration_ms: summary.durationMs,
        message_id: receipt.messageId,
      },
    });

    return {
      requestId,
      status: notification.attributes.status,
      messageId: receipt.messageId,
    };
  }
}
