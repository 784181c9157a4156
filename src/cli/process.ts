import fse from "fs-extra";

import { createRuntimeDependencies } from "../app/runtime.js";
import { RunMonitorService, type BatchReport } from "../app/services/run-monitor-service.js";
import { loadMonitorConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { BatchProcessingError, PayloadError } from "../core/errors.js";
import { createStdoutLogger } from "../core/logger.js";
import {
  decodeSubscriptionPayload,
  LambdaTriggerSchema,
  parseSubscriptionBatch,
  type SubscriptionBatch,
} from "../core/subscription.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessCommandOptions = {
  dryRun?: boolean;
};

// =============================================================================
// COMMAND
// =============================================================================

export async function processCommand(
  payloadPath: string,
  opts: ProcessCommandOptions,
): Promise<BatchReport> {
  const config = loadMonitorConfig();
  const dryRun = opts.dryRun ?? config.dryRun;
  const logger = createStdoutLogger({ level: config.logLevel, stream: process.stderr });

  const batch = await readSubscriptionFile(payloadPath);
  const service = new RunMonitorService(createRuntimeDependencies(config, logger));
  const report = await service.processBatch(batch, { dryRun });

  for (const line of formatBatchReport(report, dryRun)) {
    console.log(line);
  }

  if (report.failed.length > 0) {
    throw new BatchProcessingError(
      report.functionName ?? batch.logGroup,
      report.failed.map((failure) => failure.requestId),
    );
  }
  return report;
}

// =============================================================================
// HELPERS
// =============================================================================

// Accepts either the raw Lambda trigger ({ awslogs: { data } }) or a decoded batch.
export async function readSubscriptionFile(filePath: string): Promise<SubscriptionBatch> {
  let doc: unknown;
  try {
    doc = await fse.readJson(filePath);
  } catch (err) {
    throw new PayloadError(`Failed to read subscription payload at ${filePath}`, err);
  }

  const trigger = LambdaTriggerSchema.safeParse(doc);
  if (trigger.success) {
    return decodeSubscriptionPayload(trigger.data.awslogs.data);
  }
  return parseSubscriptionBatch(doc);
}

export function formatBatchReport(report: BatchReport, dryRun: boolean): string[] {
  if (report.functionName === null) {
    return ["Control message acknowledged; nothing to report."];
  }

  const mode = dryRun ? " (dry run)" : "";
  const lines = [`${report.functionName}: ${report.requestIds.length} run(s)${mode}`];
  for (const outcome of report.published) {
    lines.push(`  ${outcome.requestId}  ${outcome.status}  message ${outcome.messageId}`);
  }
  for (const failure of report.failed) {
    lines.push(`  ${failure.requestId}  failed  ${formatErrorMessage(failure.error)}`);
  }
  return lines;
}
