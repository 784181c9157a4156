import { createBody, createSubject } from "./report-format.js";
import type { Notification, RunContext, RunStatus, RunSummary } from "./types.js";

export function resolveRunStatus(summary: Pick<RunSummary, "errors" | "warnings">): RunStatus {
  if (summary.errors > 0) return "error";
  if (summary.warnings > 0) return "warning";
  return "success";
}

export function buildNotification(summary: RunSummary, context: RunContext): Notification {
  return {
    subject: createSubject(summary.errors, summary.warnings, context.displayName),
    body: createBody(summary, context),
    attributes: {
      function: context.functionName,
      status: resolveRunStatus(summary),
      errors: summary.errors,
      warnings: summary.warnings,
    },
  };
}
