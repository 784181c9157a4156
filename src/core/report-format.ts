/*
Purpose: render a run summary as a notification subject and plain-text body.
Assumptions: time-of-day and "Started" values use the process time zone (TZ), so output
  is byte-identical only for a fixed TZ. Lambda runs in UTC.
Usage: createSubject(summary.errors, summary.warnings, ctx.displayName); createBody(summary, ctx).
*/

import { classifyLine } from "./log-line.js";
import type { LogEvent, RunContext, RunSummary } from "./types.js";

const LEVEL_WIDTH = 7;

// =============================================================================
// SUBJECT
// =============================================================================

export function createSubject(errors: number, warnings: number, displayName: string): string {
  const base = `${displayName} request completed`;
  if (errors > 0) return `${base} with ERRORS!`;
  if (warnings > 0) return `${base} with WARNINGS!`;
  return base;
}

// =============================================================================
// EVENTS
// =============================================================================

export function formatLogEvent(event: LogEvent): string {
  const time = formatTimeOfDay(event.timestamp);
  const line = classifyLine(event.message);

  switch (line.kind) {
    case "start":
      return `${time} ${"START".padEnd(LEVEL_WIDTH)}\n`;
    case "end":
      return `${time} ${"END".padEnd(LEVEL_WIDTH)}\n`;
    case "report":
      return "";
    case "tagged":
      return ensureTrailingNewline(`${time} ${line.level.padEnd(LEVEL_WIDTH)} ${line.detail}`);
    case "plain":
      return ensureTrailingNewline(`${time} ${line.message}`);
  }
}

// =============================================================================
// BODY
// =============================================================================

export function createBody(summary: RunSummary, context: RunContext): string {
  return (
    `Execution results for ${context.displayName}\n\n` +
    `${summary.errors} errors\n` +
    `${summary.warnings} warnings\n` +
    "\nExecution Log\n\n" +
    summary.events.map(formatLogEvent).join("") +
    `\nLambda Function: ${context.functionName}\n` +
    `Request ID: ${summary.requestId}\n` +
    `Started: ${formatStartedAt(summary.start)}\n` +
    `Duration: ${formatDurationSeconds(summary.durationMs)} seconds`
  );
}

// =============================================================================
// TIME HELPERS
// =============================================================================

export function formatTimeOfDay(epochMs: number): string {
  const d = new Date(epochMs);
  return `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

// "YYYY-MM-DD HH:MM:SS", with ".ffffff" microseconds only when the millisecond part is non-zero.
export function formatStartedAt(epochMs: number): string {
  const d = new Date(epochMs);
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  const base = `${date} ${formatTimeOfDay(epochMs)}`;
  const millis = d.getMilliseconds();
  if (millis === 0) return base;
  return `${base}.${String(millis * 1000).padStart(6, "0")}`;
}

export function formatDurationSeconds(durationMs: number): string {
  return (durationMs / 1000).toFixed(6);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function ensureTrailingNewline(value: string): string {
  return value.endsWith("\n") ? value : `${value}\n`;
}
