/*
Purpose: shared error formatting for structured logs and CLI output.
Assumptions: callers only need string representations; stacks are opt-in via debug mode.
Usage: formatErrorMessage(err), formatErrorLines(err, { mode: "debug" }).
*/

import {
  AdapterError,
  AnalysisError,
  BatchProcessingError,
  ConfigError,
  CorrelationError,
  MonitorError,
  PayloadError,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "request" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [{ kind: "title", text: resolveTitle(error) }];

  lines.push({ kind: "message", text: formatErrorMessage(error) });

  if (error instanceof AnalysisError) {
    lines.push({ kind: "request", text: error.requestId });
  }

  if (mode === "short") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.stream.isTTY !== true) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return options.useColor ?? true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!enabled || styles.length === 0) return text;
    return styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveTitle(error: unknown): string {
  if (error instanceof ConfigError) return "Configuration invalid.";
  if (error instanceof PayloadError) return "Subscription payload invalid.";
  if (error instanceof CorrelationError) return "Cannot correlate runs.";
  if (error instanceof AnalysisError) return "Run analysis failed.";
  if (error instanceof AdapterError) return "AWS call failed.";
  if (error instanceof BatchProcessingError) return "Some runs were not reported.";
  if (error instanceof MonitorError) return "Run monitoring failed.";
  return "Unexpected error.";
}

function resolveCause(error: unknown): unknown {
  if (error instanceof MonitorError) return error.cause;
  if (error instanceof Error && "cause" in error) return error.cause;
  return undefined;
}
