// =============================================================================
// LOG EVENTS
// =============================================================================

export type LogEvent = {
  /** Epoch milliseconds. */
  timestamp: number;
  message: string;
  extractedFields?: Record<string, string>;
};

export type LogSourceLocation = {
  logGroupName: string;
  logStreamName: string;
};

// =============================================================================
// RUNS
// =============================================================================

export type RunSummary = Readonly<{
  requestId: string;
  start: number;
  end: number;
  durationMs: number;
  errors: number;
  warnings: number;
  events: readonly LogEvent[];
}>;

export type RunStatus = "success" | "warning" | "error";

export type RunContext = Readonly<{
  functionName: string;
  displayName: string;
  dryRun: boolean;
  location: LogSourceLocation;
}>;

// =============================================================================
// NOTIFICATIONS
// =============================================================================

export type NotificationAttributes = {
  function: string;
  status: RunStatus;
  errors: number;
  warnings: number;
};

export type Notification = {
  subject: string;
  body: string;
  attributes: NotificationAttributes;
};

export type PublishReceipt = {
  messageId: string;
  dryRun: boolean;
};
