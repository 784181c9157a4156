export class MonitorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "MonitorError";
  }
}

export class ConfigError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class PayloadError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PayloadError";
  }
}

export class AdapterError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "AdapterError";
  }
}

// =============================================================================
// CORRELATION
// =============================================================================

export class CorrelationError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CorrelationError";
  }
}

export class EmptyResultError extends CorrelationError {
  constructor() {
    super("No END events found in subscription batch.");
    this.name = "EmptyResultError";
  }
}

export class DuplicateIdError extends CorrelationError {
  constructor(public readonly requestIds: string[]) {
    super(`Found duplicate request ids among END events: ${requestIds.join(", ")}`);
    this.name = "DuplicateIdError";
  }
}

// =============================================================================
// ANALYSIS
// =============================================================================

export class AnalysisError extends MonitorError {
  constructor(
    message: string,
    public readonly requestId: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "AnalysisError";
  }
}

export class EmptyInputError extends AnalysisError {
  constructor(requestId: string) {
    super(`No events found for request ${requestId}`, requestId);
    this.name = "EmptyInputError";
  }
}

export class MissingStartError extends AnalysisError {
  constructor(requestId: string) {
    super(`No START event found in request log trace ${requestId}`, requestId);
    this.name = "MissingStartError";
  }
}

export class MissingEndError extends AnalysisError {
  constructor(requestId: string) {
    super(`No END event found in request log trace ${requestId}`, requestId);
    this.name = "MissingEndError";
  }
}

export class DuplicateMarkerError extends AnalysisError {
  constructor(
    requestId: string,
    public readonly marker: "START" | "END",
  ) {
    super(`More than one ${marker} event found in request log trace ${requestId}`, requestId);
    this.name = "DuplicateMarkerError";
  }
}

export class NegativeDurationError extends AnalysisError {
  constructor(requestId: string, start: number, end: number) {
    super(`END event (${end}) precedes START event (${start}) in request ${requestId}`, requestId);
    this.name = "NegativeDurationError";
  }
}

// =============================================================================
// BATCH
// =============================================================================

export class BatchProcessingError extends MonitorError {
  constructor(
    public readonly functionName: string,
    public readonly failedRequestIds: string[],
  ) {
    super(
      `Failed to report ${failedRequestIds.length} run(s) for ${functionName}: ${failedRequestIds.join(", ")}`,
    );
    this.name = "BatchProcessingError";
  }
}
