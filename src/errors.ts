// Error types shared across the tagging pipeline

export class FlowLogError extends Error {
  constructor(
    message: string,
    public code?: string,
    public originalError?: Error
  ) {
    super(message);
    this.name = 'FlowLogError';
  }
}

/**
 * Unrecoverable I/O failure: a missing or unreadable input, a structurally
 * malformed lookup table, or an output that cannot be written. Aborts the run.
 */
export class FatalIOError extends FlowLogError {
  constructor(message: string, public path: string, originalError?: Error) {
    super(message, 'FATAL_IO', originalError);
    this.name = 'FatalIOError';
  }
}

export class ConfigurationError extends FlowLogError {
  constructor(message: string, public problems: string[] = [message]) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class AggregationError extends FlowLogError {
  constructor(message: string, public chunkIndex: number) {
    super(message, 'AGGREGATION_ERROR');
    this.name = 'AggregationError';
  }
}

export class WorkerError extends FlowLogError {
  constructor(message: string, public chunkIndex?: number, originalError?: Error) {
    super(message, 'WORKER_ERROR', originalError);
    this.name = 'WorkerError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
