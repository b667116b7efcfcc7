import type { ErrorInfo, RecipeCategory, RunStage } from '../types';

/** No actionable requirement could be extracted; the caller may re-prompt. */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class RetrievalDegradedError extends Error {
  constructor(
    public readonly category: RecipeCategory,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RetrievalDegraded';
  }
}

export class DiscoveryUnavailableError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DiscoveryUnavailable';
  }
}

/** Raised when no course at all could be planned. */
export class CompositionError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CompositionError';
  }
}

export class CancelledError extends Error {
  constructor(public readonly stage: RunStage) {
    super(`Run cancelled before ${stage}`);
    this.name = 'Cancelled';
  }
}

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'Timeout';
  }
}

export function describeError(error: unknown): ErrorInfo {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}
