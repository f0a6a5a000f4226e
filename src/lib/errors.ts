/**
 * Error types raised by the analysis pipeline and its data sources.
 * An invalid wave pattern is not an error; it is reported through `isValid`.
 */
export class WaveAnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Raised when an operation cannot run on the data it was given (e.g. an empty series)
export class InsufficientDataError extends WaveAnalysisError {
  constructor(
    message: string,
    public readonly available: number,
    public readonly required: number
  ) {
    super(message);
  }
}

export class ValidationError extends WaveAnalysisError {
  constructor(message: string, public readonly details?: string[]) {
    super(message);
  }
}

// Wraps failures of the external data provider (network, unknown symbol, empty response)
export class DataSourceError extends WaveAnalysisError {
  constructor(message: string, public readonly symbol: string, public readonly cause?: unknown) {
    super(message);
  }
}
