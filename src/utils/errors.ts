export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProviderError extends Error {
  constructor(message: string, public readonly status: number | null = null) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class StoreUnavailableError extends Error {
  constructor(message: string, public readonly dbPath: string) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

// Raised when a row would violate the NOT NULL identity columns, e.g. a payload with no results.
export class IncompleteObservationError extends Error {
  constructor(public readonly missingFields: string[]) {
    super(`Observation is missing identity fields: ${missingFields.join(', ')}`);
    this.name = 'IncompleteObservationError';
  }
}

export class InvalidQueryError extends Error {
  constructor(public readonly param: string, message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
