export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MigrationError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class ConfigurationError extends MigrationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class NotFoundError extends MigrationError {
  constructor(resource: string, name: string, listing?: string) {
    const message = listing
      ? `${resource} ${name} not found in ${listing}`
      : `${resource} ${name} not found`;
    super(message, 'NOT_FOUND', { resource, name });
    this.name = 'NotFoundError';
  }
}

export class InsufficientBalanceError extends MigrationError {
  constructor(asset: string, available: string, hint?: string) {
    super(
      `No ${asset} available on Spot (free: ${available})${hint ? `. ${hint}` : ''}`,
      'INSUFFICIENT_BALANCE',
      { asset, available }
    );
    this.name = 'InsufficientBalanceError';
  }
}

export class NonActionableAmountError extends MigrationError {
  constructor(asset: string, requested: string, quantized: string, decimals: number) {
    super(
      `Computed ${asset} amount ${quantized} <= 0 after rounding ${requested} to ${decimals} decimals`,
      'NON_ACTIONABLE_AMOUNT',
      { asset, requested, quantized, decimals }
    );
    this.name = 'NonActionableAmountError';
  }
}

export class VenueRequestError extends MigrationError {
  constructor(operation: string, reason: string, details?: Record<string, unknown>) {
    super(`Venue request ${operation} failed: ${reason}`, 'VENUE_REQUEST_FAILED', {
      operation,
      ...details,
    });
    this.name = 'VenueRequestError';
  }
}

export function isMigrationError(error: unknown): error is MigrationError {
  return error instanceof MigrationError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
