export type AnalyticsErrorCode = 'SCHEMA' | 'INSUFFICIENT_CARDINALITY' | 'CONTRACT_VIOLATION';

export class AnalyticsError extends Error {
  constructor(
    message: string,
    public readonly code: AnalyticsErrorCode
  ) {
    super(message);
    this.name = 'AnalyticsError';
  }
}

/**
 * Input is missing required fields or carries values of the wrong type.
 * Raised before any computation starts.
 */
export class SchemaError extends AnalyticsError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'SCHEMA');
    this.name = 'SchemaError';
  }
}

export class InsufficientCardinalityError extends AnalyticsError {
  constructor(
    public readonly date: string | number,
    public readonly required: number,
    public readonly available: number
  ) {
    super(
      `Cannot form ${required} buckets on ${String(date)}: only ${available} ranked observations`,
      'INSUFFICIENT_CARDINALITY'
    );
    this.name = 'InsufficientCardinalityError';
  }
}

export class ContractViolationError extends AnalyticsError {
  constructor(message: string) {
    super(message, 'CONTRACT_VIOLATION');
    this.name = 'ContractViolationError';
  }
}
