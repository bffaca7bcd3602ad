export type ErrorKind =
  | 'invalid_assumptions'
  | 'incomplete_data'
  | 'invalid_input'
  | 'provider'
  | 'configuration';

export abstract class ValuationError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Discount rate not above terminal growth, or a malformed schedule/horizon. */
export class InvalidAssumptionsError extends ValuationError {
  readonly kind = 'invalid_assumptions';
}

export class IncompleteDataError extends ValuationError {
  readonly kind = 'incomplete_data';

  constructor(
    readonly fields: string[],
    readonly statementDate?: string,
  ) {
    super(
      `Statement${statementDate ? ` dated ${statementDate}` : ''} is missing required field(s): ${fields.join(', ')}`,
    );
  }
}

/** Bad ticker, or shares outstanding missing / not positive. */
export class InvalidInputError extends ValuationError {
  readonly kind = 'invalid_input';
}

export type ProviderFailure =
  | 'not_found'
  | 'rate_limited'
  | 'unauthorized'
  | 'bad_response'
  | 'network'
  | 'memo';

export class ProviderError extends ValuationError {
  readonly kind = 'provider';

  constructor(
    readonly reason: ProviderFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends ValuationError {
  readonly kind = 'configuration';
}

export const describeError = (error: unknown): string => {
  if (error instanceof ProviderError) {
    return `Error [provider/${error.reason}]: ${error.message}`;
  }
  if (error instanceof ValuationError) {
    return `Error [${error.kind}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Unexpected error: ${error.message}`;
  }
  return `Unexpected error: ${String(error)}`;
};
