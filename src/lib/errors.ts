/**
 * Raised when the ledger file cannot be read as a list of well-formed picks.
 * Fatal to the command that loaded it.
 */
export class MalformedLedgerError extends Error {
  constructor(message: string, readonly recordIndex?: number) {
    super(recordIndex === undefined ? message : `record ${recordIndex}: ${message}`);
    this.name = 'MalformedLedgerError';
  }
}

/** Transient provider failure. Never leaves the results source. */
export class LookupTransportError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'LookupTransportError';
  }
}

/** An outcome was found but could not be applied to the pick. */
export class OutcomeMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutcomeMismatchError';
  }
}

export class InvalidWindowError extends Error {
  constructor(readonly token: string) {
    super(`Invalid period: ${token} (expected daily, weekly, monthly or all)`);
    this.name = 'InvalidWindowError';
  }
}

export class InvalidPickError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPickError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
