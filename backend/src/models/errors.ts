export class RuntimeUnavailableError extends Error {
  readonly code = 'RuntimeUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeUnavailableError';
  }
}

export class ScanUnavailableError extends Error {
  readonly code = 'ScanUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanUnavailableError';
  }
}

export interface InvalidPortInput {
  index: number | null;
  value: unknown;
  reason: string;
}

export class InvalidPortError extends Error {
  readonly code = 'InvalidPort';

  constructor(readonly invalid: InvalidPortInput[]) {
    super(
      invalid.length === 1
        ? `Invalid port ${JSON.stringify(invalid[0].value)}: ${invalid[0].reason}`
        : `${invalid.length} invalid ports in request`,
    );
    this.name = 'InvalidPortError';
  }
}

export class PersistenceError extends Error {
  readonly code = 'PersistenceError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}
