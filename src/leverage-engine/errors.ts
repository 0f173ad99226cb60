// Every engine failure is a caller-input defect: reported synchronously,
// never retried, and never accompanied by a partial result.

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

/** An evidence scalar outside [0.0, 1.0] or not a finite number. */
export class DomainError extends EngineError {
  constructor(
    public readonly field: string,
    public readonly value: number,
  ) {
    super(`${field} must be a finite number in [0.0, 1.0], got ${value}`);
    this.name = 'DomainError';
  }
}

/** Evaluation was handed a score that Scoring could never have produced. */
export class ContractError extends EngineError {
  constructor(message: string) {
    super(message);
    this.name = 'ContractError';
  }
}

export class UnknownFlagError extends EngineError {
  constructor(public readonly unknownFlags: readonly string[]) {
    super(`Unknown settlement flag(s): ${unknownFlags.join(', ')}`);
    this.name = 'UnknownFlagError';
  }
}
