export class InvariantViolationError extends Error {
  readonly invariant: string;

  constructor(invariant: string, message: string) {
    super(`Invariant "${invariant}" violated: ${message}`);
    this.name = 'InvariantViolationError';
    this.invariant = invariant;
  }
}

export const assertNever = (value: never, invariant: string, label: string): never => {
  throw new InvariantViolationError(invariant, `unrecognized ${label} ${JSON.stringify(value)}`);
};
