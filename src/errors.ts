export class InvalidConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'InvalidConfigError';
    this.field = field;
  }
}

export function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidConfigError(field, `must be an integer > 0; got ${value}`);
  }
  return value;
}

export function requireNonNegativeInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidConfigError(field, `must be an integer >= 0; got ${value}`);
  }
  return value;
}

export function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(field, `must be > 0; got ${value}`);
  }
  return value;
}
