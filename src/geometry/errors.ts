export type GeometryErrorCode = 'missing-parameter' | 'invalid-geometry';

export abstract class GeometryError extends Error {
  abstract readonly code: GeometryErrorCode;

  constructor(message: string, public readonly shape: string) {
    super(message);
  }
}

/** Required parameters are still absent after the bounded derivation passes. */
export class MissingParameterError extends GeometryError {
  readonly code = 'missing-parameter';

  constructor(shape: string, public readonly missing: string[], public readonly passes: number) {
    super(`Missing or invalid parameter(s) for ${shape}: ${missing.join(', ')}`, shape);
    this.name = 'MissingParameterError';
  }
}

/** Resolved values violate a geometric law or disagree with each other. */
export class InvalidGeometryError extends GeometryError {
  readonly code = 'invalid-geometry';

  constructor(
    shape: string,
    public readonly reason: string,
    public readonly values: Record<string, number> = {},
  ) {
    super(`Invalid ${shape}: ${reason}`, shape);
    this.name = 'InvalidGeometryError';
  }
}

/** A single formula was evaluated outside its domain. Absorbed by the engine. */
export class FormulaDomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormulaDomainError';
  }
}

export function isGeometryError(error: unknown): error is GeometryError {
  return error instanceof GeometryError;
}
