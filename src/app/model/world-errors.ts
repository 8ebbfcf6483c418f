export type WorldErrorCode = 'InvalidDimensions' | 'MalformedGrid' | 'InvalidConfiguration';

export class WorldError extends Error {
  constructor(
    public readonly code: WorldErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'WorldError';
  }
}

export class InvalidDimensionsError extends WorldError {
  constructor(
    public readonly width: number,
    public readonly height: number,
    message?: string
  ) {
    super('InvalidDimensions', message || `Grid dimensions must be positive integers, got ${width}x${height}`);
    this.name = 'InvalidDimensionsError';
  }
}

export class MalformedGridError extends WorldError {
  constructor(message: string) {
    super('MalformedGrid', message);
    this.name = 'MalformedGridError';
  }
}

export class InvalidConfigurationError extends WorldError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super('InvalidConfiguration', message);
    this.name = 'InvalidConfigurationError';
  }
}
