export type RecordSide = 'predicted' | 'observed';

/**
 * Thrown before any score is computed when a weight, a sigma or the mass
 * tolerance is unusable.
 */
export class InvalidConfigurationError extends Error {
  readonly code = 'INVALID_CONFIGURATION';
  readonly parameter: string;

  constructor(parameter: string, message: string) {
    super(message);
    this.name = 'InvalidConfigurationError';
    this.parameter = parameter;
  }
}

/**
 * Thrown when an input record is structurally corrupt, for example a
 * spectrum whose m/z and intensity arrays differ in length.
 */
export class MalformedRecordError extends Error {
  readonly code = 'MALFORMED_RECORD';
  readonly side: RecordSide;
  readonly index: number;

  constructor(
    side: RecordSide,
    index: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${side} record ${String(index)}: ${message}`, options);
    this.name = 'MalformedRecordError';
    this.side = side;
    this.index = index;
  }
}
