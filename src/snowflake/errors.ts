export type SnowflakeErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'CLOCK_REGRESSED'
  | 'NOT_SHAREABLE'

export class SnowflakeError extends Error {
  readonly code: SnowflakeErrorCode

  constructor(code: SnowflakeErrorCode, message: string) {
    super(message)
    this.name = 'SnowflakeError'
    this.code = code
  }
}

export class InvalidConfigurationError extends SnowflakeError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message)
    this.name = 'InvalidConfigurationError'
  }
}

/**
 * Raised when the clock reads earlier than the last timestamp an ID was
 * stamped with. The generator state is left as it was.
 */
export class ClockRegressedError extends SnowflakeError {
  readonly lastTimestamp: bigint
  readonly currentTimestamp: bigint

  constructor(lastTimestamp: bigint, currentTimestamp: bigint) {
    super(
      'CLOCK_REGRESSED',
      `Clock moved backwards. Refusing to generate id for ${lastTimestamp - currentTimestamp} milliseconds`
    )
    this.name = 'ClockRegressedError'
    this.lastTimestamp = lastTimestamp
    this.currentTimestamp = currentTimestamp
  }

  get driftMs(): number {
    return Number(this.lastTimestamp - this.currentTimestamp)
  }
}

export function isSnowflakeError(value: unknown): value is SnowflakeError {
  return value instanceof SnowflakeError
}
