import { describe, expect, it } from 'vitest'
import { loadConfig, parseInteger } from '../../src/config'
import { InvalidConfigurationError } from '../../src/snowflake'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ dataCenterId: 0, machineId: 0, logLevel: 'info' })
  })

  it('reads every setting from the environment', () => {
    expect(
      loadConfig({
        SNOWFLAKE_DATA_CENTER_ID: '3',
        SNOWFLAKE_MACHINE_ID: '7',
        SNOWFLAKE_EPOCH: '1700000000000',
        METRICS_PORT: '9464',
        LOG_LEVEL: 'debug',
      })
    ).toEqual({
      dataCenterId: 3,
      machineId: 7,
      epoch: 1700000000000n,
      metricsPort: 9464,
      logLevel: 'debug',
    })
  })

  it('leaves range checks to the generator', () => {
    expect(loadConfig({ SNOWFLAKE_DATA_CENTER_ID: '64' }).dataCenterId).toBe(64)
  })

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ SNOWFLAKE_MACHINE_ID: 'abc' })).toThrow(
      'SNOWFLAKE_MACHINE_ID must be an integer, got "abc"'
    )
    expect(() => loadConfig({ SNOWFLAKE_EPOCH: '-5' })).toThrow(InvalidConfigurationError)
    expect(() => loadConfig({ METRICS_PORT: '94.64' })).toThrow(InvalidConfigurationError)
  })
})

describe('parseInteger', () => {
  it('accepts signed integers only', () => {
    expect(parseInteger('--threads', '8')).toBe(8)
    expect(parseInteger('--threads', '-1')).toBe(-1)
    expect(() => parseInteger('--threads', '')).toThrow('--threads must be an integer, got ""')
  })
})
