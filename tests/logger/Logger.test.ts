import { describe, expect, it } from 'vitest'
import { createLogger } from '../../src/logger'

describe('createLogger', () => {
  it('uses the requested level', () => {
    const logger = createLogger({ level: 'debug', silent: true })
    expect(logger.level).toBe('debug')
    expect(logger.silent).toBe(true)
  })

  it('tags records with the service name', () => {
    const logger = createLogger({ service: 'snowflake-test', silent: true })
    expect(logger.defaultMeta).toEqual({ service: 'snowflake-test' })
  })
})
