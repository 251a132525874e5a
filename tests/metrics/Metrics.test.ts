import { afterEach, describe, expect, it } from 'vitest'
import { createLogger } from '../../src/logger'
import { SnowflakeMetrics } from '../../src/metrics'
import { ClockRegressedError, Snowflake } from '../../src/snowflake'
import { ManualClock } from '../support/clock'

describe('SnowflakeMetrics', () => {
  let metrics: SnowflakeMetrics | undefined

  afterEach(async () => {
    await metrics?.stop()
    metrics = undefined
  })

  function instrumented(clock: ManualClock, current: SnowflakeMetrics) {
    return new Snowflake(2, 5, {
      epoch: 0n,
      clock,
      park: () => {
        clock.current++
      },
      observer: current.observer(2, 5),
    })
  }

  it('counts issued IDs and clock regressions per generator', async () => {
    const current = new SnowflakeMetrics({ collectDefaultMetrics: false })
    metrics = current
    const clock = new ManualClock(1000)
    const generator = instrumented(clock, current)

    generator.nextId()
    generator.nextId()
    generator.nextId()
    clock.current = 999
    expect(() => generator.nextId()).toThrow(ClockRegressedError)

    const labels = { data_center: '2', machine: '5' }
    expect((await current.issued.get()).values).toEqual([expect.objectContaining({ value: 3, labels })])
    expect((await current.clockRegressions.get()).values).toEqual([
      expect.objectContaining({ value: 1, labels }),
    ])
  })

  it('counts exhausted milliseconds', async () => {
    const current = new SnowflakeMetrics({ collectDefaultMetrics: false })
    metrics = current
    const generator = instrumented(new ManualClock(1000), current)

    for (let i = 0; i < 4097; i++) {
      generator.nextId()
    }

    const values = (await current.sequenceExhausted.get()).values
    expect(values).toEqual([expect.objectContaining({ value: 1 })])
  })

  it('serves the registry on /metrics', async () => {
    const current = new SnowflakeMetrics({
      collectDefaultMetrics: false,
      logger: createLogger({ silent: true }),
    })
    metrics = current
    instrumented(new ManualClock(1000), current).nextId()

    const port = await current.start(0)
    const res = await fetch(`http://127.0.0.1:${port}/metrics`)
    const body = await res.text()

    expect(res.status).toBe(200)
    expect(body.split('\n')).toContain('snowflake_ids_issued_total{data_center="2",machine="5"} 1')
  })

  it('applies the metric name prefix', async () => {
    const current = new SnowflakeMetrics({ collectDefaultMetrics: false, prefix: 'idgen_' })
    metrics = current
    const text = await current.getRegistry().metrics()
    expect(text).toContain('# HELP idgen_snowflake_ids_issued_total IDs returned by nextId')
  })
})
