import { once } from 'node:events'
import { availableParallelism } from 'node:os'
import { Worker } from 'node:worker_threads'
import { describe, expect, it } from 'vitest'
import { runConcurrentStress, runSequential, settleWorkers } from '../../src/bench'
import { Snowflake } from '../../src/snowflake'

describe('runSequential', () => {
  it('issues only distinct IDs from one thread', () => {
    const report = runSequential(new Snowflake(9, 29), 100_000)
    expect(report.count).toBe(100_000)
    expect(report.distinct).toBe(100_000)
  })
})

describe('runConcurrentStress', () => {
  it('keeps IDs unique across worker threads sharing one generator', async () => {
    const threads = availableParallelism()
    const idsPerThread = 1_000_000

    const report = await runConcurrentStress({
      threads,
      idsPerThread,
      dataCenterId: 9,
      machineId: 29,
    })

    expect(report.total).toBe(threads * idsPerThread)
    expect(report.distinct).toBe(threads * idsPerThread)
    expect(report.monotonic).toBe(true)
  })

  it('runs with a single worker', async () => {
    const report = await runConcurrentStress({
      threads: 1,
      idsPerThread: 10_000,
      dataCenterId: 0,
      machineId: 0,
      epoch: 0n,
    })
    expect(report).toMatchObject({ threads: 1, idsPerThread: 10_000, total: 10_000, distinct: 10_000, monotonic: true })
  })
})

describe('settleWorkers', () => {
  it('terminates the remaining workers when one fails', async () => {
    const failing = new Worker("throw new Error('worker failed')", { eval: true })
    const looping = new Worker('setInterval(() => {}, 1000)', { eval: true })
    const exited = once(looping, 'exit')

    await expect(settleWorkers([failing, looping])).rejects.toThrow('worker failed')
    const [code] = await exited
    expect(code).toBe(1)
  })
})
