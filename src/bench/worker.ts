import { parentPort, workerData } from 'node:worker_threads'
import { performance } from 'node:perf_hooks'
import { Snowflake } from '../snowflake'
import type { StressWorkerData, StressWorkerResult } from './types'

function run(data: StressWorkerData): StressWorkerResult {
  const generator = Snowflake.fromShared(data.generator)
  const ids = new BigInt64Array(data.output, data.offset * 8, data.count)

  const started = performance.now()
  for (let i = 0; i < data.count; i++) {
    ids[i] = generator.nextId()
  }
  return { durationMs: performance.now() - started }
}

const data: StressWorkerData = workerData
parentPort?.postMessage(run(data))
