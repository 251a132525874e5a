import { existsSync } from 'node:fs'
import path from 'node:path'
import { performance } from 'node:perf_hooks'
import { Worker } from 'node:worker_threads'
import { buildSync } from 'esbuild'
import { Snowflake } from '../snowflake'
import type {
  SequentialReport,
  StressOptions,
  StressReport,
  StressWorkerData,
  StressWorkerResult,
} from './types'

export * from './types'

let bundledWorker: string | undefined

// Compiled builds ship worker.js next to this file. From sources the worker
// is bundled once with esbuild and run as an eval'd CommonJS script.
function spawnWorker(workerData: StressWorkerData): Worker {
  const compiled = path.join(__dirname, 'worker.js')
  if (existsSync(compiled)) {
    return new Worker(compiled, { workerData })
  }

  if (bundledWorker === undefined) {
    const result = buildSync({
      entryPoints: [path.join(__dirname, 'worker.ts')],
      bundle: true,
      platform: 'node',
      format: 'cjs',
      target: 'node20',
      write: false,
    })
    bundledWorker = result.outputFiles[0].text
  }
  return new Worker(bundledWorker, { eval: true, workerData })
}

function runWorker(worker: Worker): Promise<StressWorkerResult> {
  return new Promise((resolve, reject) => {
    let result: StressWorkerResult | undefined

    worker.once('message', (message: StressWorkerResult) => {
      result = message
    })
    worker.once('error', reject)
    worker.once('exit', (code) => {
      if (result) {
        resolve(result)
      } else {
        reject(new Error(`Stress worker exited with code ${code} before reporting`))
      }
    })
  })
}

/** Waits for every worker; on the first failure the rest are terminated. */
export async function settleWorkers(workers: Worker[]): Promise<StressWorkerResult[]> {
  try {
    return await Promise.all(workers.map(runWorker))
  } catch (error) {
    await Promise.all(workers.map((worker) => worker.terminate()))
    throw error
  }
}

function countDistinct(ids: BigInt64Array): number {
  if (ids.length === 0) {
    return 0
  }
  const sorted = ids.slice().sort()
  let distinct = 1
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] !== sorted[i - 1]) {
      distinct++
    }
  }
  return distinct
}

function isStrictlyIncreasing(ids: BigInt64Array): boolean {
  for (let i = 1; i < ids.length; i++) {
    if (ids[i] <= ids[i - 1]) {
      return false
    }
  }
  return true
}

export function runSequential(generator: Snowflake, count: number): SequentialReport {
  const seen = new Set<bigint>()
  const started = performance.now()
  for (let i = 0; i < count; i++) {
    seen.add(generator.nextId())
  }
  return {
    count,
    distinct: seen.size,
    durationMs: performance.now() - started,
  }
}

/**
 * Drives one shared generator from `threads` worker threads, each issuing
 * `idsPerThread` IDs into its own slice of a shared output buffer.
 */
export async function runConcurrentStress(options: StressOptions): Promise<StressReport> {
  const { threads, idsPerThread } = options
  const generator = new Snowflake(options.dataCenterId, options.machineId, {
    epoch: options.epoch,
  }).share()

  const total = threads * idsPerThread
  const output = new SharedArrayBuffer(total * BigInt64Array.BYTES_PER_ELEMENT)

  const started = performance.now()
  await settleWorkers(
    Array.from({ length: threads }, (_, i) =>
      spawnWorker({ generator, output, offset: i * idsPerThread, count: idsPerThread })
    )
  )
  const durationMs = performance.now() - started

  const ids = new BigInt64Array(output)
  let monotonic = true
  for (let i = 0; i < threads; i++) {
    if (!isStrictlyIncreasing(ids.subarray(i * idsPerThread, (i + 1) * idsPerThread))) {
      monotonic = false
    }
  }

  return {
    threads,
    idsPerThread,
    total,
    distinct: countDistinct(ids),
    monotonic,
    durationMs,
  }
}
