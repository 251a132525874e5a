#!/usr/bin/env node

import 'dotenv/config'
import { availableParallelism } from 'node:os'
import { runConcurrentStress, runSequential } from '../src/bench'
import { type AppConfig, loadConfig, parseInteger } from '../src/config'
import { createLogger } from '../src/logger'
import { SnowflakeMetrics } from '../src/metrics'
import { Snowflake } from '../src/snowflake'

interface Args {
  threads: number
  idsPerThread: number
  sequential: boolean
  metricsPort?: number
}

function parseArgs(config: AppConfig): Args {
  const args = process.argv.slice(2)
  const parsed: Partial<Args> = {}

  for (let i = 0; i < args.length; i += 2) {
    const flag = args[i]
    const value = args[i + 1] ?? ''

    switch (flag) {
      case '--threads':
        parsed.threads = parseInteger(flag, value)
        break
      case '--ids-per-thread':
        parsed.idsPerThread = parseInteger(flag, value)
        break
      case '--skip-sequential':
        parsed.sequential = false
        i-- // No value needed for this flag
        break
      case '--metrics-port':
        parsed.metricsPort = parseInteger(flag, value)
        break
    }
  }

  // Check for environment variables as fallback
  const env = process.env
  return {
    threads: parsed.threads ?? parseInteger('BENCH_THREADS', env.BENCH_THREADS || String(availableParallelism())),
    idsPerThread:
      parsed.idsPerThread ?? parseInteger('BENCH_IDS_PER_THREAD', env.BENCH_IDS_PER_THREAD || '1000000'),
    sequential: parsed.sequential ?? true,
    metricsPort: parsed.metricsPort ?? config.metricsPort,
  }
}

async function main() {
  const logger = createLogger({ service: 'snowflake-benchmark' })
  let metrics: SnowflakeMetrics | undefined

  try {
    const config = loadConfig()
    const args = parseArgs(config)
    const { dataCenterId, machineId, epoch } = config

    if (args.metricsPort !== undefined) {
      metrics = new SnowflakeMetrics({ logger })
      await metrics.start(args.metricsPort)
    }

    if (args.sequential) {
      const generator = new Snowflake(dataCenterId, machineId, {
        epoch,
        observer: metrics?.observer(dataCenterId, machineId),
      })
      const count = args.threads * args.idsPerThread
      const report = runSequential(generator, count)
      logger.info(
        `Generated ${report.count} IDs (${report.distinct} distinct) in ${(report.durationMs / 1000).toFixed(3)} seconds`
      )
      if (report.distinct !== report.count) {
        throw new Error(`Duplicate IDs detected: ${report.count - report.distinct}`)
      }
    }

    logger.info(`Starting ${args.threads} workers, ${args.idsPerThread} IDs each`)
    const report = await runConcurrentStress({
      threads: args.threads,
      idsPerThread: args.idsPerThread,
      dataCenterId,
      machineId,
      epoch,
    })
    logger.info(
      `Generated ${report.total} IDs concurrently (${report.distinct} distinct) in ${(report.durationMs / 1000).toFixed(3)} seconds`,
      { monotonic: report.monotonic }
    )
    if (report.distinct !== report.total) {
      throw new Error(`Duplicate IDs detected: ${report.total - report.distinct}`)
    }
  } catch (error) {
    logger.error(`Benchmark failed: ${error instanceof Error ? error.message : String(error)}`)
    process.exitCode = 1
  } finally {
    await metrics?.stop()
  }
}

main().catch(console.error)
