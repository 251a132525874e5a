#!/usr/bin/env node

import 'dotenv/config'
import { type AppConfig, loadConfig, parseInteger } from '../src/config'
import { createLogger } from '../src/logger'
import { Snowflake, decomposeId, toBinaryString } from '../src/snowflake'

interface Args {
  dataCenterId: number
  machineId: number
  count: number
}

function parseArgs(config: AppConfig): Args {
  const args = process.argv.slice(2)
  const parsed: Partial<Args> = {}

  for (let i = 0; i < args.length; i += 2) {
    const flag = args[i]
    const value = args[i + 1] ?? ''

    switch (flag) {
      case '--data-center-id':
        parsed.dataCenterId = parseInteger(flag, value)
        break
      case '--machine-id':
        parsed.machineId = parseInteger(flag, value)
        break
      case '--count':
        parsed.count = parseInteger(flag, value)
        break
    }
  }

  // Environment fallback, then the demo's own defaults
  const env = process.env
  return {
    dataCenterId: parsed.dataCenterId ?? (env.SNOWFLAKE_DATA_CENTER_ID ? config.dataCenterId : 1),
    machineId: parsed.machineId ?? (env.SNOWFLAKE_MACHINE_ID ? config.machineId : 19),
    count: parsed.count ?? 1,
  }
}

function main() {
  const logger = createLogger({ service: 'snowflake-demo' })

  try {
    const config = loadConfig()
    const args = parseArgs(config)
    const generator = new Snowflake(args.dataCenterId, args.machineId, {
      epoch: config.epoch,
    })

    for (let i = 0; i < args.count; i++) {
      const id = generator.nextId()
      const fields = decomposeId(id, generator.epoch)
      logger.info(`Generated Snowflake ID: ${id}`)
      logger.info(`In Binary Form: ${toBinaryString(id)}`, {
        timestamp: new Date(Number(fields.timestamp)).toISOString(),
        dataCenterId: fields.dataCenterId,
        machineId: fields.machineId,
        sequence: fields.sequence,
      })
    }
  } catch (error) {
    logger.error(`Demo failed: ${error instanceof Error ? error.message : String(error)}`)
    process.exitCode = 1
  }
}

main()
