import { InvalidConfigurationError } from '../snowflake/errors'

export type Env = Record<string, string | undefined>

export type AppConfig = {
  dataCenterId: number
  machineId: number
  /** Unset means the generator's default epoch. */
  epoch?: bigint
  /** Unset means no metrics server. */
  metricsPort?: number
  logLevel: string
}

// Get an optional environment variable with a default value
const getEnv = (env: Env, key: string, defaultValue: string): string => {
  return env[key] || defaultValue
}

export function parseInteger(key: string, raw: string): number {
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new InvalidConfigurationError(`${key} must be an integer, got "${raw}"`)
  }
  return parseInt(raw, 10)
}

function parseEpoch(key: string, raw: string): bigint {
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidConfigurationError(
      `${key} must be a non-negative integer of milliseconds, got "${raw}"`
    )
  }
  return BigInt(raw.trim())
}

/**
 * Reads generator settings from the environment. Range checks on the IDs are
 * left to the generator constructor.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    dataCenterId: parseInteger(
      'SNOWFLAKE_DATA_CENTER_ID',
      getEnv(env, 'SNOWFLAKE_DATA_CENTER_ID', '0')
    ),
    machineId: parseInteger('SNOWFLAKE_MACHINE_ID', getEnv(env, 'SNOWFLAKE_MACHINE_ID', '0')),
    logLevel: getEnv(env, 'LOG_LEVEL', 'info'),
  }

  if (env.SNOWFLAKE_EPOCH) {
    config.epoch = parseEpoch('SNOWFLAKE_EPOCH', env.SNOWFLAKE_EPOCH)
  }
  if (env.METRICS_PORT) {
    config.metricsPort = parseInteger('METRICS_PORT', env.METRICS_PORT)
  }

  return config
}
