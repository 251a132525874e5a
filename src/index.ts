export * from './snowflake'
export * from './metrics'
export * from './bench'
export { loadConfig, parseInteger } from './config'
export type { AppConfig, Env } from './config'
export { createLogger } from './logger'
export type { Logger, LoggerOptions } from './logger'
