import winston, { format, type Logger } from 'winston'

export type { Logger } from 'winston'

export type LoggerOptions = {
  level?: string
  service?: string
  silent?: boolean
}

const HIDDEN_KEYS = ['timestamp', 'service', 'level', 'message']

// Metadata may carry bigint IDs, which JSON.stringify rejects.
function stringifyMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  )
}

export const consoleFormat = format.printf((info) => {
  const meta = Object.fromEntries(
    Object.entries(info).filter(([key]) => !HIDDEN_KEYS.includes(key))
  )
  const suffix = Object.keys(meta).length > 0 ? ` ${stringifyMeta(meta)}` : ''
  return `${info.timestamp} ${info.level}: ${info.message}${suffix}`
})

export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level || process.env.LOG_LEVEL || 'info',
    silent: options.silent,
    format: format.combine(
      format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      format.errors({ stack: true }),
      format.splat()
    ),
    defaultMeta: { service: options.service || 'snowflake' },
    transports: [
      new winston.transports.Console({
        format: format.combine(format.colorize(), consoleFormat),
      }),
    ],
  })
}
