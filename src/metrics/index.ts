import { once } from 'node:events'
import type { Server } from 'node:http'
import express, { type Application } from 'express'
import * as prometheus from 'prom-client'
import type { Logger } from 'winston'
import type { SnowflakeObserver } from '../snowflake'

const LABEL_NAMES = ['data_center', 'machine'] as const

type GeneratorLabel = (typeof LABEL_NAMES)[number]

export type MetricsOptions = {
  prefix?: string
  collectDefaultMetrics?: boolean
  defaultLabels?: Record<string, string>
  logger?: Logger
}

/**
 * Prometheus counters for one or more generators, plus a small express app
 * serving them on `/metrics`.
 */
export class SnowflakeMetrics {
  readonly issued: prometheus.Counter<GeneratorLabel>
  readonly sequenceExhausted: prometheus.Counter<GeneratorLabel>
  readonly casRetries: prometheus.Counter<GeneratorLabel>
  readonly clockRegressions: prometheus.Counter<GeneratorLabel>

  private app: Application
  private registry: prometheus.Registry
  private logger?: Logger
  private server?: Server

  constructor(options: MetricsOptions = {}) {
    const app = express()
    this.app = app

    const registry = new prometheus.Registry()
    this.registry = registry
    this.logger = options.logger

    app.get('/metrics', async (_req, res) => {
      res.set('content-type', registry.contentType)
      res.end(await registry.metrics())
    })

    if (options.collectDefaultMetrics !== false) {
      prometheus.collectDefaultMetrics({
        prefix: options.prefix || '',
        register: registry,
        gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
      })
    }

    if (options.defaultLabels) {
      registry.setDefaultLabels(options.defaultLabels)
    }

    const counter = (name: string, help: string) =>
      new prometheus.Counter<GeneratorLabel>({
        name: `${options.prefix || ''}${name}`,
        help,
        labelNames: LABEL_NAMES,
        registers: [registry],
      })

    this.issued = counter('snowflake_ids_issued_total', 'IDs returned by nextId')
    this.sequenceExhausted = counter(
      'snowflake_sequence_exhausted_total',
      'Times a millisecond ran out of sequence numbers'
    )
    this.casRetries = counter(
      'snowflake_cas_retries_total',
      'Lost compare-and-swap attempts on the generator state'
    )
    this.clockRegressions = counter(
      'snowflake_clock_regressions_total',
      'Clock regressions detected while generating'
    )
  }

  /** Observer that feeds these counters; pass it to a generator's options. */
  observer(dataCenterId: number, machineId: number): SnowflakeObserver {
    const labels = {
      data_center: String(dataCenterId),
      machine: String(machineId),
    }
    return {
      onIssued: () => this.issued.inc(labels),
      onSequenceExhausted: () => this.sequenceExhausted.inc(labels),
      onContention: () => this.casRetries.inc(labels),
      onClockRegressed: () => this.clockRegressions.inc(labels),
    }
  }

  async start(port: number): Promise<number> {
    const server = this.app.listen(port)
    await once(server, 'listening')
    this.server = server

    const address = server.address()
    const bound = typeof address === 'object' && address !== null ? address.port : port
    this.logger?.info('metrics server listening', { port: bound })
    return bound
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }
    this.server = undefined
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
    })
  }

  getRegistry(): prometheus.Registry {
    return this.registry
  }
}
