import type { SharedSnowflake } from '../snowflake'

export type StressWorkerData = {
  generator: SharedSnowflake
  output: SharedArrayBuffer
  offset: number
  count: number
}

export type StressWorkerResult = {
  durationMs: number
}

export type StressOptions = {
  threads: number
  idsPerThread: number
  dataCenterId: number
  machineId: number
  epoch?: bigint
}

export type StressReport = {
  threads: number
  idsPerThread: number
  total: number
  distinct: number
  /** Every worker saw strictly increasing IDs in call order. */
  monotonic: boolean
  durationMs: number
}

export type SequentialReport = {
  count: number
  distinct: number
  durationMs: number
}
