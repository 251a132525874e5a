import type { Clock } from '../../src/snowflake'

export class ManualClock implements Clock {
  current: number
  reads = 0

  constructor(current: number) {
    this.current = current
  }

  now(): number {
    this.reads++
    return this.current
  }
}
