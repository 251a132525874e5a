import { type Clock, park, readMillis, systemClock } from './clock'
import {
  ClockRegressedError,
  InvalidConfigurationError,
  SnowflakeError,
} from './errors'
import {
  DEFAULT_EPOCH,
  MAX_DATA_CENTER_ID,
  MAX_MACHINE_ID,
  composeId,
  seqMask,
  timestampMask,
} from './layout'
import { SharedStateCell, type StateCell, packState, unpackState } from './state'

export * from './clock'
export * from './errors'
export * from './layout'
export * from './state'

export type SnowflakeObserver = {
  onIssued?: (id: bigint) => void
  onSequenceExhausted?: (timestamp: bigint) => void
  onContention?: () => void
  onClockRegressed?: (error: ClockRegressedError) => void
}

export type SnowflakeOptions = {
  epoch?: bigint
  clock?: Clock
  state?: StateCell
  observer?: SnowflakeObserver
  /** Called between clock samples and after a lost compare-and-swap. */
  park?: () => void
}

/** Everything another thread needs to generate from the same state. */
export type SharedSnowflake = {
  dataCenterId: number
  machineId: number
  epoch: bigint
  buffer: SharedArrayBuffer
}

function checkId(label: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidConfigurationError(
      `${label} (${value}) must be between 0 and ${max}`
    )
  }
}

export class Snowflake {
  readonly dataCenterId: number
  readonly machineId: number
  readonly epoch: bigint

  private clock: Clock
  private state: StateCell
  private observer: SnowflakeObserver
  private pause: () => void

  constructor(
    dataCenterId: number,
    machineId: number,
    options: SnowflakeOptions = {}
  ) {
    const clock = options.clock ?? systemClock
    const epoch = options.epoch ?? DEFAULT_EPOCH

    const now = readMillis(clock)
    if (epoch > now) {
      throw new InvalidConfigurationError(
        `Epoch (${epoch}) cannot be in the future`
      )
    }
    if (now - epoch > timestampMask) {
      throw new InvalidConfigurationError(
        `Epoch (${epoch}) is too far in the past for a 41-bit timestamp`
      )
    }
    checkId('Data Center ID', dataCenterId, MAX_DATA_CENTER_ID)
    checkId('Machine ID', machineId, MAX_MACHINE_ID)

    this.dataCenterId = dataCenterId
    this.machineId = machineId
    this.epoch = epoch
    this.clock = clock
    this.state = options.state ?? SharedStateCell.create()
    this.observer = options.observer ?? {}
    this.pause = options.park ?? (() => park())
  }

  static fromShared(
    shared: SharedSnowflake,
    options: Omit<SnowflakeOptions, 'epoch' | 'state'> = {}
  ): Snowflake {
    return new Snowflake(shared.dataCenterId, shared.machineId, {
      ...options,
      epoch: shared.epoch,
      state: SharedStateCell.attach(shared.buffer),
    })
  }

  share(): SharedSnowflake {
    if (!(this.state instanceof SharedStateCell)) {
      throw new SnowflakeError(
        'NOT_SHAREABLE',
        'Only generators backed by a SharedStateCell can be shared'
      )
    }
    return {
      dataCenterId: this.dataCenterId,
      machineId: this.machineId,
      epoch: this.epoch,
      buffer: this.state.buffer,
    }
  }

  nextId(): bigint {
    while (true) {
      const snapshot = this.state.load()
      const { lastTimestamp, sequence: lastSequence } = unpackState(snapshot)
      let timestamp = this.now()

      if (timestamp < lastTimestamp) {
        throw this.regressed(lastTimestamp, timestamp)
      }

      let sequence = 0n
      let exhausted = false
      if (timestamp === lastTimestamp) {
        sequence = (lastSequence + 1n) & seqMask
        if (sequence === 0n) {
          exhausted = true
          timestamp = this.waitNextMillis(lastTimestamp)
        }
      }

      if (this.state.compareAndSwap(snapshot, packState({ lastTimestamp: timestamp, sequence }))) {
        const id = composeId(
          {
            timestamp,
            dataCenterId: this.dataCenterId,
            machineId: this.machineId,
            sequence: Number(sequence),
          },
          this.epoch
        )
        if (exhausted) {
          this.observer.onSequenceExhausted?.(lastTimestamp)
        }
        this.observer.onIssued?.(id)
        return id
      }

      // Another caller committed first; start over from its state.
      this.observer.onContention?.()
      this.pause()
    }
  }

  private now(): bigint {
    return readMillis(this.clock)
  }

  private waitNextMillis(lastTimestamp: bigint): bigint {
    let timestamp = this.now()
    while (timestamp <= lastTimestamp) {
      if (timestamp < lastTimestamp) {
        throw this.regressed(lastTimestamp, timestamp)
      }
      this.pause()
      timestamp = this.now()
    }
    return timestamp
  }

  private regressed(lastTimestamp: bigint, timestamp: bigint): ClockRegressedError {
    const error = new ClockRegressedError(lastTimestamp, timestamp)
    this.observer.onClockRegressed?.(error)
    return error
  }
}
