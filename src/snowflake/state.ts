import { InvalidConfigurationError } from './errors'
import { seqBits, seqMask } from './layout'

export const STATE_BYTES = BigInt64Array.BYTES_PER_ELEMENT

export type GenerationState = {
  lastTimestamp: bigint
  sequence: bigint
}

export const INITIAL_STATE: GenerationState = {
  lastTimestamp: -1n,
  sequence: 0n,
}

export function packState(state: GenerationState): bigint {
  return (state.lastTimestamp << seqBits) | (state.sequence & seqMask)
}

export function unpackState(packed: bigint): GenerationState {
  return {
    lastTimestamp: packed >> seqBits,
    sequence: packed & seqMask,
  }
}

/**
 * Holds the whole generation state as one value. Implementations must make
 * `compareAndSwap` atomic with respect to every other caller of `load`.
 */
export interface StateCell {
  load(): bigint
  compareAndSwap(expected: bigint, next: bigint): boolean
}

export class SharedStateCell implements StateCell {
  readonly buffer: SharedArrayBuffer
  private cell: BigInt64Array

  private constructor(buffer: SharedArrayBuffer) {
    this.buffer = buffer
    this.cell = new BigInt64Array(buffer, 0, 1)
  }

  static create(): SharedStateCell {
    const state = new SharedStateCell(new SharedArrayBuffer(STATE_BYTES))
    Atomics.store(state.cell, 0, packState(INITIAL_STATE))
    return state
  }

  static attach(buffer: unknown): SharedStateCell {
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new InvalidConfigurationError(
        'Generator state must be backed by a SharedArrayBuffer'
      )
    }
    if (buffer.byteLength < STATE_BYTES) {
      throw new InvalidConfigurationError(
        `Generator state buffer needs ${STATE_BYTES} bytes, got ${buffer.byteLength}`
      )
    }
    return new SharedStateCell(buffer)
  }

  load(): bigint {
    return Atomics.load(this.cell, 0)
  }

  compareAndSwap(expected: bigint, next: bigint): boolean {
    return Atomics.compareExchange(this.cell, 0, expected, next) === expected
  }
}
