export interface Clock {
  /** Wall-clock milliseconds since the Unix epoch; fractions are floored. */
  now(): number
}

export function readMillis(clock: Clock): bigint {
  return BigInt(Math.floor(clock.now()))
}

export const systemClock: Clock = {
  now: () => Date.now(),
}

export const PARK_MS = 0.001

// Never notified, so every wait runs to its timeout.
const parkCell = new Int32Array(new SharedArrayBuffer(4))

/** Gives up the processor for roughly `ms` milliseconds without a timer. */
export function park(ms: number = PARK_MS): void {
  Atomics.wait(parkCell, 0, 0, ms)
}
