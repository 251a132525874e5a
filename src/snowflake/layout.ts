export const DEFAULT_EPOCH = 1725148800000n // 2024-09-01T00:00:00Z

export const timestampBits = 41n
export const dataCenterBits = 5n
export const machineBits = 5n
export const seqBits = 12n

export const MAX_DATA_CENTER_ID = Number((1n << dataCenterBits) - 1n)
export const MAX_MACHINE_ID = Number((1n << machineBits) - 1n)
export const SEQUENCE_SPACE = 1n << seqBits

export const timestampMask = (1n << timestampBits) - 1n
export const dataCenterMask = (1n << dataCenterBits) - 1n
export const machineMask = (1n << machineBits) - 1n
export const seqMask = SEQUENCE_SPACE - 1n

export const seqShift = 0n
export const machineShift = seqBits
export const dataCenterShift = seqBits + machineBits
export const timeShift = seqBits + machineBits + dataCenterBits

export type SnowflakeFields = {
  /** Absolute wall-clock milliseconds, not shifted by the epoch. */
  timestamp: bigint
  dataCenterId: number
  machineId: number
  sequence: number
}

export function composeId(fields: SnowflakeFields, epoch: bigint): bigint {
  const tsPart = ((fields.timestamp - epoch) & timestampMask) << timeShift
  const dcPart = (BigInt(fields.dataCenterId) & dataCenterMask) << dataCenterShift
  const machPart = (BigInt(fields.machineId) & machineMask) << machineShift
  const seqPart = (BigInt(fields.sequence) & seqMask) << seqShift
  return tsPart | dcPart | machPart | seqPart
}

export function decomposeId(id: bigint, epoch: bigint): SnowflakeFields {
  return {
    timestamp: ((id >> timeShift) & timestampMask) + epoch,
    dataCenterId: Number((id >> dataCenterShift) & dataCenterMask),
    machineId: Number((id >> machineShift) & machineMask),
    sequence: Number((id >> seqShift) & seqMask),
  }
}

export function toBinaryString(id: bigint): string {
  return BigInt.asUintN(64, id).toString(2).padStart(64, '0')
}
