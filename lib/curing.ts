// lib/curing.ts
import type { CalculationResult, InkType, RollerType, Substrate, VolumeSpec } from './types'
import {
  BASE_POWER, DEFAULT_TRANSFER_RANGE, DEFAULT_TRANSFER_VALUE, INK_FACTORS, MAX_POWER,
  MEDIUM_TRANSFER_G_PER_M2, MIN_POWER, SUBSTRATE_FACTORS, TRANSFER_RANGES, VOLUME_SPECS,
} from './defaults'

const clamp = (n: number, a: number, b: number) => Math.max(a, Math.min(b, n))

/**
 * One decimal, decided on the exact binary value of `n` (2.35 is stored just
 * above 2.35, so it goes up). Exact ties, x.25 and x.75, go to the even digit.
 */
export function roundTo1Decimal(n: number): number {
  const quarters = n * 4
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const down = Math.floor(n * 10)
    return (down % 2 === 0 ? down : down + 1) / 10
  }
  return Number(n.toFixed(1))
}

const hasKey = <K extends string>(table: Readonly<Record<K, unknown>>, key: string): key is K =>
    Object.prototype.hasOwnProperty.call(table, key)

export const isSubstrate = (v: string): v is Substrate => hasKey(SUBSTRATE_FACTORS, v)
export const isInkType = (v: string): v is InkType => hasKey(INK_FACTORS, v)
export const isRollerType = (v: string): v is RollerType => hasKey(VOLUME_SPECS, v)

// Unknown keys never throw: every lookup below degrades to a documented default.

export function getVolumeSpecs(rollerType: string): readonly VolumeSpec[] {
  return isRollerType(rollerType) ? VOLUME_SPECS[rollerType] : []
}

export function getVolumeSpec(rollerType: string, volume: string): VolumeSpec | undefined {
  return getVolumeSpecs(rollerType).find(s => s.volume === volume)
}

export function getBcmFromVolume(rollerType: string, volume: string): number {
  return getVolumeSpec(rollerType, volume)?.bcm ?? 0
}

export function getTransferFromVolume(rollerType: string, volume: string): string {
  return getVolumeSpec(rollerType, volume)?.transfer ?? DEFAULT_TRANSFER_VALUE
}

const TRANSFER_RE = /^(\d+(?:\.\d+)?) g\/m²$/

/**
 * Leading number of a table transfer string ("2.5 g/m²" -> 2.5).
 * The strings are compile-time constants, so a mismatch is a bug in the table.
 */
export function parseTransferAmount(transfer: string): number {
  const m = TRANSFER_RE.exec(transfer)
  if (!m) throw new Error(`Malformed transfer amount in roller table: "${transfer}"`)
  return Number(m[1])
}

/**
 * Scales the roller's average transfer efficiency by how much ink the chosen
 * volume lays down relative to a medium (3.0 g/m²) transfer.
 */
export function calculateTransferFactor(rollerType: string, volume: string): number {
  const [low, high] = isRollerType(rollerType) ? TRANSFER_RANGES[rollerType] : DEFAULT_TRANSFER_RANGE
  const transferAvg = (low + high) / 2

  const spec = getVolumeSpec(rollerType, volume)
  if (!spec) return transferAvg

  return transferAvg * (parseTransferAmount(spec.transfer) / MEDIUM_TRANSFER_G_PER_M2)
}

/**
 * Recommended UV power (%) with the contribution of each factor.
 * Pure: the BCM range is enforced by the caller, not here.
 */
export function calculatePower(
    substrate: string,
    inkType: string,
    bcm: number,
    rollerType: string,
    volume: string,
): CalculationResult {
  const substrateFactor = isSubstrate(substrate) ? SUBSTRATE_FACTORS[substrate] : 1.0
  const inkFactor = isInkType(inkType) ? INK_FACTORS[inkType] : 1.0
  const transferFactor = calculateTransferFactor(rollerType, volume)
  const bcmFactor = bcm * 0.1

  let power = BASE_POWER * substrateFactor * inkFactor * (1 + bcmFactor)
  power = power * (1 + transferFactor)
  power = clamp(power, MIN_POWER, MAX_POWER)

  return {
    basePower: BASE_POWER,
    substrateContribution: (substrateFactor - 1) * 100,
    inkContribution: (inkFactor - 1) * 100,
    bcmContribution: bcmFactor * 100,
    transferFactor: transferFactor * 100,
    transferValue: getTransferFromVolume(rollerType, volume),
    finalPower: roundTo1Decimal(power),
  }
}
