// lib/validation.ts
import type { CalculationForm, CalculationInput, ValidationResult } from './types'
import { getBcmFromVolume, getVolumeSpecs, isInkType, isRollerType, isSubstrate } from './curing'

export const BCM_MAX = 20
export const BCM_ERROR = 'BCM waarde moet tussen 0 en 20 liggen.'

// Typical BCM range for flexographic printing: 0 < bcm <= 20
export function validateBcm(bcm: number): boolean {
  return Number.isFinite(bcm) && bcm > 0 && bcm <= BCM_MAX
}

/** Keeps a label the roller offers, else the roller's first (smallest) volume. */
export function resolveVolume(rollerType: string, volume?: string): string | undefined {
  const specs = getVolumeSpecs(rollerType)
  if (volume && specs.some(s => s.volume === volume)) return volume
  return specs[0]?.volume
}

export function collectCalculationInput(form: CalculationForm): ValidationResult<CalculationInput> {
  const substrate = (form.substrate ?? '').trim()
  const inkType = (form.inkType ?? '').trim()
  const rollerType = (form.rollerType ?? '').trim()

  if (!isSubstrate(substrate)) return { valid: false, error: `Onbekend substraat: "${substrate}"` }
  if (!isInkType(inkType)) return { valid: false, error: `Onbekende inktsoort: "${inkType}"` }
  if (!isRollerType(rollerType)) return { valid: false, error: `Onbekend rasterwals type: "${rollerType}"` }

  const volume = resolveVolume(rollerType, form.volume)
  if (!volume) return { valid: false, error: `Geen volumes bekend voor ${rollerType}` }

  const bcm = getBcmFromVolume(rollerType, volume)
  if (!validateBcm(bcm)) return { valid: false, error: BCM_ERROR }

  return { valid: true, value: { substrate, inkType, rollerType, volume, bcm } }
}
