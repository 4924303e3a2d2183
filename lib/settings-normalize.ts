// lib/settings-normalize.ts
import type { CalculationInput, CalculationResult, SavedSetting } from './types'

const toNum = (v: unknown): number | undefined => {
  if (typeof v === 'number' && Number.isFinite(v)) return v
  if (typeof v === 'string' && v.trim()) {
    const n = Number(v.trim())
    return Number.isFinite(n) ? n : undefined
  }
  return undefined
}

const toStr = (v: unknown): string | undefined =>
    typeof v === 'string' && v.trim() ? v : undefined

const isRecord = (v: unknown): v is Record<string, unknown> =>
    !!v && typeof v === 'object' && !Array.isArray(v)

// strip BOM + trim keys, drop empty keys/values
const cleanFlatObject = (o: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {}
  for (const [rawK, v] of Object.entries(o)) {
    const k = (rawK || '').replace(/^\uFEFF/, '').trim()
    if (!k) continue
    if (v === '' || v == null) continue
    out[k] = v
  }
  return out
}

/** One stored record, or null when a required field is missing. */
export function coerceSavedSetting(raw: unknown): SavedSetting | null {
  if (!isRecord(raw)) return null
  const r = cleanFlatObject(raw)

  const substraat = toStr(r.substraat)
  const inktsoort = toStr(r.inktsoort)
  const rasterwals_type = toStr(r.rasterwals_type)
  const volume = toStr(r.volume)
  const bcm = toNum(r.bcm)
  const vermogen = toNum(r.vermogen)
  const transfer = toStr(r.transfer)

  if (
    substraat === undefined || inktsoort === undefined || rasterwals_type === undefined ||
    volume === undefined || bcm === undefined || vermogen === undefined || transfer === undefined
  ) return null

  return { substraat, inktsoort, rasterwals_type, volume, bcm, vermogen, transfer }
}

export function coerceSavedSettings(raw: unknown): SavedSetting[] {
  if (!Array.isArray(raw)) return []
  const out: SavedSetting[] = []
  for (const row of raw) {
    const s = coerceSavedSetting(row)
    if (s) out.push(s)
  }
  return out
}

export function toSavedSetting(input: CalculationInput, result: CalculationResult): SavedSetting {
  return {
    substraat: input.substrate,
    inktsoort: input.inkType,
    rasterwals_type: input.rollerType,
    volume: input.volume,
    bcm: input.bcm,
    vermogen: result.finalPower,
    transfer: result.transferValue,
  }
}
