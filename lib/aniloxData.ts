// lib/aniloxData.ts
import { readFile } from 'node:fs/promises'
import type { AniloxRow } from './types'
import { ANILOX_FALLBACK } from './defaults'
import { getConfig } from './config'
import { isMissingFile } from './fileErrors'

const num = (v: unknown) => (typeof v === 'number' && Number.isFinite(v) ? v : undefined)

function coerceRows(raw: unknown): AniloxRow[] {
  if (!Array.isArray(raw)) throw new Error('anilox data must be an array')
  const rows: AniloxRow[] = []
  for (const r of raw) {
    if (!r || typeof r !== 'object') continue
    const bcm = num('bcm' in r ? r.bcm : undefined)
    const recommendedPower = num('recommendedPower' in r ? r.recommendedPower : undefined)
    if (bcm !== undefined && recommendedPower !== undefined) rows.push({ bcm, recommendedPower })
  }
  if (!rows.length) throw new Error('anilox data has no usable rows')
  return rows
}

/**
 * Rows taken from the anilox specification document.
 *
 * No extracted file yet: the fixed fallback table. A file that cannot be read
 * or parsed: null, which switches the recommendation off.
 */
export async function loadAniloxData(file = getConfig().aniloxDataFile): Promise<AniloxRow[] | null> {
  try {
    return coerceRows(JSON.parse(await readFile(file, 'utf8')))
  } catch (e) {
    if (isMissingFile(e)) return ANILOX_FALLBACK.map(r => ({ ...r }))
    console.warn(`Warning: could not load anilox data from ${file}:`, e)
    return null
  }
}
