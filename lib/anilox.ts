// lib/anilox.ts
import type { AniloxRow } from './types'

/** Recommended power of the row with the nearest BCM; first row wins a tie. */
export function getRecommendedSettings(bcm: number, rows: readonly AniloxRow[] | null): number | null {
  if (!rows?.length || !Number.isFinite(bcm)) return null
  let best = rows[0]
  for (const r of rows) {
    if (Math.abs(r.bcm - bcm) < Math.abs(best.bcm - bcm)) best = r
  }
  return best.recommendedPower
}
