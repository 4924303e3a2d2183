// lib/fileErrors.ts
// fs errors are matched by code; they need not be instances of this realm's Error
export const isMissingFile = (e: unknown): boolean =>
    typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT'
