// lib/settingsStore.ts
// Append-only list of saved calculations, kept whole in one JSON file.
// Every append rewrites the file; there is no locking (single operator).
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { SavedSetting } from './types'
import { getConfig } from './config'
import { isMissingFile } from './fileErrors'
import { coerceSavedSettings } from './settings-normalize'

// Rows as stored, unrecognised ones included. `null` when the file exists but is unusable.
async function readRaw(file: string): Promise<unknown[] | null> {
  try {
    const parsed: unknown = JSON.parse(await readFile(file, 'utf8'))
    if (Array.isArray(parsed)) return parsed
    console.warn(`Saved settings in ${file} are not a JSON array`)
    return null
  } catch (e) {
    if (isMissingFile(e)) return []
    console.warn(`Could not read saved settings from ${file}:`, e)
    return null
  }
}

export async function loadSavedSettings(file = getConfig().savedSettingsFile): Promise<SavedSetting[]> {
  return coerceSavedSettings((await readRaw(file)) ?? [])
}

export async function appendSavedSetting(
    setting: SavedSetting,
    file = getConfig().savedSettingsFile,
): Promise<boolean> {
  const all = await readRaw(file)
  if (all === null) {
    console.error(`Refusing to overwrite unreadable saved settings in ${file}`)
    return false
  }
  all.push(setting)
  try {
    await mkdir(path.dirname(file), { recursive: true })
    await writeFile(file, JSON.stringify(all, null, 2) + '\n', 'utf8')
    return true
  } catch (e) {
    console.error(`Error saving settings to ${file}:`, e)
    return false
  }
}
