// lib/config.ts
import path from 'node:path'

export type AppConfig = {
  savedSettingsFile: string
  aniloxDataFile: string
}

type Env = Record<string, string | undefined>

const fromEnv = (env: Env, key: string, fallback: string) => {
  const v = env[key]?.trim()
  return v ? path.resolve(v) : fallback
}

// Read on every call so a changed environment (tests, restarts) takes effect
export function getConfig(env: Env = process.env): AppConfig {
  return {
    savedSettingsFile: fromEnv(env, 'SAVED_SETTINGS_FILE', path.join(process.cwd(), 'data', 'saved_settings.json')),
    // Rows extracted from the anilox spec document (.docx is never parsed)
    aniloxDataFile: fromEnv(env, 'ANILOX_DATA_FILE', path.join(process.cwd(), 'lib', 'preloaded', 'anilox.json')),
  }
}
