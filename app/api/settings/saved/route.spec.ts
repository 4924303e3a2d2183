import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { NextRequest } from 'next/server'
import { GET, POST } from './route'
import type { SavedSetting } from '@/lib/types'

const SETTING: SavedSetting = {
  substraat: 'Ongecoat papier',
  inktsoort: 'Watergedragen inkt',
  rasterwals_type: 'ART / TIF (40-50% transfer)',
  volume: '7 cm³/m²',
  bcm: 4.5,
  vermogen: 100,
  transfer: '2.7 g/m²',
}

const post = (body: string) =>
    POST(new NextRequest('http://localhost/api/settings/saved', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    }))

describe('/api/settings/saved', () => {
  const previous = process.env.SAVED_SETTINGS_FILE
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'saved-route-'))
    process.env.SAVED_SETTINGS_FILE = path.join(dir, 'saved_settings.json')
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
    jest.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(async () => {
    jest.restoreAllMocks()
    if (previous === undefined) delete process.env.SAVED_SETTINGS_FILE
    else process.env.SAVED_SETTINGS_FILE = previous
    await rm(dir, { recursive: true, force: true })
  })

  it('lists nothing before the first save', async () => {
    const res = await GET()
    expect(res.status).toBe(200)
    expect(res.headers.get('cache-control')).toBe('no-store')
    await expect(res.json()).resolves.toEqual([])
  })

  it('appends a setting and lists it', async () => {
    const res = await post(JSON.stringify(SETTING))
    expect(res.status).toBe(200)
    await expect(res.json()).resolves.toEqual({ ok: true, count: 1 })

    await expect((await GET()).json()).resolves.toEqual([SETTING])
  })

  it('rejects a body that is not JSON', async () => {
    const res = await post('substraat=Folie')
    expect(res.status).toBe(400)
    const body: unknown = await res.json()
    expect(body).toEqual({ error: expect.stringMatching(/^Parse error: /) })
  })

  it('rejects an incomplete setting', async () => {
    const res = await post(JSON.stringify({ substraat: 'Folie' }))
    expect(res.status).toBe(400)
    await expect(res.json()).resolves.toEqual({ error: 'Expected a saved setting object' })
  })

  it('answers 500 when the file cannot be written', async () => {
    const blocker = path.join(dir, 'blocker')
    await writeFile(blocker, 'x', 'utf8')
    process.env.SAVED_SETTINGS_FILE = path.join(blocker, 'saved_settings.json')

    const res = await post(JSON.stringify(SETTING))
    expect(res.status).toBe(500)
    await expect(res.json()).resolves.toEqual({ ok: false, error: 'Instellingen konden niet worden opgeslagen.' })
  })
})
