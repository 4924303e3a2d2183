import { NextRequest, NextResponse } from 'next/server'
import { appendSavedSetting, loadSavedSettings } from '@/lib/settingsStore'
import { coerceSavedSetting } from '@/lib/settings-normalize'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'
export const revalidate = 0
export const fetchCache = 'force-no-store'

function json(res: unknown, status = 200) {
  return new NextResponse(JSON.stringify(res), {
    status,
    headers: {
      'content-type': 'application/json; charset=utf-8',
      'cache-control': 'no-store',
    },
  })
}

export async function GET() {
  return json(await loadSavedSettings())
}

export async function POST(req: NextRequest) {
  let parsed: unknown
  try {
    parsed = JSON.parse(await req.text())
  } catch (err) {
    return json({ error: `Parse error: ${err instanceof Error ? err.message : String(err)}` }, 400)
  }

  const setting = coerceSavedSetting(parsed)
  if (!setting) return json({ error: 'Expected a saved setting object' }, 400)

  if (!(await appendSavedSetting(setting))) {
    return json({ ok: false, error: 'Instellingen konden niet worden opgeslagen.' }, 500)
  }

  const all = await loadSavedSettings()
  return json({ ok: true, count: all.length })
}
