import { NextResponse } from 'next/server'
import { loadAniloxData } from '@/lib/aniloxData'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'
export const revalidate = 0
export const fetchCache = 'force-no-store'

// rows: null means no recommendation is available
export async function GET() {
  return new NextResponse(JSON.stringify({ rows: await loadAniloxData() }), {
    headers: {
      'content-type': 'application/json; charset=utf-8',
      'cache-control': 'no-store',
    },
  })
}
