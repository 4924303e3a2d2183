'use client'

import { useEffect, useMemo, useState } from 'react'
import { calculatePower, getBcmFromVolume, getVolumeSpecs } from '@/lib/curing'
import { INK_TYPES, ROLLER_TYPES, SUBSTRATES } from '@/lib/defaults'
import { collectCalculationInput, resolveVolume } from '@/lib/validation'
import { coerceSavedSettings, toSavedSetting } from '@/lib/settings-normalize'
import { getRecommendedSettings } from '@/lib/anilox'
import type { AniloxRow, CalculationForm, CalculationInput, SavedSetting } from '@/lib/types'

// UI
import HelpCard from '@/components/HelpCard'
import PrintJobCard from '@/components/PrintJobCard'
import RollerCard from '@/components/RollerCard'
import ResultCard, { type ResultState } from '@/components/ResultCard'
import SavedSettingsCard from '@/components/SavedSettingsCard'

type FormState = Required<CalculationForm>

const INITIAL_FORM: FormState = {
  substrate: SUBSTRATES[0],
  inkType: INK_TYPES[0],
  rollerType: ROLLER_TYPES[0],
  volume: resolveVolume(ROLLER_TYPES[0]) ?? '',
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text()
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new Error(`Invalid JSON from server (${res.status}): ${e instanceof Error ? e.message : String(e)}`)
  }
}

const aniloxRowsFrom = (payload: unknown): AniloxRow[] | null => {
  if (!payload || typeof payload !== 'object' || !('rows' in payload) || !Array.isArray(payload.rows)) return null
  return payload.rows.filter(
      (r: unknown): r is AniloxRow =>
          !!r && typeof r === 'object' &&
          'bcm' in r && typeof r.bcm === 'number' &&
          'recommendedPower' in r && typeof r.recommendedPower === 'number',
  )
}

export default function CalculatorPage() {
  const [form, setForm] = useState<FormState>(INITIAL_FORM)
  const [result, setResult] = useState<ResultState>(null)
  // Input behind the current result; this is what gets saved
  const [accepted, setAccepted] = useState<CalculationInput | null>(null)

  const [saved, setSaved] = useState<SavedSetting[]>([])
  const [aniloxRows, setAniloxRows] = useState<AniloxRow[] | null>(null)
  const [saving, setSaving] = useState(false)
  const [info, setInfo] = useState('')
  const [error, setError] = useState('')

  // Saved settings are loaded once, as a whole
  useEffect(() => {
    let cancelled = false
    ;(async () => {
      try {
        const res = await fetch('/api/settings/saved', { cache: 'no-store' })
        const list = res.ok ? coerceSavedSettings(await readJson(res)) : []
        if (!cancelled) setSaved(list)
      } catch (e) {
        console.warn('Could not load saved settings', e)
      }
    })()
    return () => { cancelled = true }
  }, [])

  // Anilox reference table (optional; null switches the recommendation off)
  useEffect(() => {
    let cancelled = false
    ;(async () => {
      try {
        const res = await fetch('/api/anilox', { cache: 'no-store' })
        const rows = res.ok ? aniloxRowsFrom(await readJson(res)) : null
        if (!cancelled) setAniloxRows(rows)
      } catch (e) {
        console.warn('Could not load anilox data', e)
      }
    })()
    return () => { cancelled = true }
  }, [])

  const volumeSpecs = useMemo(() => getVolumeSpecs(form.rollerType), [form.rollerType])
  const bcm = getBcmFromVolume(form.rollerType, form.volume)

  const recommendedPower = useMemo(
      () => (accepted ? getRecommendedSettings(accepted.bcm, aniloxRows) : null),
      [accepted, aniloxRows],
  )

  function patchForm(patch: Partial<FormState>) {
    setForm(prev => {
      const next = { ...prev, ...patch }
      // keep the volume valid for the (new) roller type
      next.volume = resolveVolume(next.rollerType, next.volume) ?? ''
      return next
    })
  }

  function calculate() {
    setInfo('')
    setError('')
    const input = collectCalculationInput(form)
    if (!input.valid) {
      setAccepted(null)
      setResult({ error: input.error })
      return
    }
    const { substrate, inkType, bcm, rollerType, volume } = input.value
    setAccepted(input.value)
    setResult(calculatePower(substrate, inkType, bcm, rollerType, volume))
  }

  async function save() {
    if (!accepted || !result || 'error' in result) return
    const setting = toSavedSetting(accepted, result)
    setSaving(true)
    setInfo('')
    setError('')
    try {
      const res = await fetch('/api/settings/saved', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(setting),
      })
      const payload = await readJson(res)
      if (!res.ok) {
        const msg = payload && typeof payload === 'object' && 'error' in payload ? String(payload.error) : ''
        throw new Error(msg || `Opslaan mislukt (${res.status})`)
      }
      setSaved(prev => [...prev, setting])
      setInfo('Instellingen opgeslagen!')
    } catch (e) {
      setError(e instanceof Error ? e.message : String(e))
    } finally {
      setSaving(false)
    }
  }

  return (
      <div className="space-y-6">
        <h1 className="h1 industrial-header">UV Curing Calculator</h1>

        <HelpCard />

        <form
            className="grid grid-cols-1 lg:grid-cols-2 gap-4"
            onSubmit={e => {
              e.preventDefault()
              calculate()
            }}
        >
          <PrintJobCard
              substrates={SUBSTRATES}
              inkTypes={INK_TYPES}
              substrate={form.substrate}
              inkType={form.inkType}
              onChange={patchForm}
          />

          <RollerCard
              rollerTypes={ROLLER_TYPES}
              rollerType={form.rollerType}
              volumeSpecs={volumeSpecs}
              volume={form.volume}
              bcm={bcm}
              onChange={patchForm}
          />

          <div className="lg:col-span-2">
            <button type="submit" className="btn w-full">Bereken UV Vermogen</button>
          </div>
        </form>

        <ResultCard
            result={result}
            rollerType={accepted?.rollerType ?? form.rollerType}
            volume={accepted?.volume ?? form.volume}
            recommendedPower={recommendedPower}
            saving={saving}
            onSave={() => { void save() }}
        />

        {info ? <div className="text-green-700">{info}</div> : null}
        {error ? <div className="text-red-600 whitespace-pre-wrap">{error}</div> : null}

        <SavedSettingsCard settings={saved} />
      </div>
  )
}
