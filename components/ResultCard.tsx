// components/ResultCard.tsx
'use client'

import Card from '@/components/Card'
import type { CalculationResult } from '@/lib/types'

export type ResultState = CalculationResult | { error: string } | null

export default function ResultCard({
                                       result,
                                       rollerType,
                                       volume,
                                       recommendedPower,
                                       saving = false,
                                       onSave,
                                   }: {
    result: ResultState
    rollerType: string
    volume: string
    recommendedPower: number | null
    saving?: boolean
    onSave: () => void
}) {
    const fmt = (n: number) => (Number.isFinite(n) ? n.toFixed(1) : '0.0')

    return (
        <Card>
            <h2 className="h2 mb-2">Berekende UV Instellingen</h2>
            <hr className="border-t border-gray-300 mb-2" />

            {!result ? (
                <div className="opacity-70">Kies de instellingen en klik op &quot;Bereken UV Vermogen&quot;…</div>
            ) : 'error' in result ? (
                <div className="text-red-600" role="alert">{result.error}</div>
            ) : (
                <div className="space-y-2">
                    <div className="grid grid-cols-2 gap-3">
                        <div className="rounded-md border border-gray-200 bg-gray-50 p-3">
                            <div className="text-[13px]">UV Vermogen</div>
                            <div className="text-xl font-extrabold" data-field="final-power">{result.finalPower}%</div>
                        </div>
                        <div className="rounded-md border border-gray-200 bg-gray-50 p-3">
                            <div className="text-[13px]">Inktoverdracht</div>
                            <div className="text-xl font-extrabold" data-field="transfer-value">{result.transferValue}</div>
                        </div>
                    </div>

                    <h3 className="font-semibold text-sm mb-1">Berekening Details</h3>
                    <ul className="space-y-1 text-xs leading-snug" data-field="breakdown">
                        <li>Basisvermogen: {result.basePower}%</li>
                        <li>Substraat aanpassing: {fmt(result.substrateContribution)}%</li>
                        <li>Inkt aanpassing: {fmt(result.inkContribution)}%</li>
                        <li>BCM bijdrage: {fmt(result.bcmContribution)}%</li>
                        <li>Rasterwals: {rollerType}</li>
                        <li>Volume: {volume}</li>
                        <li>Transfer factor: {fmt(result.transferFactor)}%</li>
                    </ul>

                    {recommendedPower !== null && (
                        <div className="text-[13px]" data-field="recommendation">
                            Anilox referentie: {recommendedPower}%
                        </div>
                    )}

                    <hr className="border-t border-gray-300" />
                    <button type="button" className="btn" onClick={onSave} disabled={saving}>
                        {saving ? 'Opslaan…' : 'Instellingen Opslaan'}
                    </button>
                </div>
            )}
        </Card>
    )
}
