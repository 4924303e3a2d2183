// components/RollerCard.tsx
'use client'

import Card from '@/components/Card'
import { getHelpText } from '@/lib/help'
import type { VolumeSpec } from '@/lib/types'

export default function RollerCard({
                                       rollerTypes,
                                       rollerType,
                                       volumeSpecs,
                                       volume,
                                       bcm,
                                       onChange,
                                   }: {
    rollerTypes: readonly string[]
    rollerType: string
    volumeSpecs: readonly VolumeSpec[]
    volume: string
    bcm: number
    onChange: (patch: Partial<{ rollerType: string; volume: string }>) => void
}) {
    const spec = volumeSpecs.find(s => s.volume === volume)

    return (
        <Card>
            <h2 className="h2 mb-2">Rasterwals</h2>

            <div className="flex flex-col gap-3">
                <label className="label" title={getHelpText('rasterwals')}>
                    Rasterwals Type
                    <select
                        className="select mt-1"
                        value={rollerType}
                        onChange={e => onChange({ rollerType: e.target.value })}
                    >
                        {rollerTypes.map(r => <option key={r} value={r}>{r}</option>)}
                    </select>
                </label>

                <label className="label" title={getHelpText('volume')}>
                    Rasterwals Volume
                    <select
                        className="select mt-1"
                        value={volume}
                        disabled={!volumeSpecs.length}
                        onChange={e => onChange({ volume: e.target.value })}
                    >
                        {volumeSpecs.map(s => <option key={s.volume} value={s.volume}>{s.volume}</option>)}
                    </select>
                </label>

                {/* derived, never typed in */}
                <label className="label" title={getHelpText('bcm')}>
                    BCM
                    <input className="input mt-1" type="number" value={bcm} readOnly />
                </label>

                {spec && (
                    <div className="rounded-md border border-blue-200 bg-blue-50 p-3 text-sm" data-field="spec-info">
                        <div className="font-semibold mb-1">Specificaties:</div>
                        <ul className="list-disc ml-5">
                            <li>Volume: {spec.actualVolume ?? spec.volume}</li>
                            <li>BCM: {spec.bcm}</li>
                            <li>Lijnen: {spec.lines}</li>
                            <li>Inktoverdracht: {spec.transfer}</li>
                        </ul>
                    </div>
                )}
            </div>
        </Card>
    )
}
