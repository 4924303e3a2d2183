'use client'
import Card from '@/components/Card'
import { getHelpText } from '@/lib/help'

export default function PrintJobCard({
                                         substrates,
                                         inkTypes,
                                         substrate,
                                         inkType,
                                         onChange,
                                     }: {
    substrates: readonly string[]
    inkTypes: readonly string[]
    substrate: string
    inkType: string
    onChange: (patch: Partial<{ substrate: string; inkType: string }>) => void
}) {
    return (
        <Card>
            <h2 className="h2 mb-2">Drukwerk</h2>

            <div className="flex flex-col gap-3">
                <label className="label" title={getHelpText('substrate')}>
                    Substraat Type
                    <select
                        className="select mt-1"
                        value={substrate}
                        onChange={e => onChange({ substrate: e.target.value })}
                    >
                        {substrates.map(s => <option key={s} value={s}>{s}</option>)}
                    </select>
                </label>

                <label className="label" title={getHelpText('ink_type')}>
                    Inktsoort
                    <select
                        className="select mt-1"
                        value={inkType}
                        onChange={e => onChange({ inkType: e.target.value })}
                    >
                        {inkTypes.map(i => <option key={i} value={i}>{i}</option>)}
                    </select>
                </label>
            </div>
        </Card>
    )
}
