'use client'
import Card from '@/components/Card'
import type { SavedSetting } from '@/lib/types'

export default function SavedSettingsCard({ settings }: { settings: SavedSetting[] }) {
    if (!settings.length) return null

    return (
        <Card>
            <h2 className="h2 mb-2">Opgeslagen Instellingen</h2>
            <div className="overflow-auto max-h-96">
                <table className="min-w-full text-xs">
                    <thead>
                        <tr className="text-left border-b border-gray-300">
                            <th className="p-1">Substraat</th>
                            <th className="p-1">Inktsoort</th>
                            <th className="p-1">Rasterwals</th>
                            <th className="p-1">Volume</th>
                            <th className="p-1">BCM</th>
                            <th className="p-1">Vermogen</th>
                            <th className="p-1">Transfer</th>
                        </tr>
                    </thead>
                    <tbody>
                        {/* append-only, no identity: index is the key */}
                        {settings.map((s, i) => (
                            <tr key={i} className="border-b border-gray-100">
                                <td className="p-1">{s.substraat}</td>
                                <td className="p-1">{s.inktsoort}</td>
                                <td className="p-1">{s.rasterwals_type}</td>
                                <td className="p-1">{s.volume}</td>
                                <td className="p-1">{s.bcm}</td>
                                <td className="p-1">{s.vermogen}%</td>
                                <td className="p-1">{s.transfer}</td>
                            </tr>
                        ))}
                    </tbody>
                </table>
            </div>
        </Card>
    )
}
