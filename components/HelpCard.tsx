'use client'
import Card from '@/components/Card'
import { getHelpText } from '@/lib/help'

export default function HelpCard() {
    return (
        <Card>
            <details>
                <summary className="font-semibold cursor-pointer">ℹ️ Help &amp; Informatie</summary>
                <p className="mt-2 text-sm">{getHelpText('general')}</p>
            </details>
        </Card>
    )
}
