import type { Metadata } from 'next'
import type { ReactNode } from 'react'
import './globals.css'

export const metadata: Metadata = {
  title: 'UV Curing Calculator',
  description: 'Aanbevolen UV-vermogen voor flexografisch drukwerk',
}

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
      <html lang="nl">
        <body>
          <main className="mx-auto max-w-5xl p-6">{children}</main>
        </body>
      </html>
  )
}
