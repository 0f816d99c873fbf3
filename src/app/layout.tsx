import './globals.css';
import Link from 'next/link';
import type { Metadata } from 'next';

export const metadata: Metadata = {
  title: 'Subtitle Translation Engine',
  description: 'Language-aware subtitle translation jobs'
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body>
        <header className="container" style={{ paddingBottom: 0 }}>
          <div
            className="card"
            style={{
              display: 'flex',
              justifyContent: 'space-between',
              alignItems: 'center'
            }}
          >
            <strong>Subtitle Translation Engine</strong>
            <nav style={{ display: 'flex', gap: 12 }}>
              <Link href="/dashboard/translations">Translations</Link>
            </nav>
          </div>
        </header>
        {children}
      </body>
    </html>
  );
}
