import type { Metadata } from 'next';
import './globals.css';
import SkipLink from '@/components/SkipLink';

export const metadata: Metadata = {
  title: 'Chat Work Hours',
  description: 'Timesheets from clock-in/clock-out messages in a chat export',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="min-h-screen bg-white text-gray-900">
        <SkipLink />
        <header className="sticky top-0 z-50 border-b border-gray-200 bg-white/90 backdrop-blur">
          <div className="mx-auto flex max-w-6xl items-center justify-between gap-4 px-4 py-3 sm:px-6">
            <p className="text-lg font-semibold text-indigo-600">Chat Timesheet</p>
          </div>
        </header>
        <main id="main" role="main" className="mx-auto flex w-full max-w-6xl flex-1 flex-col px-4 pb-12 pt-6 sm:px-6">
          {children}
        </main>
      </body>
    </html>
  );
}
