import type { ReactNode } from 'react';
import './globals.css';

export const metadata = {
  title: 'Kirana Desk',
  description: 'Billing, stock and udhari for a neighbourhood grocery shop',
};

export default function RootLayout({
  children,
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body className="bg-slate-100 text-slate-900">{children}</body>
    </html>
  );
}
