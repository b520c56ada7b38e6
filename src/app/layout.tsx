// Root layout: HTML skeleton and global styles for every page
import './globals.css';
import type { ReactNode } from 'react';

export const metadata = {
  title: 'Video Chat',
  description: 'Ask questions about any YouTube video',
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
