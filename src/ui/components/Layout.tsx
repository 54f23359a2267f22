import type { ReactNode } from 'react';
import type { FlashMessage, User } from '../../domain/types.js';
import { FlashMessages } from './FlashMessages.js';

export type NavKey = 'dashboard' | 'transactions' | 'budget' | 'savings';

const NAV_ITEMS: { key: NavKey; href: string; label: string }[] = [
  { key: 'dashboard', href: '/dashboard', label: 'Dashboard' },
  { key: 'transactions', href: '/transactions', label: 'Transactions' },
  { key: 'budget', href: '/budget', label: 'Budget' },
  { key: 'savings', href: '/savings', label: 'Savings' },
];

interface LayoutProps {
  title: string;
  flash: FlashMessage[];
  user?: User;
  active?: NavKey;
  children: ReactNode;
}

export function Layout({ title, flash, user, active, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${title} · Pocket Ledger`}</title>
        <link rel="stylesheet" href="/static/app.css" />
      </head>
      <body>
        {user && (
          <header className="topbar">
            <span className="brand">Pocket Ledger</span>
            <nav>
              {NAV_ITEMS.map((item) => (
                <a
                  key={item.key}
                  href={item.href}
                  className={item.key === active ? 'nav-link active' : 'nav-link'}
                >
                  {item.label}
                </a>
              ))}
            </nav>
            <span className="whoami">
              {user.name || user.username}
              {' · '}
              <a href="/logout">Log out</a>
            </span>
          </header>
        )}
        <main className="app-page">
          <FlashMessages messages={flash} />
          {children}
        </main>
      </body>
    </html>
  );
}
