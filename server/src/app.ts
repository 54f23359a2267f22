import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import session from 'express-session';
import path from 'path';
import { fileURLToPath } from 'url';
import type { AppConfig } from './config.js';
import type { Db } from './db.js';
import { createRepository } from './repo.js';
import { SqliteSessionStore } from './sessionStore.js';
import { authRoutes } from './routes/auth.js';
import { budgetRoutes } from './routes/budget.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { savingsRoutes } from './routes/savings.js';
import { systemRoutes } from './routes/system.js';
import { transactionRoutes } from './routes/transactions.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const publicDir = path.join(__dirname, '../../public');

export interface AppDeps {
  db: Db;
  config: Pick<AppConfig, 'sessionSecret' | 'corsOrigin'>;
}

export function createApp({ db, config }: AppDeps): express.Express {
  const repo = createRepository(db);
  const app = express();

  app.use('/api', cors({ origin: config.corsOrigin, credentials: true }));
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(session({
    name: 'sid',
    secret: config.sessionSecret,
    resave: false,
    saveUninitialized: false,
    store: new SqliteSessionStore(db),
    cookie: { httpOnly: true, sameSite: 'lax' },
  }));
  app.use('/static', express.static(publicDir));

  app.use(systemRoutes(db));
  app.use(authRoutes(repo));
  app.use(dashboardRoutes(repo));
  app.use(transactionRoutes(repo));
  app.use(budgetRoutes(repo));
  app.use(savingsRoutes(repo));

  app.use((_req, res) => {
    res.status(404).type('text').send('Not found');
  });

  const onError: ErrorRequestHandler = (error, req, res, _next) => {
    console.error(`Error handling ${req.method} ${req.path}:`, error);
    if (req.path.startsWith('/api/')) {
      res.status(500).json({ error: 'Internal server error' });
    } else {
      res.status(500).type('text').send('Something went wrong');
    }
  };
  app.use(onError);

  return app;
}
