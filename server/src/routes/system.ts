import { Router } from 'express';
import { pingDatabase, type Db } from '../db.js';

export function systemRoutes(db: Db): Router {
  const router = Router();

  // Health check endpoint
  router.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /check_db - Plain-text probe against SQLite
  router.get('/check_db', (_req, res) => {
    try {
      pingDatabase(db);
      res.type('text').send('SQLite: OK');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('Database check failed:', error);
      res.status(500).type('text').send(`DB error: ${message}`);
    }
  });

  return router;
}
