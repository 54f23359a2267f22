import type { Request } from 'express';
import type { FlashLevel, FlashMessage } from '../../src/domain/types.js';

/** Queue a notice for the next rendered page */
export function flash(req: Request, level: FlashLevel, text: string): void {
  const queue = req.session.flash ?? [];
  queue.push({ level, text });
  req.session.flash = queue;
}

/** Read and clear queued notices */
export function takeFlash(req: Request): FlashMessage[] {
  const queue = req.session.flash ?? [];
  delete req.session.flash;
  return queue;
}
