import type { Response } from 'express';
import type { ReactElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';

/** Send a full HTML document for a screen element */
export function renderPage(res: Response, element: ReactElement, status = 200): void {
  const html = `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
  res.status(status).type('html').send(html);
}
