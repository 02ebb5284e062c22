import fs from 'fs';
import path from 'path';
import express, { Router } from 'express';
import logger from '../utils/logger';

// Both resolve the same from src/routes and dist/routes
export const PUBLIC_DIR = path.resolve(__dirname, '..', '..', 'public');
const CHAT_PAGE_FILE = path.resolve(__dirname, '..', '..', 'views', 'chat.html');

export interface ChatPageView {
  wikiName: string;
  pageCount: number;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

/**
 * Fill `{{name}}` placeholders; unknown placeholders are left as they are
 */
export function renderChatPage(template: string, view: ChatPageView): string {
  const values: Record<string, string> = {
    wikiName: escapeHtml(view.wikiName),
    pageCount: String(view.pageCount),
  };
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}

/**
 * Serves the chat page at `/` and its static assets
 * @param view Reports the wiki name and current page count per request
 */
export function createHomeRouter(view: () => ChatPageView): Router {
  const router = Router();
  const template = fs.readFileSync(CHAT_PAGE_FILE, 'utf-8');

  router.get('/', (req, res) => {
    logger.debug('Chat page request received');
    res.status(200).type('html').send(renderChatPage(template, view()));
  });

  router.use(express.static(PUBLIC_DIR, { index: false }));

  return router;
}
