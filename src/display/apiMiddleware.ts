import { readFile } from 'node:fs/promises';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { extname } from 'node:path';
import { DisplayClosedError } from '../errors';
import type { BrowserDisplay } from './BrowserDisplay';
import { parseInputEvent } from './inputEvent';

export interface AnnotatorApiContext {
  display: BrowserDisplay;
  imagePath(handle: number): string | undefined;
}

export type ApiMiddleware = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void
) => void;

const IMAGE_ROUTE = /^\/api\/images\/(\d+)$/;

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.bmp': 'image/bmp',
  '.webp': 'image/webp',
};

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Cache-Control', 'no-store');
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer | string) => {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const body = await readBody(req);
  if (!body) {
    return null;
  }
  try {
    return JSON.parse(body) as unknown;
  } catch {
    return null;
  }
}

async function handle(
  ctx: AnnotatorApiContext,
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string
): Promise<void> {
  const { display } = ctx;
  if (display.isClosed) {
    sendJson(res, 410, { detail: 'Session closed' });
    return;
  }

  if (pathname === '/api/frame' && req.method === 'GET') {
    const frame = display.currentFrame;
    if (!frame) {
      sendJson(res, 503, { detail: 'No frame yet' });
      return;
    }
    sendJson(res, 200, frame);
    return;
  }

  if (pathname === '/api/events' && req.method === 'POST') {
    const event = parseInputEvent(await readJsonBody(req));
    if (!event) {
      sendJson(res, 400, { detail: 'Invalid input event' });
      return;
    }
    sendJson(res, 200, await display.push(event));
    return;
  }

  const imageMatch = IMAGE_ROUTE.exec(pathname);
  if (imageMatch && req.method === 'GET') {
    const path = ctx.imagePath(Number(imageMatch[1]));
    if (!path) {
      sendJson(res, 404, { detail: 'Image not found' });
      return;
    }
    const data = await readFile(path);
    res.statusCode = 200;
    res.setHeader(
      'Content-Type',
      CONTENT_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream'
    );
    res.setHeader('Cache-Control', 'no-store');
    res.end(data);
    return;
  }

  sendJson(res, 404, { detail: 'Not found' });
}

/**
 * Connect-style middleware serving the page's API under `/api`. Everything
 * else goes to `next`.
 */
export function createApiMiddleware(ctx: AnnotatorApiContext): ApiMiddleware {
  return (req, res, next) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    if (!pathname.startsWith('/api/')) {
      next();
      return;
    }

    handle(ctx, req, res, pathname).catch((err: unknown) => {
      if (err instanceof DisplayClosedError) {
        sendJson(res, 410, { detail: err.message });
        return;
      }
      sendJson(res, 500, { detail: err instanceof Error ? err.message : 'Internal error' });
    });
  };
}
