// @vitest-environment node
import { writeFileSync } from 'node:fs';
import { createServer, type Server } from 'node:http';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeFrame, makeTempDir, removeDir } from '../test/fixtures';
import { createApiMiddleware } from './apiMiddleware';
import { BrowserDisplay } from './BrowserDisplay';

describe('annotator API middleware', () => {
  let dir: string;
  let imagePath: string;
  let display: BrowserDisplay;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    dir = makeTempDir();
    imagePath = join(dir, 'a.jpg');
    writeFileSync(imagePath, 'jpeg bytes');

    display = new BrowserDisplay();
    const middleware = createApiMiddleware({
      display,
      imagePath: (handle) => (handle === 0 ? imagePath : undefined),
    });
    server = createServer((req, res) =>
      middleware(req, res, () => {
        res.statusCode = 418;
        res.end('next');
      })
    );
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await display.close();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
    removeDir(dir);
  });

  function postEvent(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/events`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('should answer 503 before the first frame', async () => {
    const response = await fetch(`${baseUrl}/api/frame`);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ detail: 'No frame yet' });
  });

  it('should return the latest frame', async () => {
    const frame = makeFrame({ revision: 3 });
    display.present(frame);

    const response = await fetch(`${baseUrl}/api/frame`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(frame);
  });

  it('should reject an invalid event', async () => {
    const response = await postEvent({ kind: 'press', x: 'left' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ detail: 'Invalid input event' });
  });

  it('should hand an event to the loop and answer with the next frame', async () => {
    const pending = postEvent({ kind: 'press', x: 10, y: 20 });

    const event = await display.poll(5_000);
    expect(event).toEqual({ kind: 'press', x: 10, y: 20 });
    const frame = makeFrame({
      revision: 9,
      inProgress: { xmin: 10, ymin: 20, xmax: 10, ymax: 20 },
    });
    display.present(frame);

    const response = await pending;
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(frame);
  });

  it('should answer 410 to an event still waiting when the display closes', async () => {
    const pending = postEvent({ kind: 'key', key: 'q' });
    await display.poll(5_000);

    await display.close();

    const response = await pending;
    expect(response.status).toBe(410);
    expect(await response.json()).toEqual({ detail: 'Session closed' });
  });

  it('should serve image bytes by handle', async () => {
    const response = await fetch(`${baseUrl}/api/images/0`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('image/jpeg');
    expect(await response.text()).toBe('jpeg bytes');
  });

  it('should answer 404 for an unknown image handle', async () => {
    const response = await fetch(`${baseUrl}/api/images/7`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ detail: 'Image not found' });
  });

  it('should answer 404 for an unknown API route', async () => {
    const response = await fetch(`${baseUrl}/api/nothing`);

    expect(response.status).toBe(404);
  });

  it('should pass other paths to the next middleware', async () => {
    const response = await fetch(`${baseUrl}/index.html`);

    expect(response.status).toBe(418);
    expect(await response.text()).toBe('next');
  });

  it('should answer 410 everywhere once closed', async () => {
    await display.close();

    const response = await fetch(`${baseUrl}/api/frame`);

    expect(response.status).toBe(410);
    expect(await response.json()).toEqual({ detail: 'Session closed' });
  });
});
