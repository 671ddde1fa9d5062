import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import react from '@vitejs/plugin-react';
import autoprefixer from 'autoprefixer';
import tailwindcss from 'tailwindcss';
import colors from 'tailwindcss/colors';
import { createServer, type Plugin } from 'vite';
import { log } from '../log';
import { createApiMiddleware, type AnnotatorApiContext } from './apiMiddleware';
import type { DisplayServer } from './BrowserDisplay';

const FRONTEND_ROOT = fileURLToPath(new URL('../../frontend', import.meta.url));

/** Time given to in-flight responses (the quit request's among them) before sockets close */
const CLOSE_GRACE_MS = 200;

export interface DisplayServerOptions {
  port: number;
  open: boolean;
}

/** Mounts the annotator API in front of vite's own middlewares. */
export function annotatorApiPlugin(ctx: AnnotatorApiContext): Plugin {
  return {
    name: 'annotator-api',
    configureServer(server) {
      server.middlewares.use(createApiMiddleware(ctx));
    },
  };
}

/**
 * Serves the annotation page and its API, and opens it in a browser when
 * `options.open` is set.
 */
export async function startDisplayServer(
  ctx: AnnotatorApiContext,
  options: DisplayServerOptions
): Promise<DisplayServer> {
  const server = await createServer({
    configFile: false,
    root: FRONTEND_ROOT,
    clearScreen: false,
    plugins: [react(), annotatorApiPlugin(ctx)],
    resolve: {
      alias: { '@': join(FRONTEND_ROOT, 'src') },
    },
    css: {
      postcss: {
        plugins: [
          tailwindcss({
            content: [join(FRONTEND_ROOT, 'index.html'), join(FRONTEND_ROOT, 'src/**/*.{ts,tsx}')],
            darkMode: 'media',
            theme: { extend: { colors: { primary: colors.sky } } },
          }),
          autoprefixer(),
        ],
      },
    },
    server: {
      port: options.port,
      strictPort: false,
      open: options.open,
    },
  });

  await server.listen();
  server.printUrls();

  return {
    async close() {
      await delay(CLOSE_GRACE_MS);
      await server.close();
      log.info('display closed');
    },
  };
}
