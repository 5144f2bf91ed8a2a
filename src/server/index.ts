import express from 'express';
import { createServer } from 'node:http';
import path from 'node:path';
import createDebug from 'debug';
import { DEFAULT_SHELL_CONFIG, type ShellConfig } from '../shared/shell-config.js';

const log = {
  server: createDebug('offline-shell:server'),
  request: createDebug('offline-shell:request'),
};

export interface ServerOptions {
  port: number;
  staticDir: string;              // directory served under staticPrefix
  staticPrefix?: string;          // default: '/static/'
  config?: ShellConfig;           // default: DEFAULT_SHELL_CONFIG
}

export interface ServerResult {
  server: ReturnType<typeof createServer>;
  /** Stop accepting connections; resolves once open ones have ended. */
  close: () => Promise<void>;
}

/** Map a URL path under the static prefix to a file inside staticDir. */
export function resolveStaticFile(urlPath: string, staticPrefix: string, staticDir: string): string | null {
  if (!urlPath.startsWith(staticPrefix)) return null;
  const root = path.resolve(staticDir);
  const file = path.resolve(root, urlPath.slice(staticPrefix.length));
  // Reject paths that climb out of the static directory
  if (file !== root && !file.startsWith(root + path.sep)) return null;
  return file;
}

export function startServer(options: ServerOptions): ServerResult {
  const app = express();
  const config = options.config ?? DEFAULT_SHELL_CONFIG;
  const staticPrefix = options.staticPrefix ?? '/static/';
  const mountPath = staticPrefix.replace(/\/$/, '');

  app.use((req, _res, next) => {
    log.request('%s %s', req.method, req.path);
    next();
  });

  app.get('/health/', (_req, res) => {
    res.type('text/plain').send('OK');
  });

  // The worker lives under /static/ but controls '/', which browsers only
  // allow when the script response widens its scope explicitly.
  const workerFile = resolveStaticFile(config.workerScript, staticPrefix, options.staticDir);
  if (workerFile) {
    app.get(config.workerScript, (_req, res) => {
      res.setHeader('Service-Worker-Allowed', config.scope);
      res.setHeader('Cache-Control', 'no-cache');
      res.sendFile(workerFile, (err) => {
        if (!err) return;
        log.server('worker script unavailable: %O', err);
        if (!res.headersSent) {
          res.status(404).send('Not found');
        }
      });
    });
  } else {
    log.server('worker script %s is outside %s; not served', config.workerScript, staticPrefix);
  }

  app.use(mountPath, express.static(options.staticDir, {
    setHeaders: (res, filePath) => {
      if (filePath.endsWith('manifest.json')) {
        res.setHeader('Content-Type', 'application/manifest+json');
      }
    },
  }));

  // Application pages and APIs belong to the application server.
  app.use((_req, res) => {
    res.status(404).send('Not found');
  });

  const server = createServer(app);
  log.server('serving %s from %s', staticPrefix, options.staticDir);

  return {
    server,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
