#!/usr/bin/env node

import { existsSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { startServer } from '../src/server/index.js';
import { checkPrecache } from '../src/server/precache-check.js';
import { defineShellConfig } from '../src/shared/shell-config.js';

function findPackageJson(): { version: string } {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) {
      return JSON.parse(readFileSync(candidate, 'utf-8'));
    }
    dir = dirname(dir);
  }
  return { version: '0.0.0' };
}

const { version } = findPackageJson();

const program = new Command()
  .name('offline-shell')
  .description('Serve the offline shell worker and its precached assets')
  .version(version)
  .option('--port <n>', 'port to listen on', '8000')
  .option('--static-dir <path>', 'directory served under /static/', 'static')
  .option('--static-version <token>', 'static partition version', 'v1')
  .option('--dynamic-version <token>', 'dynamic partition version', 'v1')
  .option('--verbose', 'enable debug logging (DEBUG=offline-shell:*)')
  .parse();

const opts = program.opts<{
  port: string;
  staticDir: string;
  staticVersion: string;
  dynamicVersion: string;
  verbose?: boolean;
}>();

// Set DEBUG env before any debug() loggers are created
if (opts.verbose && !process.env.DEBUG) {
  process.env.DEBUG = 'offline-shell:*';
}

// ─── Startup checklist helpers ────────────────────────────────────────

const DONE  = '✔';
const WARN  = '⚠';
const WAIT  = '○';

function stepStart(label: string, detail = '') {
  process.stdout.write(`  ${WAIT} ${label.padEnd(14)}${detail}`);
}

/** Finish a checklist step: overwrite the current line, clearing any leftover chars. */
function stepDone(label: string, detail: string, icon = DONE) {
  const content = `  ${icon} ${label.padEnd(14)}${detail}`;
  process.stdout.write(`\r\x1b[2K${content}\n`);
}

async function listenOrThrow(server: ReturnType<typeof startServer>['server'], port: number): Promise<void> {
  return new Promise<void>((resolvePromise, rejectPromise) => {
    const handleError = (error: Error) => {
      server.off('error', handleError);
      rejectPromise(error);
    };
    server.once('error', handleError);
    server.listen(port, () => {
      server.off('error', handleError);
      resolvePromise();
    });
  });
}

async function main() {
  console.log();
  console.log('  Offline Shell');
  console.log();

  const port = parseInt(opts.port, 10);
  if (!Number.isInteger(port) || port < 0) {
    throw new Error(`Invalid port: ${opts.port}`);
  }

  const config = defineShellConfig({
    staticVersion: opts.staticVersion,
    dynamicVersion: opts.dynamicVersion,
  });
  const staticDir = resolve(opts.staticDir);

  // ── Step 1: Precache manifest ───────────────────────────────────────
  stepStart('Precache', 'checking...');
  const report = checkPrecache(config, staticDir);
  if (report.missing.length > 0) {
    stepDone('Precache', `missing ${report.missing.join(', ')} (install will fail)`, WARN);
  } else {
    stepDone('Precache', `${report.present.length} static, ${report.external.length} from app server`);
  }

  // ── Step 2: Server ──────────────────────────────────────────────────
  stepStart('Server');
  const { server, close } = startServer({ port, staticDir, config });
  await listenOrThrow(server, port);

  const addr = server.address();
  if (!addr || typeof addr === 'string') {
    throw new Error('Unable to determine server port');
  }
  stepDone('Server', `http://localhost:${addr.port}`);
  stepDone('Worker', `${config.workerScript} (scope ${config.scope})`);

  console.log();
  console.log('  Press Ctrl+C to stop');

  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log('\nShutting down...');
    close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Error while closing server:', err);
        process.exit(1);
      });

    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Fatal:', message);
  process.exit(1);
});
