import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { checkPrecache } from '../../src/server/precache-check.js';

describe('checkPrecache', () => {
  let staticDir: string;

  beforeEach(() => {
    staticDir = mkdtempSync(path.join(tmpdir(), 'offline-shell-precache-'));
    mkdirSync(path.join(staticDir, 'css'));
    mkdirSync(path.join(staticDir, 'icons'));
    writeFileSync(path.join(staticDir, 'css', 'output.css'), 'body{}');
  });

  afterEach(() => {
    rmSync(staticDir, { recursive: true, force: true });
  });

  it('sorts manifest entries into present, missing and external', () => {
    const report = checkPrecache(
      { precache: ['/', '/static/css/output.css', '/static/js/htmx.min.js', '/users/login/'] },
      staticDir,
    );

    expect(report).toEqual({
      present: ['/static/css/output.css'],
      missing: ['/static/js/htmx.min.js'],
      external: ['/', '/users/login/'],
    });
  });

  it('counts a directory as missing', () => {
    const report = checkPrecache({ precache: ['/static/icons'] }, staticDir);
    expect(report.missing).toEqual(['/static/icons']);
  });

  it('honours a custom static prefix', () => {
    const report = checkPrecache({ precache: ['/assets/css/output.css', '/static/css/output.css'] }, staticDir, '/assets/');

    expect(report.present).toEqual(['/assets/css/output.css']);
    expect(report.external).toEqual(['/static/css/output.css']);
  });
});
