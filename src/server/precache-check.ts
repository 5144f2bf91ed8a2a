import { existsSync, statSync } from 'node:fs';
import type { ShellConfig } from '../shared/shell-config.js';
import { resolveStaticFile } from './index.js';

export interface PrecacheReport {
  /** Manifest entries found on disk. */
  present: string[];
  /** Manifest entries under the static prefix with no file; installation would fail. */
  missing: string[];
  /** Manifest entries served by the application server; not checked. */
  external: string[];
}

export function checkPrecache(
  config: Pick<ShellConfig, 'precache'>,
  staticDir: string,
  staticPrefix = '/static/',
): PrecacheReport {
  const report: PrecacheReport = { present: [], missing: [], external: [] };
  for (const entry of config.precache) {
    const file = resolveStaticFile(entry, staticPrefix, staticDir);
    if (file === null) {
      report.external.push(entry);
    } else if (existsSync(file) && statSync(file).isFile()) {
      report.present.push(entry);
    } else {
      report.missing.push(entry);
    }
  }
  return report;
}
