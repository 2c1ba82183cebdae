/**
 * Parsers for `apt-cache depends` and `apt-cache rdepends` output.
 */

import { normalizePackageName } from '../core/packageName.js';
import type { ParseResult } from './types.js';

const DEPENDS_MARKERS = ['Depends:', 'PreDepends:'];

/** Header lines printed by `apt-cache rdepends` before the dependents */
const RDEPENDS_HEADER_LINES = 2;

/**
 * Collect the first token after each `Depends:` / `PreDepends:` marker.
 * Alternatives (`|Depends:`) and other relation kinds are ignored.
 */
export function parseDependsOutput(output: string): ParseResult {
  const names: string[] = [];
  const anomalies: string[] = [];

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!DEPENDS_MARKERS.some(marker => line.startsWith(marker))) {
      continue;
    }

    const token = line.slice(line.indexOf(':') + 1).trim().split(/\s+/)[0];
    const name = token ? normalizePackageName(token) : '';
    if (!name) {
      anomalies.push(rawLine);
      continue;
    }
    names.push(name);
  }

  return { names, anomalies };
}

/**
 * Every non-empty line after the header that is not an alternative (`|pkg`),
 * taken verbatim.
 */
export function parseRdependsOutput(output: string): ParseResult {
  const names: string[] = [];

  for (const rawLine of output.split(/\r?\n/).slice(RDEPENDS_HEADER_LINES)) {
    const line = rawLine.trim();
    if (line && !line.startsWith('|')) {
      names.push(line);
    }
  }

  return { names, anomalies: [] };
}
