import { EmptyInputError } from './errors.js';
import type { PackageName } from './types.js';

/**
 * Trim whitespace and surrounding virtual-package markers (`<pkg>` -> `pkg`).
 */
export function normalizePackageName(raw: string): PackageName {
  let name = raw.trim();
  if (name.startsWith('<')) {
    name = name.replace(/^<+|>+$/g, '');
  }
  return name.trim();
}

/**
 * Normalize user input, rejecting blank names before any provider call.
 */
export function requirePackageName(raw: string): PackageName {
  const name = normalizePackageName(raw);
  if (!name) {
    throw new EmptyInputError();
  }
  return name;
}
