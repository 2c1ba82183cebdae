/**
 * StaticGraphProvider
 *
 * Metadata provider over a fixed adjacency map, loaded from a JSON graph file
 * or built in code. Unknown packages have no dependencies.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';

import { ConfigError } from '../core/errors.js';
import type { LookupResult, PackageName } from '../core/types.js';
import type { MetadataProvider } from './types.js';

const GraphFileSchema = z.object({
  packages: z.record(z.string(), z.array(z.string()))
});

export type GraphFile = z.infer<typeof GraphFileSchema>;

export class StaticGraphProvider implements MetadataProvider {
  private readonly forward: Map<PackageName, PackageName[]>;

  constructor(packages: Record<PackageName, PackageName[]> | Map<PackageName, PackageName[]>) {
    this.forward = packages instanceof Map ? new Map(packages) : new Map(Object.entries(packages));
  }

  /**
   * Load `{ "packages": { "<name>": ["dep", ...] } }` from disk
   */
  static fromFile(path: string): StaticGraphProvider {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(path, error instanceof Error ? error.message : String(error));
    }

    const parsed = GraphFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(path, parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
    }
    return new StaticGraphProvider(parsed.data.packages);
  }

  async getDirectDependencies(pkg: PackageName): Promise<LookupResult<PackageName[]>> {
    return { ok: true, value: [...(this.forward.get(pkg) ?? [])] };
  }

  /**
   * One entry per declaring edge, in map insertion order
   */
  async getReverseDependencies(pkg: PackageName): Promise<LookupResult<PackageName[]>> {
    const dependents: PackageName[] = [];
    for (const [name, dependencies] of this.forward) {
      for (const dependency of dependencies) {
        if (dependency === pkg) {
          dependents.push(name);
        }
      }
    }
    return { ok: true, value: dependents };
  }
}
