/**
 * DependencyGraphBuilder
 *
 * Builds the flat, annotated views shown for a forward or reverse query.
 */

import { silentLogger, type Logger } from '../core/Logger.js';
import { requirePackageName } from '../core/packageName.js';
import type { DependencyView, PackageName, ViewEntry } from '../core/types.js';
import type { MetadataProvider } from '../provider/types.js';
import { DependencyGraph } from './DependencyGraph.js';
import type { GraphBuilderOptions } from './types.js';

export class DependencyGraphBuilder {
  private readonly timeoutMs?: number;

  constructor(
    private readonly provider: MetadataProvider,
    options: GraphBuilderOptions = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Direct dependencies of `root`, each annotated with its own dependency
   * count. Children are looked up one at a time, in provider order.
   */
  async buildDependencyView(rootInput: string): Promise<DependencyView> {
    const root = requirePackageName(rootInput);
    const title = `Dependencies of ${root}`;
    const graph = new DependencyGraph();

    const lookup = await this.provider.getDirectDependencies(root, this.timeoutMs);
    if (!lookup.ok) {
      return failedView('forward', root, title, lookup.error.message);
    }
    graph.addDependencies(root, lookup.value);

    const entries: ViewEntry[] = [];
    for (const child of lookup.value) {
      const childLookup = await this.provider.getDirectDependencies(child, this.timeoutMs);
      if (childLookup.ok) {
        graph.addDependencies(child, childLookup.value);
        entries.push({ name: child, dependencyCount: childLookup.value.length, status: 'ok' });
      } else {
        this.logger.warn(`Lookahead failed for ${child}: ${childLookup.error.message}`);
        entries.push({ name: child, dependencyCount: 0, status: 'error', error: childLookup.error.message });
      }
    }

    return {
      mode: 'forward',
      root,
      title,
      status: 'ok',
      count: lookup.value.length,
      entries,
      edges: graph.edges()
    };
  }

  /**
   * Packages that declare a dependency on `root`, as the provider lists them
   */
  async buildReverseView(rootInput: string): Promise<DependencyView> {
    const root = requirePackageName(rootInput);
    const title = `Reverse dependencies of ${root}`;
    const graph = new DependencyGraph();

    const lookup = await this.provider.getReverseDependencies(root, this.timeoutMs);
    if (!lookup.ok) {
      return failedView('reverse', root, title, lookup.error.message);
    }
    graph.addDependents(root, lookup.value);

    return {
      mode: 'reverse',
      root,
      title,
      status: 'ok',
      count: lookup.value.length,
      entries: graph.dependentsOf(root).map((name): ViewEntry => ({
        name,
        dependencyCount: null,
        status: 'ok'
      })),
      edges: graph.edges()
    };
  }
}

function failedView(mode: DependencyView['mode'], root: PackageName, title: string, error: string): DependencyView {
  return { mode, root, title, status: 'error', error, count: 0, entries: [], edges: [] };
}
