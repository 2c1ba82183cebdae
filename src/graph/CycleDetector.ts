/**
 * CycleDetector
 *
 * Depth-first search over the forward-dependency relation from a root package.
 * A package already on the current path closes a cycle; a package already
 * fully explored is not expanded again (unless `exhaustive` is set).
 */

import { silentLogger, type Logger } from '../core/Logger.js';
import { requirePackageName } from '../core/packageName.js';
import type { Cycle, CycleReport, LookupFailure, PackageName, TraversalState } from '../core/types.js';
import type { MetadataProvider } from '../provider/types.js';
import { DependencyGraph } from './DependencyGraph.js';
import { DEFAULT_BREADTH_CAP, type CycleDetectorOptions } from './types.js';

interface SearchContext extends TraversalState {
  graph: DependencyGraph;
  failures: LookupFailure[];
  explored: number;
}

export class CycleDetector {
  private readonly breadthCap: number;
  private readonly maxDepth: number;
  private readonly exhaustive: boolean;
  private readonly timeoutMs?: number;

  constructor(
    private readonly provider: MetadataProvider,
    options: CycleDetectorOptions = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.breadthCap = options.breadthCap ?? DEFAULT_BREADTH_CAP;
    this.maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
    this.exhaustive = options.exhaustive ?? false;
    this.timeoutMs = options.timeoutMs;
  }

  async findCycles(root: string): Promise<Cycle[]> {
    return (await this.detect(root)).cycles;
  }

  /**
   * Run the search and report cycles alongside any failed lookups
   */
  async detect(rootInput: string): Promise<CycleReport> {
    const root = requirePackageName(rootInput);
    const context: SearchContext = {
      visited: new Set(),
      path: [],
      graph: new DependencyGraph(),
      failures: [],
      explored: 0
    };

    const cycles = await this.visit(root, context);
    const rootFailure = context.failures.find(failure => failure.name === root);

    this.logger.debug(`Cycle search from ${root}: ${cycles.length} cycles, ${context.explored} lookups`);

    return {
      root,
      status: rootFailure ? 'error' : 'ok',
      error: rootFailure?.reason,
      cycles,
      failures: context.failures,
      explored: context.explored,
      edges: context.graph.edges()
    };
  }

  private async visit(pkg: PackageName, context: SearchContext): Promise<Cycle[]> {
    const onPath = context.path.indexOf(pkg);
    if (onPath !== -1) {
      return [[...context.path.slice(onPath), pkg]];
    }

    if (!this.exhaustive && context.visited.has(pkg)) {
      return [];
    }

    if (context.path.length >= this.maxDepth) {
      return [];
    }

    context.visited.add(pkg);
    context.path.push(pkg);

    const cycles: Cycle[] = [];
    try {
      for (const dependency of await this.expand(pkg, context)) {
        cycles.push(...await this.visit(dependency, context));
      }
    } finally {
      context.path.pop();
    }

    return cycles;
  }

  private async expand(pkg: PackageName, context: SearchContext): Promise<PackageName[]> {
    context.explored++;
    const lookup = await this.provider.getDirectDependencies(pkg, this.timeoutMs);
    if (!lookup.ok) {
      this.logger.warn(`Dependency lookup failed for ${pkg}: ${lookup.error.message}`);
      context.failures.push({ name: pkg, reason: lookup.error.message });
      return [];
    }

    const dependencies = lookup.value.slice(0, this.breadthCap);
    context.graph.addDependencies(pkg, dependencies);
    return dependencies;
  }
}
