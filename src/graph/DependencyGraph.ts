/**
 * DependencyGraph
 *
 * Adjacency structure assembled incrementally during a single query.
 * Forward edges are stored as reported; reverse lookups are answered from a
 * mirrored index kept in step with them.
 */

import type { DependencyEdge, PackageName } from '../core/types.js';

export class DependencyGraph {
  private readonly forward = new Map<PackageName, PackageName[]>();
  private readonly reverse = new Map<PackageName, PackageName[]>();
  private readonly edgeList: DependencyEdge[] = [];

  /**
   * Record that `from` depends on each of `to`, in order, duplicates kept
   */
  addDependencies(from: PackageName, to: readonly PackageName[]): void {
    for (const target of to) {
      this.addEdge(from, target);
    }
    if (!this.forward.has(from)) {
      this.forward.set(from, []);
    }
  }

  /**
   * Record that each of `dependents` depends on `on`
   */
  addDependents(on: PackageName, dependents: readonly PackageName[]): void {
    for (const source of dependents) {
      this.addEdge(source, on);
    }
    if (!this.reverse.has(on)) {
      this.reverse.set(on, []);
    }
  }

  dependenciesOf(pkg: PackageName): PackageName[] {
    return [...(this.forward.get(pkg) ?? [])];
  }

  dependentsOf(pkg: PackageName): PackageName[] {
    return [...(this.reverse.get(pkg) ?? [])];
  }

  hasEdge(from: PackageName, to: PackageName): boolean {
    return this.forward.get(from)?.includes(to) ?? false;
  }

  has(pkg: PackageName): boolean {
    return this.forward.has(pkg) || this.reverse.has(pkg);
  }

  edges(): DependencyEdge[] {
    return this.edgeList.map(edge => ({ ...edge }));
  }

  get size(): number {
    const nodes = new Set<PackageName>([...this.forward.keys(), ...this.reverse.keys()]);
    return nodes.size;
  }

  private addEdge(from: PackageName, to: PackageName): void {
    append(this.forward, from, to);
    append(this.reverse, to, from);
    this.edgeList.push({ from, to });
  }
}

function append(index: Map<PackageName, PackageName[]>, key: PackageName, value: PackageName): void {
  const list = index.get(key);
  if (list) {
    list.push(value);
  } else {
    index.set(key, [value]);
  }
}
