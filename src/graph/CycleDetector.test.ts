import { describe, it, expect } from 'vitest';
import { CycleDetector } from './CycleDetector.js';
import { StaticGraphProvider } from '../provider/StaticGraphProvider.js';
import { EmptyInputError, ProviderUnavailableError } from '../core/errors.js';
import type { LookupResult, PackageName } from '../core/types.js';
import type { MetadataProvider } from '../provider/types.js';

/**
 * Static provider that counts forward lookups per package
 */
class CountingProvider implements MetadataProvider {
  readonly calls: PackageName[] = [];
  private readonly inner: StaticGraphProvider;

  constructor(packages: Record<PackageName, PackageName[]>, private readonly failing: Set<PackageName> = new Set()) {
    this.inner = new StaticGraphProvider(packages);
  }

  callsFor(pkg: PackageName): number {
    return this.calls.filter(call => call === pkg).length;
  }

  async getDirectDependencies(pkg: PackageName): Promise<LookupResult<PackageName[]>> {
    this.calls.push(pkg);
    if (this.failing.has(pkg)) {
      return { ok: false, error: new ProviderUnavailableError('timeout', `apt-cache depends ${pkg}`, '10000ms') };
    }
    return this.inner.getDirectDependencies(pkg);
  }

  async getReverseDependencies(pkg: PackageName): Promise<LookupResult<PackageName[]>> {
    return this.inner.getReverseDependencies(pkg);
  }
}

describe('CycleDetector', () => {
  describe('findCycles', () => {
    it('should find the cycle through the first branch before exploring the second', async () => {
      const provider = new CountingProvider({ A: ['B', 'C'], B: ['A'], C: [] });
      const detector = new CycleDetector(provider);

      const cycles = await detector.findCycles('A');

      expect(cycles).toEqual([['A', 'B', 'A']]);
      expect(provider.calls).toEqual(['A', 'B', 'C']);
    });

    it('should report a self-dependency as a two-element cycle', async () => {
      const detector = new CycleDetector(new CountingProvider({ A: ['A'] }));

      expect(await detector.findCycles('A')).toEqual([['A', 'A']]);
    });

    it('should return an empty list for an acyclic graph', async () => {
      const detector = new CycleDetector(new CountingProvider({ A: ['B', 'C'], B: ['C'], C: ['D'] }));

      expect(await detector.findCycles('A')).toEqual([]);
    });

    it('should return cycles in discovery order without deduplication', async () => {
      const provider = new CountingProvider({ A: ['B', 'C'], B: ['C', 'A'], C: ['A', 'C'] });
      const detector = new CycleDetector(provider);

      const cycles = await detector.findCycles('A');

      expect(cycles).toEqual([
        ['A', 'B', 'C', 'A'],
        ['C', 'C'],
        ['A', 'B', 'A']
      ]);
    });

    it('should only return cycles whose steps are real dependency edges', async () => {
      const provider = new CountingProvider({ A: ['B', 'C'], B: ['C', 'A'], C: ['A', 'C'], D: ['A'] });
      const detector = new CycleDetector(provider);

      const report = await detector.detect('A');

      expect(report.cycles.length).toBeGreaterThan(0);
      for (const cycle of report.cycles) {
        expect(cycle.length).toBeGreaterThanOrEqual(2);
        expect(cycle[0]).toBe(cycle[cycle.length - 1]);
        for (let i = 0; i < cycle.length - 1; i++) {
          expect(report.edges).toContainEqual({ from: cycle[i], to: cycle[i + 1] });
        }
      }
    });

    it('should reject blank input before any provider call', async () => {
      const provider = new CountingProvider({});
      const detector = new CycleDetector(provider);

      await expect(detector.findCycles(' ')).rejects.toBeInstanceOf(EmptyInputError);
      expect(provider.calls).toEqual([]);
    });
  });

  describe('breadth cap', () => {
    const children = Array.from({ length: 15 }, (_, i) => `dep${i + 1}`);

    it('should expand only the first 10 dependencies of a node', async () => {
      const provider = new CountingProvider({ hub: children });
      const detector = new CycleDetector(provider);

      const report = await detector.detect('hub');

      expect(provider.calls).toEqual(['hub', ...children.slice(0, 10)]);
      expect(provider.callsFor('dep11')).toBe(0);
      expect(report.explored).toBe(11);
    });

    it('should miss cycles beyond the cap', async () => {
      const packages: Record<string, string[]> = { hub: children, dep12: ['hub'] };
      const detector = new CycleDetector(new CountingProvider(packages));

      expect(await detector.findCycles('hub')).toEqual([]);
    });

    it('should honour a custom cap', async () => {
      const provider = new CountingProvider({ hub: children });
      const detector = new CycleDetector(provider, { breadthCap: 3 });

      await detector.detect('hub');

      expect(provider.calls).toEqual(['hub', 'dep1', 'dep2', 'dep3']);
    });
  });

  describe('memoization', () => {
    const diamond = { A: ['B', 'C'], B: ['D'], C: ['D'], D: ['A'] };

    it('should not re-expand a package that was already explored', async () => {
      const provider = new CountingProvider(diamond);
      const detector = new CycleDetector(provider);

      const cycles = await detector.findCycles('A');

      expect(cycles).toEqual([['A', 'B', 'D', 'A']]);
      expect(provider.callsFor('D')).toBe(1);
    });

    it('should find cycles through cleared packages in exhaustive mode', async () => {
      const provider = new CountingProvider(diamond);
      const detector = new CycleDetector(provider, { exhaustive: true });

      const cycles = await detector.findCycles('A');

      expect(cycles).toEqual([
        ['A', 'B', 'D', 'A'],
        ['A', 'C', 'D', 'A']
      ]);
      expect(provider.callsFor('D')).toBe(2);
    });
  });

  describe('maxDepth', () => {
    const ring = { A: ['B'], B: ['C'], C: ['A'] };

    it('should stop expanding once the path reaches the limit', async () => {
      const provider = new CountingProvider(ring);
      const detector = new CycleDetector(provider, { maxDepth: 2 });

      expect(await detector.findCycles('A')).toEqual([]);
      expect(provider.calls).toEqual(['A', 'B']);
    });

    it('should find cycles that fit within the limit', async () => {
      const detector = new CycleDetector(new CountingProvider(ring), { maxDepth: 3 });

      expect(await detector.findCycles('A')).toEqual([['A', 'B', 'C', 'A']]);
    });
  });

  describe('lookup failures', () => {
    it('should continue past a failed lookup and record it', async () => {
      const provider = new CountingProvider({ A: ['B', 'C'], C: ['A'] }, new Set(['B']));
      const detector = new CycleDetector(provider);

      const report = await detector.detect('A');

      expect(report.status).toBe('ok');
      expect(report.cycles).toEqual([['A', 'C', 'A']]);
      expect(report.failures).toEqual([
        { name: 'B', reason: 'Provider timed out: apt-cache depends B (10000ms)' }
      ]);
    });

    it('should report an error when the root lookup fails', async () => {
      const provider = new CountingProvider({}, new Set(['A']));
      const detector = new CycleDetector(provider);

      const report = await detector.detect('A');

      expect(report).toEqual({
        root: 'A',
        status: 'error',
        error: 'Provider timed out: apt-cache depends A (10000ms)',
        cycles: [],
        failures: [{ name: 'A', reason: 'Provider timed out: apt-cache depends A (10000ms)' }],
        explored: 1,
        edges: []
      });
    });
  });

  it('should start every search with fresh state', async () => {
    const provider = new CountingProvider({ A: ['B'], B: ['A'] });
    const detector = new CycleDetector(provider);

    const first = await detector.findCycles('A');
    const second = await detector.findCycles('A');

    expect(first).toEqual([['A', 'B', 'A']]);
    expect(second).toEqual(first);
    expect(provider.calls).toEqual(['A', 'B', 'A', 'B']);
  });
});
