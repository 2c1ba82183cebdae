import { describe, it, expect } from 'vitest';
import { renderCycles, renderView, NO_CYCLES_MESSAGE, MAX_CYCLE_ROWS } from './render.js';
import type { CycleReport, DependencyView } from '../core/types.js';

function view(overrides: Partial<DependencyView>): DependencyView {
  return {
    mode: 'forward',
    root: 'app',
    title: 'Dependencies of app',
    status: 'ok',
    count: 0,
    entries: [],
    edges: [],
    ...overrides
  };
}

function report(overrides: Partial<CycleReport>): CycleReport {
  return { root: 'app', status: 'ok', cycles: [], failures: [], explored: 1, edges: [], ...overrides };
}

describe('renderView', () => {
  it('should render only a header for a package without dependencies', () => {
    expect(renderView(view({}))).toEqual({
      rows: [{ title: 'Dependencies of app', subtitle: '0 packages', tone: 'header' }],
      status: 'app: 0 dependencies'
    });
  });

  it('should annotate children with their own dependency counts', () => {
    const rendering = renderView(view({
      count: 3,
      entries: [
        { name: 'lib', dependencyCount: 4, status: 'ok' },
        { name: 'leaf', dependencyCount: 0, status: 'ok' },
        { name: 'gone', dependencyCount: 0, status: 'error', error: 'Provider timed out' }
      ]
    }));

    expect(rendering.rows).toEqual([
      { title: 'Dependencies of app', subtitle: '3 packages', tone: 'header' },
      { title: 'lib', subtitle: '4 dependencies', tone: 'normal' },
      { title: 'leaf', tone: 'normal' },
      { title: 'gone', subtitle: 'lookup failed', tone: 'error' }
    ]);
    expect(rendering.status).toBe('app: 3 dependencies');
  });

  it('should render reverse views without counts', () => {
    const rendering = renderView(view({
      mode: 'reverse',
      root: 'lib',
      title: 'Reverse dependencies of lib',
      count: 1,
      entries: [{ name: 'app', dependencyCount: null, status: 'ok' }]
    }));

    expect(rendering.rows[1]).toEqual({ title: 'app', tone: 'normal' });
    expect(rendering.status).toBe('lib: 1 reverse dependencies');
  });

  it('should distinguish a failed lookup from an empty result', () => {
    const rendering = renderView(view({ status: 'error', error: 'Provider executable not found: apt-cache depends app' }));

    expect(rendering.status).toBe('Lookup failed for app: Provider executable not found: apt-cache depends app');
    expect(rendering.rows).toEqual([{ title: 'Dependencies of app', subtitle: 'lookup failed', tone: 'error' }]);
  });
});

describe('renderCycles', () => {
  it('should render the no-cycles message for an empty result', () => {
    expect(renderCycles(report({}))).toEqual({
      rows: [{ title: NO_CYCLES_MESSAGE, subtitle: 'app', tone: 'normal' }],
      status: '0 circular dependencies found'
    });
    expect(NO_CYCLES_MESSAGE).toBe('No circular dependencies found');
  });

  it('should render each cycle as an arrow chain', () => {
    const rendering = renderCycles(report({ cycles: [['app', 'lib', 'app'], ['lib', 'lib']] }));

    expect(rendering.rows).toEqual([
      { title: 'app → lib → app', tone: 'error' },
      { title: 'lib → lib', tone: 'error' }
    ]);
    expect(rendering.status).toBe('2 circular dependencies found');
  });

  it('should cap the rows but count every cycle', () => {
    const cycles = Array.from({ length: 25 }, (_, i) => [`p${i}`, `p${i}`]);
    const rendering = renderCycles(report({ cycles }));

    expect(rendering.rows).toHaveLength(MAX_CYCLE_ROWS);
    expect(rendering.status).toBe('25 circular dependencies found');
  });

  it('should mention failed lookups in the status line', () => {
    const rendering = renderCycles(report({ failures: [{ name: 'lib', reason: 'Provider timed out' }] }));

    expect(rendering.status).toBe('0 circular dependencies found (1 lookups failed)');
  });

  it('should render a failed root lookup distinctly', () => {
    const rendering = renderCycles(report({ status: 'error', error: 'Provider timed out' }));

    expect(rendering).toEqual({
      rows: [{ title: 'Lookup failed for app', subtitle: 'Provider timed out', tone: 'error' }],
      status: 'Lookup failed for app: Provider timed out'
    });
  });
});
