/**
 * Core Types
 *
 * Shared type definitions for dependency lookups, graph views and cycle reports.
 */

import type { ProviderUnavailableError } from './errors.js';

/**
 * Opaque, case-sensitive package identifier
 */
export type PackageName = string;

/**
 * "from depends on to"
 */
export interface DependencyEdge {
  from: PackageName;
  to: PackageName;
}

export interface DependencyRecord {
  name: PackageName;
  /** Direct dependencies in provider order, duplicates kept */
  dependencies: PackageName[];
}

export interface ReverseDependencyRecord {
  name: PackageName;
  /** Declaring packages, verbatim from the provider */
  dependents: PackageName[];
}

/**
 * Path that returns to its own origin. First and last element are equal.
 */
export type Cycle = PackageName[];

/**
 * Per-query traversal bookkeeping; never outlives a single search
 */
export interface TraversalState {
  visited: Set<PackageName>;
  path: PackageName[];
}

/**
 * Outcome of a single provider lookup. Keeps "no data" apart from "lookup failed".
 */
export type LookupResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProviderUnavailableError };

export type QueryStatus = 'ok' | 'error';

export type ViewMode = 'forward' | 'reverse';

export interface ViewEntry {
  name: PackageName;
  /** Own direct dependency count; null in reverse views */
  dependencyCount: number | null;
  status: QueryStatus;
  error?: string;
}

export interface DependencyView {
  mode: ViewMode;
  root: PackageName;
  title: string;
  status: QueryStatus;
  /** Set when the root lookup failed */
  error?: string;
  count: number;
  entries: ViewEntry[];
  edges: DependencyEdge[];
}

export interface LookupFailure {
  name: PackageName;
  reason: string;
}

export interface CycleReport {
  root: PackageName;
  status: QueryStatus;
  error?: string;
  cycles: Cycle[];
  failures: LookupFailure[];
  /** Number of provider lookups issued */
  explored: number;
  /** Forward edges seen during the search, breadth cap applied */
  edges: DependencyEdge[];
}
