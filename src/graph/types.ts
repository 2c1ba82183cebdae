/**
 * Graph Builder and Cycle Detector options
 */

/** Dependencies expanded per node during cycle search */
export const DEFAULT_BREADTH_CAP = 10;

export interface CycleDetectorOptions {
  /** Maximum dependencies explored per node (default: 10) */
  breadthCap?: number;
  /** Stop expanding once the current path holds this many packages (default: unbounded) */
  maxDepth?: number;
  /**
   * Skip the visited memo and re-expand nodes reached through another parent.
   * Finds cycles the memoized search misses; cost grows exponentially.
   */
  exhaustive?: boolean;
  /** Per-lookup provider timeout override */
  timeoutMs?: number;
}

export interface GraphBuilderOptions {
  timeoutMs?: number;
}
