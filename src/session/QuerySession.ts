/**
 * QuerySession
 *
 * Runs user-initiated queries off the input loop and hands results back as
 * events. Queries are independent: no cancellation and no superseding, so
 * results arrive in completion order.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';

import { silentLogger, type Logger } from '../core/Logger.js';
import { normalizePackageName } from '../core/packageName.js';
import type { CycleReport, DependencyView, PackageName } from '../core/types.js';
import type { CycleDetector } from '../graph/CycleDetector.js';
import type { DependencyGraphBuilder } from '../graph/DependencyGraphBuilder.js';

export type QueryKind = 'deps' | 'rdeps' | 'cycles';

export const QUERY_KINDS: readonly QueryKind[] = ['deps', 'rdeps', 'cycles'];

export type QueryResult =
  | { kind: 'deps' | 'rdeps'; view: DependencyView }
  | { kind: 'cycles'; report: CycleReport };

export interface QueryStarted {
  id: string;
  kind: QueryKind;
  pkg: PackageName;
}

export interface QueryCompleted extends QueryStarted {
  result: QueryResult;
}

export interface QueryFailed extends QueryStarted {
  error: Error;
}

export interface QuerySessionEvents {
  started: (event: QueryStarted) => void;
  completed: (event: QueryCompleted) => void;
  failed: (event: QueryFailed) => void;
}

export interface QuerySession {
  on<E extends keyof QuerySessionEvents>(event: E, listener: QuerySessionEvents[E]): this;
  off<E extends keyof QuerySessionEvents>(event: E, listener: QuerySessionEvents[E]): this;
  emit<E extends keyof QuerySessionEvents>(event: E, ...args: Parameters<QuerySessionEvents[E]>): boolean;
}

export class QuerySession extends EventEmitter {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly builder: DependencyGraphBuilder,
    private readonly detector: CycleDetector,
    private readonly logger: Logger = silentLogger
  ) {
    super();
  }

  /**
   * Start a query. Blank input is a no-op and returns null.
   */
  submit(kind: QueryKind, input: string): string | null {
    const pkg = normalizePackageName(input);
    if (!pkg) {
      return null;
    }

    const id = uuidv4();
    this.emit('started', { id, kind, pkg });

    const task = this.run(kind, pkg).then(
      (result) => {
        this.emit('completed', { id, kind, pkg, result });
      },
      (error: unknown) => {
        this.emit('failed', {
          id,
          kind,
          pkg,
          error: error instanceof Error ? error : new Error(String(error))
        });
      }
    ).catch((listenerError: unknown) => {
      this.logger.error(`Listener for query ${id} threw:`, listenerError);
    });

    const tracked = task.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);

    return id;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every query submitted so far has settled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async run(kind: QueryKind, pkg: PackageName): Promise<QueryResult> {
    switch (kind) {
      case 'deps':
        return { kind, view: await this.builder.buildDependencyView(pkg) };
      case 'rdeps':
        return { kind, view: await this.builder.buildReverseView(pkg) };
      case 'cycles':
        return { kind, report: await this.detector.detect(pkg) };
      default: {
        const unknownKind: never = kind;
        throw new Error(`Unknown query kind: ${String(unknownKind)}`);
      }
    }
  }
}
