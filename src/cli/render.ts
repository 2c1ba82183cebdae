/**
 * Render
 *
 * Turns query results into display rows and a status line, then prints them.
 */

import chalk from 'chalk';

import type { CycleReport, DependencyView } from '../core/types.js';

export const MAX_CYCLE_ROWS = 20;

export const NO_CYCLES_MESSAGE = 'No circular dependencies found';

export type RowTone = 'header' | 'normal' | 'error';

export interface Row {
  title: string;
  subtitle?: string;
  tone: RowTone;
}

export interface Rendering {
  rows: Row[];
  status: string;
}

export function renderView(view: DependencyView): Rendering {
  if (view.status === 'error') {
    return {
      rows: [{ title: view.title, subtitle: 'lookup failed', tone: 'error' }],
      status: `Lookup failed for ${view.root}: ${view.error ?? 'unknown error'}`
    };
  }

  const rows: Row[] = [{ title: view.title, subtitle: `${view.count} packages`, tone: 'header' }];

  for (const entry of view.entries) {
    if (entry.status === 'error') {
      rows.push({ title: entry.name, subtitle: 'lookup failed', tone: 'error' });
    } else if (entry.dependencyCount) {
      rows.push({ title: entry.name, subtitle: `${entry.dependencyCount} dependencies`, tone: 'normal' });
    } else {
      rows.push({ title: entry.name, tone: 'normal' });
    }
  }

  const noun = view.mode === 'forward' ? 'dependencies' : 'reverse dependencies';
  return { rows, status: `${view.root}: ${view.count} ${noun}` };
}

export function renderCycles(report: CycleReport): Rendering {
  if (report.status === 'error') {
    return {
      rows: [{ title: `Lookup failed for ${report.root}`, subtitle: report.error, tone: 'error' }],
      status: `Lookup failed for ${report.root}: ${report.error ?? 'unknown error'}`
    };
  }

  const rows: Row[] = report.cycles.length === 0
    ? [{ title: NO_CYCLES_MESSAGE, subtitle: report.root, tone: 'normal' }]
    : report.cycles.slice(0, MAX_CYCLE_ROWS).map((cycle): Row => ({ title: cycle.join(' → '), tone: 'error' }));

  let status = `${report.cycles.length} circular dependencies found`;
  if (report.failures.length > 0) {
    status += ` (${report.failures.length} lookups failed)`;
  }
  return { rows, status };
}

export function printRendering(rendering: Rendering): void {
  for (const row of rendering.rows) {
    const title = row.tone === 'header'
      ? chalk.cyan.bold(row.title)
      : row.tone === 'error' ? chalk.red(row.title) : chalk.white(row.title);
    console.log(row.subtitle ? `${title}  ${chalk.dim(row.subtitle)}` : title);
  }
  console.log(chalk.dim('─'.repeat(40)));
  console.log(chalk.dim(rendering.status));
}
