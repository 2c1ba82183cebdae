/**
 * Shell Command
 *
 * Interactive loop. Each query runs in the background; results print as they
 * complete, which may not be submission order.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createInterface } from 'readline';

import type { AppConfig } from '../../config/types.js';
import {
  QuerySession,
  QUERY_KINDS,
  type QueryCompleted,
  type QueryFailed,
  type QueryKind,
  type QueryResult,
  type QueryStarted
} from '../../session/QuerySession.js';
import { createContext, type OutputFormat, type QueryCommandOptions } from '../context.js';
import { printRendering, renderCycles, renderView } from '../render.js';
import { withBreadthOption, withQueryOptions } from './shared.js';

export type ShellInput =
  | { type: 'query'; kind: QueryKind; pkg: string }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'empty' }
  | { type: 'unknown'; text: string };

export interface ShellStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function parseShellLine(line: string): ShellInput {
  const trimmed = line.trim();
  if (!trimmed) return { type: 'empty' };

  const [word, ...rest] = trimmed.split(/\s+/);
  if (word === 'help' || word === '?') return { type: 'help' };
  if (word === 'quit' || word === 'exit') return { type: 'quit' };

  const kind = QUERY_KINDS.find(candidate => candidate === word);
  if (kind) {
    return { type: 'query', kind, pkg: rest.join(' ') };
  }
  return { type: 'unknown', text: trimmed };
}

function printHelp(): void {
  console.log(chalk.cyan('Commands:'));
  console.log('  deps <package>     Direct dependencies');
  console.log('  rdeps <package>    Reverse dependencies');
  console.log('  cycles <package>   Circular dependencies');
  console.log('  help               Show this help');
  console.log('  quit               Leave the shell');
}

function printResult(result: QueryResult, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printRendering(result.kind === 'cycles' ? renderCycles(result.report) : renderView(result.view));
  }
}

/**
 * Read commands until `quit` or end of input, then wait for running queries.
 * Once the reader is closed it is never prompted again, so the input stays
 * paused and the process can exit.
 */
export async function runShell(session: QuerySession, streams: ShellStreams, format: OutputFormat): Promise<void> {
  const rl = createInterface({ input: streams.input, output: streams.output, prompt: 'depgraph> ' });
  let closed = false;

  const prompt = (): void => {
    if (!closed) rl.prompt();
  };

  const onStarted = ({ kind, pkg }: QueryStarted): void => {
    console.log(chalk.dim(`Running ${kind} for ${pkg}...`));
  };
  const onCompleted = ({ result }: QueryCompleted): void => {
    console.log();
    printResult(result, format);
    prompt();
  };
  const onFailed = ({ kind, pkg, error }: QueryFailed): void => {
    console.error(chalk.red(`${kind} ${pkg} failed: ${error.message}`));
    prompt();
  };

  session.on('started', onStarted);
  session.on('completed', onCompleted);
  session.on('failed', onFailed);

  printHelp();
  prompt();

  await new Promise<void>((resolve) => {
    rl.on('close', () => {
      closed = true;
      resolve();
    });
    rl.on('line', (line) => {
      const input = parseShellLine(line);
      switch (input.type) {
        case 'query':
          if (session.submit(input.kind, input.pkg) === null) {
            console.log(chalk.dim('Enter a package name to query.'));
          }
          break;
        case 'help':
          printHelp();
          break;
        case 'quit':
          rl.close();
          return;
        case 'unknown':
          console.log(chalk.yellow(`Unknown command: ${input.text}`));
          break;
        case 'empty':
          break;
      }
      prompt();
    });
  });

  if (session.pending > 0) {
    console.log(chalk.dim(`Waiting for ${session.pending} running queries...`));
  }
  await session.idle();

  session.off('started', onStarted);
  session.off('completed', onCompleted);
  session.off('failed', onFailed);
}

export function createShellCommand(config: AppConfig): Command {
  return withBreadthOption(withQueryOptions(
    new Command('shell').description('Interactive dependency explorer')
  )).action(async (options: QueryCommandOptions) => {
    try {
      const { builder, detector, logger } = createContext(options, config);
      const session = new QuerySession(builder, detector, logger);
      await runShell(session, { input: process.stdin, output: process.stdout }, options.output);
    } catch (error) {
      console.error(chalk.red('Shell failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
}
