/**
 * Error reporting for batteries-driven programs.
 *
 * Errors carry an exit code and an optional cause. At the top level the
 * whole cause chain is rendered, outermost first:
 *
 *   Error: Error parsing log-filter
 *
 *   Caused by:
 *      0: invalid level "loud" in filter directive "app=loud"
 */

import chalk from 'chalk';
import { CommanderError } from 'commander';

interface BatteriesErrorOptions {
  exitCode?: number;
  cause?: unknown;
}

export class BatteriesError extends Error {
  readonly exitCode: number;

  constructor(message: string, options: BatteriesErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BatteriesError';
    this.exitCode = options.exitCode ?? 1;
  }
}

export function isBatteriesError(error: unknown): error is BatteriesError {
  return error instanceof BatteriesError;
}

/** Attach context to an error. The exit code of a wrapped BatteriesError is kept. */
export function wrapError(error: unknown, message: string, exitCode?: number): BatteriesError {
  return new BatteriesError(message, {
    cause: error,
    exitCode: exitCode ?? (isBatteriesError(error) ? error.exitCode : undefined),
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Messages from the outermost error down to the root cause. */
export function errorChain(error: unknown): string[] {
  const chain: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    chain.push(errorMessage(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

export function formatReport(error: unknown): string {
  const [head, ...causes] = errorChain(error);
  const lines = [`Error: ${head ?? 'unknown error'}`];
  if (causes.length > 0) {
    lines.push('', 'Caused by:');
    causes.forEach((cause, index) => {
      lines.push(`   ${index}: ${cause}`);
    });
  }
  return lines.join('\n');
}

export function exitCodeFor(error: unknown): number {
  if (isBatteriesError(error)) return error.exitCode;
  if (error instanceof CommanderError) return error.exitCode;
  return 1;
}

export interface ReportWriter {
  write(chunk: string): unknown;
}

/** Write the report for `error` in red. */
export function renderError(error: unknown, writer: ReportWriter, colors = chalk.level > 0): void {
  const report = formatReport(error);
  writer.write(`${colors ? chalk.red(report) : report}\n`);
}
