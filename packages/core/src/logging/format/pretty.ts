/**
 * Human-oriented multi-line output:
 *
 *   2026-01-01T00:00:00.000Z  INFO example: read file
 *     with bytes: 1024, path: README.md
 *     in read_file with path: README.md
 *     in main
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { severityText, type Level } from '../../filter/level.js';
import type { Fields, Formatter, LogRecord } from '../types.js';
import { definedEntries, stringifyValue } from './shared.js';

export interface PrettyFormatterOptions {
  /** Defaults to chalk's own detection of the terminal */
  colors?: boolean;
}

function renderFields(fields: Fields): string {
  return definedEntries(fields)
    .map(([key, value]) => `${key}: ${stringifyValue(value)}`)
    .join(', ');
}

export class PrettyFormatter implements Formatter {
  private readonly paint: ChalkInstance;

  constructor(options: PrettyFormatterOptions = {}) {
    const colors = options.colors ?? chalk.level > 0;
    this.paint = new Chalk({ level: colors ? chalk.level || 1 : 0 });
  }

  format(record: LogRecord): string {
    const time = this.paint.dim(new Date(record.timestamp).toISOString());
    const level = this.levelColor(record.level)(severityText(record.level).padStart(5));
    const target = this.paint.bold(`${record.target}:`);
    const lines = [`${time} ${level} ${target} ${record.message}`];

    const fields = renderFields(record.fields);
    if (fields) {
      lines.push(`    ${this.paint.italic('with')} ${fields}`);
    }

    for (const span of [...record.spans].reverse()) {
      const spanFields = renderFields(span.fields);
      const suffix = spanFields ? ` ${this.paint.italic('with')} ${spanFields}` : '';
      lines.push(`    ${this.paint.italic('in')} ${this.paint.bold(span.name)}${suffix}`);
    }

    return lines.join('\n');
  }

  private levelColor(level: Level): ChalkInstance {
    switch (level) {
      case 'trace': return this.paint.magenta;
      case 'debug': return this.paint.blue;
      case 'info': return this.paint.green;
      case 'warn': return this.paint.yellow;
      case 'error': return this.paint.red;
    }
  }
}
