/**
 * Compact logfmt-style output, one record per line:
 *
 *      0.012s INFO  main:read_file example: read file bytes=1024 path=README.md
 *
 * Uptime is measured from the formatter's creation.
 */

import { severityText } from '../../filter/level.js';
import type { Formatter, LogRecord } from '../types.js';
import { definedEntries, stringifyValue } from './shared.js';

const NEEDS_QUOTES = /[\s="\\]/;

export function logfmtValue(value: unknown): string {
  const text = stringifyValue(value);
  if (text !== '' && !NEEDS_QUOTES.test(text)) return text;
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export class CompactFormatter implements Formatter {
  private readonly startedAt: number;

  constructor(now: () => number = Date.now) {
    this.startedAt = now();
  }

  format(record: LogRecord): string {
    const uptime = Math.max(0, record.timestamp - this.startedAt) / 1000;
    const parts = [`${uptime.toFixed(3)}s`.padStart(9), severityText(record.level).padEnd(5)];

    const spanPath = record.spans.map(span => span.name).join(':');
    if (spanPath) parts.push(spanPath);

    parts.push(`${record.target}:`, record.message);
    for (const [key, value] of definedEntries(record.fields)) {
      parts.push(`${key}=${logfmtValue(value)}`);
    }
    return parts.join(' ');
  }
}
