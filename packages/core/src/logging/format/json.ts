/**
 * Newline-delimited JSON, one object per record:
 *
 *   {"timestamp":"...","level":"INFO","fields":{"message":"read file","bytes":1024},
 *    "target":"example","span":{"name":"read_file"},"spans":[{"name":"main"},{"name":"read_file"}]}
 */

import { severityText } from '../../filter/level.js';
import type { Formatter, LogRecord, SpanData } from '../types.js';
import { jsonFields } from './shared.js';

function spanJson(span: SpanData): Record<string, unknown> {
  return { name: span.name, ...jsonFields(Object.entries(span.fields)) };
}

export class JsonFormatter implements Formatter {
  format(record: LogRecord): string {
    const out: Record<string, unknown> = {
      timestamp: new Date(record.timestamp).toISOString(),
      level: severityText(record.level),
      fields: { message: record.message, ...jsonFields(Object.entries(record.fields)) },
      target: record.target,
    };

    const leaf = record.spans[record.spans.length - 1];
    if (leaf) {
      out.span = spanJson(leaf);
      out.spans = record.spans.map(spanJson);
    }
    return JSON.stringify(out);
  }
}
