/**
 * OpenTelemetry log data model, one JSON object per record.
 *
 * <https://opentelemetry.io/docs/specs/otel/logs/data-model/>
 *
 * Ids and the timestamp are written as strings; `SeverityNumber` is the
 * only numeric top-level key.
 */

import { isMainThread, threadId } from 'node:worker_threads';
import { SEVERITY_NUMBER, severityText } from '../../filter/level.js';
import type { Formatter, LogRecord } from '../types.js';
import { toJsonValue } from './shared.js';

/** Source-location fields from bridged loggers map onto OTel attribute names. */
const RENAMED_FIELDS = new Map<string, string | null>([
  ['log.file', 'code.filepath'],
  ['log.line', 'code.lineno'],
  ['log.module_path', 'code.namespace'],
  ['log.target', null],
]);

export function currentThreadName(): string {
  return isMainThread ? 'main' : `worker-${threadId}`;
}

export interface OtlpFormatterOptions {
  threadName?: () => string;
}

export class OtlpFormatter implements Formatter {
  private readonly threadName: () => string;

  constructor(options: OtlpFormatterOptions = {}) {
    this.threadName = options.threadName ?? currentThreadName;
  }

  format(record: LogRecord): string {
    const leaf = record.spans[record.spans.length - 1];
    let body = record.message;

    const attributes: Record<string, unknown> = {
      'code.namespace': record.target,
      'thread.name': this.threadName(),
    };

    for (const [key, value] of Object.entries(record.fields)) {
      if (value === undefined) continue;
      if (key === 'message') {
        body = typeof value === 'string' ? value : '';
        continue;
      }
      const renamed = RENAMED_FIELDS.has(key) ? RENAMED_FIELDS.get(key) ?? null : key;
      if (renamed) {
        attributes[renamed] = toJsonValue(value);
      }
    }

    if (record.kind !== 'event' && leaf) {
      for (const [key, value] of Object.entries(leaf.fields)) {
        if (value !== undefined) attributes[key] = toJsonValue(value);
      }
    }

    const out: Record<string, unknown> = { Timestamp: String(record.timestamp) };
    if (leaf) {
      out.TraceId = leaf.traceId;
      out.SpanId = leaf.id;
    }
    out.severity = severityText(record.level);
    out.SeverityText = severityText(record.level);
    out.SeverityNumber = SEVERITY_NUMBER[record.level];
    out.Body = body;
    out.Attributes = attributes;
    return JSON.stringify(out);
  }
}
