import type { Level } from '../filter/level.js';

export type Fields = Record<string, unknown>;

export interface SpanData {
  /** 16 hex characters */
  id: string;
  /** 32 hex characters, shared by every span under the same root */
  traceId: string;
  name: string;
  target: string;
  level: Level;
  fields: Fields;
  startedAt: number;
}

export type RecordKind = 'event' | 'span-new' | 'span-close';

export interface LogRecord {
  kind: RecordKind;
  /** ms since the epoch */
  timestamp: number;
  level: Level;
  target: string;
  message: string;
  fields: Fields;
  /** Active spans, root first. Span records include their own span as the leaf. */
  spans: readonly SpanData[];
}

export interface SpanClose {
  span: SpanData;
  stack: readonly SpanData[];
  busyMs: number;
  /** Time spent in direct children of the span */
  childMs: number;
}

/**
 * A sink attached to a dispatcher. Layers without `enabled` see every
 * record; `onSpanClose` is called for every span regardless of filters.
 */
export interface Layer {
  enabled?(target: string, level: Level): boolean;
  onRecord?(record: LogRecord): void;
  onSpanClose?(close: SpanClose): void;
  flush?(): void;
  close?(): void;
}

export interface LogWriter {
  write(chunk: string): unknown;
}

export interface Formatter {
  /** Render one record, without the trailing newline. */
  format(record: LogRecord): string;
}
