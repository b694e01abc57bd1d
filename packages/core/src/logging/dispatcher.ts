/**
 * Dispatcher — routes log records and span lifecycle to layers.
 *
 * The active span stack lives in AsyncLocalStorage, so spans follow
 * async continuations without being passed around.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';
import type { Level } from '../filter/level.js';
import { Logger } from './logger.js';
import type { Fields, Layer, LogRecord, RecordKind, SpanData } from './types.js';

export interface IdGenerator {
  traceId(): string;
  spanId(): string;
}

export const randomIds: IdGenerator = {
  traceId: () => randomBytes(16).toString('hex'),
  spanId: () => randomBytes(8).toString('hex'),
};

export interface DispatcherOptions {
  now?: () => number;
  ids?: IdGenerator;
}

export interface SpanMeta {
  name: string;
  target: string;
  level: Level;
  fields: Fields;
}

interface ActiveSpan {
  data: SpanData;
  childMs: number;
}

/** Format a duration the way span-close records report it: `850.0µs`, `12.34ms`, `1.50s`. */
export function formatDuration(ms: number): string {
  if (ms < 1) return `${(ms * 1000).toFixed(1)}µs`;
  if (ms < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

export class Dispatcher {
  readonly now: () => number;
  private readonly ids: IdGenerator;
  private readonly layers: Layer[] = [];
  private readonly storage = new AsyncLocalStorage<readonly ActiveSpan[]>();

  constructor(options: DispatcherOptions = {}) {
    this.now = options.now ?? Date.now;
    this.ids = options.ids ?? randomIds;
  }

  addLayer(layer: Layer): this {
    this.layers.push(layer);
    return this;
  }

  logger(target: string): Logger {
    return new Logger(() => this, target);
  }

  currentSpans(): SpanData[] {
    return (this.storage.getStore() ?? []).map(active => active.data);
  }

  /** True when at least one layer would accept a record for `target` at `level`. */
  enabled(target: string, level: Level): boolean {
    return this.layers.some(layer => layer.onRecord && (!layer.enabled || layer.enabled(target, level)));
  }

  event(level: Level, target: string, message: string, fields: Fields = {}): void {
    this.emit('event', level, target, message, fields, this.storage.getStore() ?? []);
  }

  /**
   * Run `fn` inside a new span. The span closes when `fn` returns or throws,
   * or, when `fn` returns a promise, once that promise settles.
   */
  inSpan<T>(meta: SpanMeta, fn: () => T): T {
    const { stack, close } = this.open(meta);
    let result: T;
    try {
      result = this.storage.run(stack, fn);
    } catch (err) {
      close();
      throw err;
    }
    if (isPromiseLike(result)) {
      void result.then(close, close);
    } else {
      close();
    }
    return result;
  }

  /** Run `fn` inside a new span that closes when the returned promise settles. */
  async inSpanAsync<T>(meta: SpanMeta, fn: () => Promise<T>): Promise<T> {
    const { stack, close } = this.open(meta);
    try {
      return await this.storage.run(stack, fn);
    } finally {
      close();
    }
  }

  close(): void {
    for (const layer of this.layers) {
      if (layer.close) {
        layer.close();
      } else {
        layer.flush?.();
      }
    }
  }

  private open(meta: SpanMeta): { stack: readonly ActiveSpan[]; close: () => void } {
    const parentStack = this.storage.getStore() ?? [];
    const parent = parentStack[parentStack.length - 1];
    const active: ActiveSpan = {
      data: {
        id: this.ids.spanId(),
        traceId: parent?.data.traceId ?? this.ids.traceId(),
        name: meta.name,
        target: meta.target,
        level: meta.level,
        fields: meta.fields,
        startedAt: this.now(),
      },
      childMs: 0,
    };
    const stack = [...parentStack, active];
    this.emit('span-new', meta.level, meta.target, 'new', {}, stack);

    let closed = false;
    const close = () => {
      if (closed) return;
      closed = true;
      const busyMs = Math.max(0, this.now() - active.data.startedAt);
      if (parent) {
        parent.childMs += busyMs;
      }
      this.emit('span-close', meta.level, meta.target, 'close', { 'time.busy': formatDuration(busyMs) }, stack);
      const spans = stack.map(s => s.data);
      for (const layer of this.layers) {
        layer.onSpanClose?.({ span: active.data, stack: spans, busyMs, childMs: active.childMs });
      }
    };
    return { stack, close };
  }

  private emit(
    kind: RecordKind,
    level: Level,
    target: string,
    message: string,
    fields: Fields,
    stack: readonly ActiveSpan[],
  ): void {
    let record: LogRecord | null = null;
    for (const layer of this.layers) {
      if (!layer.onRecord) continue;
      if (layer.enabled && !layer.enabled(target, level)) continue;
      record ??= {
        kind,
        timestamp: this.now(),
        level,
        target,
        message,
        fields,
        spans: stack.map(s => s.data),
      };
      layer.onRecord(record);
    }
  }
}
