import type { IdGenerator } from '../logging/dispatcher.js';
import type { Layer, LogRecord, LogWriter, SpanClose } from '../logging/types.js';

export interface CapturedWriter extends LogWriter {
  chunks: string[];
  text(): string;
  lines(): string[];
}

export function captureWriter(): CapturedWriter {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
    lines: () => chunks.join('').split('\n').filter(Boolean),
  };
}

export interface CollectingLayer extends Layer {
  records: LogRecord[];
  closes: SpanClose[];
}

export function collectingLayer(): CollectingLayer {
  const records: LogRecord[] = [];
  const closes: SpanClose[] = [];
  return {
    records,
    closes,
    onRecord: record => {
      records.push(record);
    },
    onSpanClose: close => {
      closes.push(close);
    },
  };
}

/** Ids `trace-1`, `span-1`, `span-2`, ... in creation order. */
export function sequentialIds(): IdGenerator {
  let traces = 0;
  let spans = 0;
  return {
    traceId: () => `trace-${++traces}`,
    spanId: () => `span-${++spans}`,
  };
}

export const FIXED_PROCESS_INFO = {
  pid: 42,
  uid: 1000,
  gid: 1000,
  cores: 8,
  node: 'v20.11.0',
};
