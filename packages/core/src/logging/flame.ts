/**
 * Folded-stack trace output for flame graph tools (inferno, flamegraph.pl).
 *
 * Each closed span contributes one line, `root;child;leaf <µs>`, where the
 * sample is the span's own time: busy time minus time spent in its direct
 * children. Lines are buffered and written out once the buffer passes
 * `FLAME_BUFFER_BYTES`, on `flush()` and on `close()`.
 */

import * as fs from 'node:fs';
import { wrapError } from '../errors.js';
import type { Layer, SpanClose } from './types.js';

export function foldedLine(close: SpanClose): string {
  const stack = close.stack.map(span => span.name).join(';');
  const selfMicros = Math.max(0, Math.round((close.busyMs - close.childMs) * 1000));
  return `${stack} ${selfMicros}`;
}

export const FLAME_BUFFER_BYTES = 8 * 1024;

export class FlameLayer implements Layer {
  private buffer: string[] = [];
  private bufferedBytes = 0;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly fd: number,
    private readonly bufferBytes: number,
  ) {}

  /** Create (or truncate) the output file now, so a bad path fails at startup. */
  static create(filePath: string, bufferBytes = FLAME_BUFFER_BYTES): FlameLayer {
    let fd: number;
    try {
      fd = fs.openSync(filePath, 'w');
    } catch (err) {
      throw wrapError(err, `Error creating trace flame file ${filePath}`);
    }
    return new FlameLayer(filePath, fd, bufferBytes);
  }

  onSpanClose(close: SpanClose): void {
    if (this.closed) return;
    const line = `${foldedLine(close)}\n`;
    this.buffer.push(line);
    this.bufferedBytes += Buffer.byteLength(line);
    if (this.bufferedBytes >= this.bufferBytes) {
      this.flush();
    }
  }

  flush(): void {
    if (this.closed || this.buffer.length === 0) return;
    fs.writeSync(this.fd, this.buffer.join(''));
    this.buffer = [];
    this.bufferedBytes = 0;
  }

  close(): void {
    if (this.closed) return;
    this.flush();
    this.closed = true;
    fs.closeSync(this.fd);
  }
}
