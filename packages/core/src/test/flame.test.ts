import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Dispatcher } from '../logging/dispatcher.js';
import { FlameLayer, foldedLine } from '../logging/flame.js';
import type { SpanData } from '../logging/types.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flame-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function spanData(name: string): SpanData {
  return { id: name, traceId: 't', name, target: 'app', level: 'info', fields: {}, startedAt: 0 };
}

describe('foldedLine', () => {
  it('joins the stack and reports self time in microseconds', () => {
    const outer = spanData('outer');
    const inner = spanData('inner');
    expect(foldedLine({ span: inner, stack: [outer, inner], busyMs: 2.5, childMs: 0 })).toBe('outer;inner 2500');
    expect(foldedLine({ span: outer, stack: [outer], busyMs: 10, childMs: 2.5 })).toBe('outer 7500');
  });

  it('never reports negative self time', () => {
    const span = spanData('parallel');
    expect(foldedLine({ span, stack: [span], busyMs: 4, childMs: 9 })).toBe('parallel 0');
  });
});

describe('FlameLayer', () => {
  it('creates the file at once and writes folded stacks on flush', () => {
    const file = path.join(tmpDir, 'trace.folded');
    const flame = FlameLayer.create(file);
    expect(fs.readFileSync(file, 'utf-8')).toBe('');

    let now = 0;
    const dispatcher = new Dispatcher({ now: () => now }).addLayer(flame);
    const logger = dispatcher.logger('app');
    logger.span('outer').run(() => {
      now += 4;
      logger.span('inner').run(() => {
        now += 3;
      });
      now += 3;
    });

    expect(fs.readFileSync(file, 'utf-8')).toBe('');
    flame.flush();
    expect(fs.readFileSync(file, 'utf-8')).toBe('outer;inner 3000\nouter 7000\n');
  });

  it('stops recording after close', () => {
    const file = path.join(tmpDir, 'trace.folded');
    const flame = FlameLayer.create(file);
    const span = spanData('work');

    flame.onSpanClose({ span, stack: [span], busyMs: 1, childMs: 0 });
    flame.close();
    flame.onSpanClose({ span, stack: [span], busyMs: 1, childMs: 0 });
    flame.flush();
    flame.close();

    expect(fs.readFileSync(file, 'utf-8')).toBe('work 1000\n');
  });

  it('writes buffered lines out once the buffer fills', () => {
    const file = path.join(tmpDir, 'trace.folded');
    const flame = FlameLayer.create(file, 20);
    const span = spanData('work');

    flame.onSpanClose({ span, stack: [span], busyMs: 1, childMs: 0 });
    expect(fs.readFileSync(file, 'utf-8')).toBe('');

    flame.onSpanClose({ span, stack: [span], busyMs: 2, childMs: 0 });
    expect(fs.readFileSync(file, 'utf-8')).toBe('work 1000\nwork 2000\n');

    flame.onSpanClose({ span, stack: [span], busyMs: 3, childMs: 0 });
    expect(fs.readFileSync(file, 'utf-8')).toBe('work 1000\nwork 2000\n');

    flame.close();
    expect(fs.readFileSync(file, 'utf-8')).toBe('work 1000\nwork 2000\nwork 3000\n');
  });

  it('truncates an existing file', () => {
    const file = path.join(tmpDir, 'trace.folded');
    fs.writeFileSync(file, 'stale 1\n');
    FlameLayer.create(file).close();
    expect(fs.readFileSync(file, 'utf-8')).toBe('');
  });

  it('fails when the file cannot be created', () => {
    const file = path.join(tmpDir, 'missing', 'trace.folded');
    expect(() => FlameLayer.create(file)).toThrow(`Error creating trace flame file ${file}`);
  });
});
