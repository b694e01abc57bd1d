import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createVersion, readVersion, run, ShutdownController, type LogWriter, type RunOptions } from '@cli-batteries/core';
import { app, summarize } from '../app.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const version = createVersion({ name: '@cli-batteries/example', version: '0.1.0' }, {});

let tmpDir: string;
let stderrChunks: string[];

const stderr: LogWriter = {
  write: (chunk: string) => stderrChunks.push(chunk),
};

function runOptions(args: string[]): RunOptions {
  return {
    argv: ['node', 'example', ...args],
    stdout: { write: () => true },
    stderr,
    exit: () => {},
    signals: false,
    colors: false,
    shutdown: new ShutdownController(),
    logging: {
      now: () => 0,
      processInfo: () => ({ pid: 1, uid: null, gid: null, cores: 1, node: 'v20.0.0' }),
      warnings: new EventEmitter(),
    },
  };
}

function jsonLines(): Array<{ level: string; target: string; fields: Record<string, unknown>; spans?: Array<Record<string, unknown>> }> {
  return stderrChunks.join('').split('\n').filter(line => line.startsWith('{')).map(line => JSON.parse(line));
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'example-test-'));
  stderrChunks = [];
  vi.stubEnv('FILE', undefined);
  vi.stubEnv('LOG_FILTER', undefined);
  vi.stubEnv('LOG_FORMAT', undefined);
  vi.stubEnv('TRACE_FLAME', undefined);
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// summarize
// ---------------------------------------------------------------------------

describe('package metadata', () => {
  it('names the program after its bin entry', () => {
    const pkg = readVersion(import.meta.url, {});
    expect(pkg.pkgName).toBe('@cli-batteries/example');
    expect(pkg.appName).toBe('batteries-example');
    expect(pkg.pkgVersion).toBe('0.1.0');
  });
});

describe('summarize', () => {
  it('counts lines with or without a trailing newline', () => {
    expect(summarize('f', '').lines).toBe(0);
    expect(summarize('f', 'a').lines).toBe(1);
    expect(summarize('f', 'a\n').lines).toBe(1);
    expect(summarize('f', 'a\nb').lines).toBe(2);
  });

  it('counts bytes, not characters', () => {
    expect(summarize('f', 'é')).toEqual({ path: 'f', bytes: 2, lines: 1 });
  });
});

// ---------------------------------------------------------------------------
// program
// ---------------------------------------------------------------------------

describe('example program', () => {
  it('logs a summary of the file', async () => {
    const file = path.join(tmpDir, 'notes.txt');
    fs.writeFileSync(file, 'one\ntwo\n');

    const code = await run(version, app, runOptions(['--file', file, '--log-format', 'json']));

    expect(code).toBe(0);
    const summary = jsonLines().find(line => line.fields.message === 'file summary');
    expect(summary).toMatchObject({
      level: 'INFO',
      target: 'example',
      fields: { path: file, bytes: 8, lines: 2 },
      spans: [{ name: 'main' }],
    });
  });

  it('reads the file inside a read_file span at debug verbosity', async () => {
    const file = path.join(tmpDir, 'notes.txt');
    fs.writeFileSync(file, 'abc');

    await run(version, app, runOptions(['--file', file, '--log-format', 'json', '-vv']));

    const debug = jsonLines().find(line => line.fields.message === 'read file');
    expect(debug).toMatchObject({
      level: 'DEBUG',
      fields: { bytes: 3 },
      spans: [{ name: 'main' }, { name: 'read_file', path: file }],
    });
  });

  it('takes the file from the FILE environment variable', async () => {
    const file = path.join(tmpDir, 'from-env.txt');
    fs.writeFileSync(file, 'x\n');
    vi.stubEnv('FILE', file);

    await run(version, app, runOptions(['--log-format', 'json']));

    const summary = jsonLines().find(line => line.fields.message === 'file summary');
    expect(summary?.fields.path).toBe(file);
  });

  it('fails with the cause when the file is missing', async () => {
    const file = path.join(tmpDir, 'missing.txt');

    const code = await run(version, app, runOptions(['--file', file, '--log-format', 'compact']));

    expect(code).toBe(1);
    const text = stderrChunks.join('');
    expect(text).toContain(`Error: Error reading ${file}\n\nCaused by:\n   0: ENOENT: no such file or directory`);
  });
});
