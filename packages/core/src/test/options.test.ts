import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { addLoggingOptions, parseLoggingOptions } from '../options.js';
import { BatteriesError } from '../errors.js';

function parse(args: string[]) {
  const program = addLoggingOptions(new Command('arg0'))
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  program.parse(args, { from: 'user' });
  return parseLoggingOptions(program.opts());
}

beforeEach(() => {
  vi.stubEnv('LOG_FILTER', undefined);
  vi.stubEnv('LOG_FORMAT', undefined);
  vi.stubEnv('TRACE_FLAME', undefined);
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('logging options', () => {
  it('counts repeated and combined -v flags', () => {
    expect(parse(['-v', '--log-filter', 'foo', '-vvv'])).toEqual({
      verbose: 4,
      logFilter: 'foo',
      logFormat: 'pretty',
    });
  });

  it('defaults to quiet pretty output without a flame file', () => {
    const options = parse([]);
    expect(options).toEqual({ verbose: 0, logFilter: '', logFormat: 'pretty' });
    expect(options.traceFlame).toBeUndefined();
  });

  it('accepts long --verbose', () => {
    expect(parse(['--verbose', '--verbose']).verbose).toBe(2);
  });

  it('reads a flame path', () => {
    expect(parse(['--trace-flame', 'out.folded']).traceFlame).toBe('out.folded');
  });

  it('falls back to environment variables', () => {
    vi.stubEnv('LOG_FORMAT', 'json');
    vi.stubEnv('LOG_FILTER', 'app=debug');
    vi.stubEnv('TRACE_FLAME', 'env.folded');
    expect(parse([])).toEqual({
      verbose: 0,
      logFilter: 'app=debug',
      logFormat: 'json',
      traceFlame: 'env.folded',
    });
  });

  it('prefers flags over environment variables', () => {
    vi.stubEnv('LOG_FORMAT', 'json');
    expect(parse(['--log-format', 'compact']).logFormat).toBe('compact');
  });

  it('rejects unknown log formats', () => {
    expect(() => parse(['--log-format', 'xml'])).toThrow(/Invalid log format: xml/);
  });

  it('rejects out-of-range values with exit code 2', () => {
    let caught: unknown;
    try {
      parseLoggingOptions({ verbose: -1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BatteriesError);
    expect(caught).toMatchObject({
      message: 'Invalid logging options: verbose: Number must be greater than or equal to 0',
      exitCode: 2,
    });
  });

  it('ignores options it does not own', () => {
    expect(parseLoggingOptions({ file: 'x', logFormat: 'otlp' })).toEqual({
      verbose: 0,
      logFilter: '',
      logFormat: 'otlp',
    });
  });
});
