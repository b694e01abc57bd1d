/**
 * Logger and Span — the API application code logs through.
 *
 * A logger is bound to a dispatcher source rather than a dispatcher, so
 * loggers created before logging is initialized start delivering once it
 * is. With no dispatcher, events are dropped and spans just run their body.
 */

import type { Level } from '../filter/level.js';
import type { Dispatcher } from './dispatcher.js';
import type { Fields } from './types.js';

export type DispatcherSource = () => Dispatcher | null;

export class Logger {
  constructor(
    private readonly source: DispatcherSource,
    readonly target: string,
  ) {}

  enabled(level: Level): boolean {
    return this.source()?.enabled(this.target, level) ?? false;
  }

  log(level: Level, msg: string, fields?: Fields): void {
    this.source()?.event(level, this.target, msg, fields);
  }

  trace(msg: string, fields?: Fields): void {
    this.log('trace', msg, fields);
  }

  debug(msg: string, fields?: Fields): void {
    this.log('debug', msg, fields);
  }

  info(msg: string, fields?: Fields): void {
    this.log('info', msg, fields);
  }

  warn(msg: string, fields?: Fields): void {
    this.log('warn', msg, fields);
  }

  error(msg: string, fields?: Fields): void {
    this.log('error', msg, fields);
  }

  /** Logger for a sub-target: `app` → `app:db` */
  child(suffix: string): Logger {
    return new Logger(this.source, `${this.target}:${suffix}`);
  }

  span(name: string, fields: Fields = {}, level: Level = 'info'): Span {
    return new Span(this.source, this.target, name, fields, level);
  }
}

export class Span {
  constructor(
    private readonly source: DispatcherSource,
    readonly target: string,
    readonly name: string,
    readonly fields: Fields,
    readonly level: Level,
  ) {}

  run<T>(fn: () => T): T {
    const dispatcher = this.source();
    if (!dispatcher) return fn();
    return dispatcher.inSpan(this.meta(), fn);
  }

  async runAsync<T>(fn: () => Promise<T>): Promise<T> {
    const dispatcher = this.source();
    if (!dispatcher) return await fn();
    return await dispatcher.inSpanAsync(this.meta(), fn);
  }

  private meta() {
    return { name: this.name, target: this.target, level: this.level, fields: this.fields };
  }
}

/**
 * Wrap an async function so every call runs in its own span.
 * `fields` derives span fields from the call's arguments.
 */
export function instrument<A extends unknown[], R>(
  logger: Logger,
  name: string,
  fn: (...args: A) => Promise<R>,
  fields?: (...args: A) => Fields,
): (...args: A) => Promise<R> {
  return (...args: A) => logger.span(name, fields?.(...args) ?? {}).runAsync(() => fn(...args));
}

/** Logger that drops everything (for tests or library code used without a program shell). */
export const silentLogger = new Logger(() => null, 'silent');
