import { BatteriesError } from '../errors.js';
import type { Dispatcher } from './dispatcher.js';
import { Logger } from './logger.js';

let globalDispatcher: Dispatcher | null = null;

export function getGlobalDispatcher(): Dispatcher | null {
  return globalDispatcher;
}

export function setGlobalDispatcher(dispatcher: Dispatcher): void {
  if (globalDispatcher) {
    throw new BatteriesError('global logger already initialized');
  }
  globalDispatcher = dispatcher;
}

/** Remove the global dispatcher; with an argument, only if it is the one installed. */
export function clearGlobalDispatcher(dispatcher?: Dispatcher): void {
  if (!dispatcher || globalDispatcher === dispatcher) {
    globalDispatcher = null;
  }
}

/** Logger on the global dispatcher. Safe to call before logging is initialized. */
export function getLogger(target: string): Logger {
  return new Logger(getGlobalDispatcher, target);
}
