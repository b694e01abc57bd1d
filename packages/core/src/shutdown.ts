/**
 * Graceful shutdown.
 *
 * The first SIGINT/SIGTERM aborts the controller's signal so the
 * application can wind down; a second signal, or the grace period
 * running out, forces an exit with 128 + the signal number.
 */

import { silentLogger, type Logger } from './logging/logger.js';

export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export type ShutdownSignal = typeof SHUTDOWN_SIGNALS[number];

const SIGNAL_NUMBERS: Record<ShutdownSignal, number> = {
  SIGINT: 2,
  SIGTERM: 15,
};

export const DEFAULT_GRACE_MS = 30_000;

export function signalExitCode(signal: ShutdownSignal): number {
  return 128 + SIGNAL_NUMBERS[signal];
}

export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

export interface SignalHandlerOptions {
  exit: (code: number) => void;
  graceMs?: number;
  logger?: Logger;
}

export class ShutdownController {
  private controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  isShuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  requestShutdown(reason = 'shutdown requested'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  /** Resolves once shutdown has been requested. */
  awaitShutdown(): Promise<void> {
    const signal = this.controller.signal;
    if (signal.aborted) return Promise.resolve();
    return new Promise(resolve => {
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  /** Start over with a fresh signal. Pending `awaitShutdown()` promises stay pending. */
  reset(): void {
    this.controller = new AbortController();
  }

  /** Listen for SIGINT/SIGTERM on `source`. Returns a function that removes the handlers. */
  installSignalHandlers(source: SignalSource, options: SignalHandlerOptions): () => void {
    const graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    const logger = options.logger ?? silentLogger;
    let graceTimer: NodeJS.Timeout | null = null;

    const handlers = SHUTDOWN_SIGNALS.map(signal => {
      const handler = () => {
        if (this.isShuttingDown()) {
          logger.warn(`Received second ${signal}, exiting now`);
          options.exit(signalExitCode(signal));
          return;
        }
        logger.info(`Received ${signal}, shutting down`, { graceMs });
        this.requestShutdown(`received ${signal}`);
        graceTimer = setTimeout(() => {
          logger.error('Graceful shutdown timed out', { graceMs });
          options.exit(signalExitCode(signal));
        }, graceMs);
        graceTimer.unref();
      };
      source.on(signal, handler);
      return { signal, handler };
    });

    return () => {
      if (graceTimer) {
        clearTimeout(graceTimer);
        graceTimer = null;
      }
      for (const { signal, handler } of handlers) {
        source.off(signal, handler);
      }
    };
  }
}

/** Process-wide controller used by `run` unless one is passed in. */
export const defaultShutdown = new ShutdownController();

export function shutdown(reason?: string): void {
  defaultShutdown.requestShutdown(reason);
}

export function isShuttingDown(): boolean {
  return defaultShutdown.isShuttingDown();
}

export function awaitShutdown(): Promise<void> {
  return defaultShutdown.awaitShutdown();
}
