/**
 * Program shell: parse options, set up logging and signal handling, run
 * the application and turn its outcome into an exit code.
 *
 *   const version = readVersion(import.meta.url);
 *   await run(version, {
 *     schema: z.object({ file: z.string() }),
 *     configure: cmd => cmd.option('--file <path>', 'File to read', 'README.md'),
 *     main: async (options, { logger }) => { ... },
 *   });
 */

import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import type { z } from 'zod';
import { BatteriesError, errorChain, errorMessage, exitCodeFor, renderError } from './errors.js';
import { initLogging, type InitDeps, type LoggingHandle } from './init.js';
import type { Logger } from './logging/logger.js';
import type { LogWriter } from './logging/types.js';
import { addLoggingOptions, parseLoggingOptions, type LoggingOptions } from './options.js';
import { defaultShutdown, type ShutdownController, type SignalSource } from './shutdown.js';
import type { Version } from './version.js';

export interface AppContext {
  version: Version;
  logger: Logger;
  /** Aborted when shutdown is requested */
  signal: AbortSignal;
  shutdown: ShutdownController;
  command: Command;
}

export interface App<T> {
  description?: string;
  /** Declare the application's own options on the program. */
  configure?(command: Command): void;
  /** Validates the parsed option values into the application's options. */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  main(options: T, context: AppContext): Promise<void>;
}

export interface RunOptions {
  /** Full argv, node binary and script first. Defaults to process.argv. */
  argv?: readonly string[];
  stdout?: LogWriter;
  stderr?: LogWriter;
  /** Called with the exit code instead of setting process.exitCode; also used for forced exits. */
  exit?: (code: number) => void;
  /** Where SIGINT/SIGTERM come from; false to skip signal handling. */
  signals?: SignalSource | false;
  shutdown?: ShutdownController;
  graceMs?: number;
  colors?: boolean;
  logging?: Omit<InitDeps, 'writer' | 'colors'>;
}

interface Streams {
  stdout: LogWriter;
  stderr: LogWriter;
  colors: boolean;
}

interface Outcome {
  code: number;
  /** Set when a signal forced the exit; `exit` has already been called. */
  forced: boolean;
}

export function createProgram(version: Version, app: Pick<App<unknown>, 'description' | 'configure'>, streams: Streams): Command {
  const program = new Command(version.appName)
    .version(version.longVersion, '-V, --version', 'Print version information')
    .exitOverride()
    .configureOutput({
      writeOut: text => {
        streams.stdout.write(text);
      },
      writeErr: text => {
        streams.stderr.write(text);
      },
      outputError: (text, write) => write(streams.colors ? chalk.red(text) : text),
    });
  if (app.description) {
    program.description(app.description);
  }
  app.configure?.(program);
  addLoggingOptions(program);
  return program;
}

function parseAppOptions<T>(app: App<T>, raw: Record<string, unknown>): T {
  const parsed = app.schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(options)'}: ${issue.message}`)
      .join('; ');
    throw new BatteriesError(`Invalid options: ${issues}`, { exitCode: 2 });
  }
  return parsed.data;
}

async function execute<T>(version: Version, app: App<T>, options: RunOptions, streams: Streams): Promise<Outcome> {
  const program = createProgram(version, app, streams);
  try {
    program.parse([...(options.argv ?? process.argv)]);
  } catch (err) {
    // commander has already printed help, the version or the usage error
    if (err instanceof CommanderError) return { code: err.exitCode, forced: false };
    renderError(err, streams.stderr, streams.colors);
    return { code: exitCodeFor(err), forced: false };
  }

  let appOptions: T;
  let loggingOptions: LoggingOptions;
  let logging: LoggingHandle;
  try {
    const raw = program.opts<Record<string, unknown>>();
    loggingOptions = parseLoggingOptions(raw);
    appOptions = parseAppOptions(app, raw);
    logging = initLogging(loggingOptions, version, {
      ...options.logging,
      writer: streams.stderr,
      colors: streams.colors,
    });
  } catch (err) {
    renderError(err, streams.stderr, streams.colors);
    return { code: exitCodeFor(err), forced: false };
  }

  const controller = options.shutdown ?? defaultShutdown;
  const exit = options.exit ?? (code => process.exit(code));
  const forcedExit: { code: number | null } = { code: null };
  const uninstall = options.signals === false
    ? () => {}
    : controller.installSignalHandlers(options.signals ?? process, {
      exit: code => {
        forcedExit.code = code;
        logging.shutdown();
        exit(code);
      },
      graceMs: options.graceMs,
      logger: logging.logger,
    });

  const context: AppContext = {
    version,
    logger: logging.logger,
    signal: controller.signal,
    shutdown: controller,
    command: program,
  };

  let code: number;
  try {
    await logging.logger.span('main').runAsync(() => app.main(appOptions, context));
    code = 0;
  } catch (err) {
    logging.logger.error(errorMessage(err), { causes: errorChain(err).slice(1) });
    renderError(err, streams.stderr, streams.colors);
    code = exitCodeFor(err);
  } finally {
    uninstall();
    logging.shutdown();
  }
  return forcedExit.code === null ? { code, forced: false } : { code: forcedExit.code, forced: true };
}

/**
 * Run `app` as the program. Resolves to the exit code, which is also
 * handed to `options.exit` or, without one, set as process.exitCode.
 * After a forced exit on a second signal the code is not handed over again.
 */
export async function run<T>(version: Version, app: App<T>, options: RunOptions = {}): Promise<number> {
  const streams: Streams = {
    stdout: options.stdout ?? process.stdout,
    stderr: options.stderr ?? process.stderr,
    colors: options.colors ?? chalk.level > 0,
  };
  const { code, forced } = await execute(version, app, options, streams);
  if (forced) return code;
  if (options.exit) {
    options.exit(code);
  } else {
    process.exitCode = code;
  }
  return code;
}
