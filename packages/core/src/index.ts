/**
 * @cli-batteries/core
 *
 * Batteries for command-line programs:
 *
 * - `run` — the program shell (options, logging, signals, exit codes)
 * - logging — targets, levels, spans; compact, pretty, JSON and OTLP output
 * - flame traces — folded stacks for flame graph tools
 * - graceful shutdown on SIGINT/SIGTERM
 * - error reports with cause chains
 */

// Program shell
export { run, createProgram } from './run.js';
export type { App, AppContext, RunOptions } from './run.js';

// Version metadata
export { createVersion, readVersion, findPackageJson, formatVersionLine, packageJsonSchema } from './version.js';
export type { Version, PackageJson } from './version.js';

// Options
export { addLoggingOptions, loggingOptionsSchema, parseLoggingOptions } from './options.js';
export type { LoggingOptions } from './options.js';

// Logging setup
export { initLogging, buildTargets, currentProcessInfo } from './init.js';
export type { InitDeps, LoggingHandle, ProcessInfo, WarningSource } from './init.js';

// Filtering
export {
  LEVELS,
  SEVERITY_NUMBER,
  isLevel,
  levelEnabled,
  parseLevel,
  parseLevelFilter,
  severityText,
} from './filter/level.js';
export type { Level, LevelFilter } from './filter/level.js';
export { Targets } from './filter/targets.js';
export type { Directive } from './filter/targets.js';
export { appTargets, verbosityTargets } from './filter/verbosity.js';

// Logging
export { Dispatcher, formatDuration, randomIds } from './logging/dispatcher.js';
export type { DispatcherOptions, IdGenerator, SpanMeta } from './logging/dispatcher.js';
export { Logger, Span, instrument, silentLogger } from './logging/logger.js';
export { getLogger, getGlobalDispatcher, setGlobalDispatcher, clearGlobalDispatcher } from './logging/global.js';
export { FmtLayer } from './logging/fmt-layer.js';
export { FLAME_BUFFER_BYTES, FlameLayer, foldedLine } from './logging/flame.js';
export {
  LOG_FORMATS,
  CompactFormatter,
  JsonFormatter,
  OtlpFormatter,
  PrettyFormatter,
  createFormatter,
  parseLogFormat,
} from './logging/format/index.js';
export type { LogFormat, FormatterOptions } from './logging/format/index.js';
export type { Fields, Formatter, Layer, LogRecord, LogWriter, RecordKind, SpanClose, SpanData } from './logging/types.js';

// Shutdown
export {
  ShutdownController,
  DEFAULT_GRACE_MS,
  awaitShutdown,
  defaultShutdown,
  isShuttingDown,
  shutdown,
  signalExitCode,
} from './shutdown.js';
export type { ShutdownSignal, SignalSource } from './shutdown.js';

// Errors
export {
  BatteriesError,
  errorChain,
  errorMessage,
  exitCodeFor,
  formatReport,
  isBatteriesError,
  renderError,
  wrapError,
} from './errors.js';
