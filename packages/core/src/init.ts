/**
 * Logging setup from parsed options.
 *
 * Filtering combines `--verbose` with `--log-filter`; the filter's
 * directives take precedence over the verbosity defaults. The flame layer
 * sees every span regardless of the filter.
 */

import * as os from 'node:os';
import { Targets } from './filter/targets.js';
import { verbosityTargets } from './filter/verbosity.js';
import { wrapError } from './errors.js';
import { Dispatcher, type IdGenerator } from './logging/dispatcher.js';
import { FlameLayer } from './logging/flame.js';
import { FmtLayer } from './logging/fmt-layer.js';
import { createFormatter } from './logging/format/index.js';
import { clearGlobalDispatcher, setGlobalDispatcher } from './logging/global.js';
import type { Logger } from './logging/logger.js';
import type { LogWriter } from './logging/types.js';
import type { LoggingOptions } from './options.js';
import { formatVersionLine, type Version } from './version.js';

export interface ProcessInfo {
  pid: number;
  uid: number | null;
  gid: number | null;
  cores: number;
  node: string;
}

export function currentProcessInfo(): ProcessInfo {
  return {
    pid: process.pid,
    uid: process.getuid?.() ?? null,
    gid: process.getgid?.() ?? null,
    cores: os.availableParallelism(),
    node: process.version,
  };
}

export interface WarningSource {
  on(event: 'warning', listener: (warning: Error) => void): unknown;
  off(event: 'warning', listener: (warning: Error) => void): unknown;
}

export interface InitDeps {
  /** Defaults to process.stderr */
  writer?: LogWriter;
  now?: () => number;
  ids?: IdGenerator;
  colors?: boolean;
  threadName?: () => string;
  processInfo?: () => ProcessInfo;
  /** Source of process warnings; defaults to process */
  warnings?: WarningSource;
}

export interface LoggingHandle {
  targets: Targets;
  dispatcher: Dispatcher;
  /** Logger on the application's own target */
  logger: Logger;
  /** Flush and close layers, detach warnings, uninstall the global dispatcher. */
  shutdown(): void;
}

export function buildTargets(options: Pick<LoggingOptions, 'verbose' | 'logFilter'>, version: Version): Targets {
  const verbosity = verbosityTargets(options.verbose, version);
  let filter: Targets;
  try {
    filter = options.logFilter ? Targets.parse(options.logFilter) : new Targets();
  } catch (err) {
    throw wrapError(err, 'Error parsing log-filter');
  }
  return verbosity.withTargets(filter);
}

export function initLogging(options: LoggingOptions, version: Version, deps: InitDeps = {}): LoggingHandle {
  const targets = buildTargets(options, version);
  const dispatcher = new Dispatcher({ now: deps.now, ids: deps.ids });

  const flame = options.traceFlame ? FlameLayer.create(options.traceFlame) : null;
  if (flame) {
    dispatcher.addLayer(flame);
  }

  const formatter = createFormatter(options.logFormat, {
    now: deps.now,
    colors: deps.colors,
    threadName: deps.threadName,
  });
  dispatcher.addLayer(new FmtLayer(formatter, deps.writer ?? process.stderr, targets));

  try {
    setGlobalDispatcher(dispatcher);
  } catch (err) {
    flame?.close();
    throw err;
  }

  const logger = dispatcher.logger(version.appName);

  const nodeLogger = dispatcher.logger('node');
  const warnings: WarningSource = deps.warnings ?? process;
  const onWarning = (warning: Error) => {
    nodeLogger.warn(warning.message, { name: warning.name });
  };
  warnings.on('warning', onWarning);

  const info = (deps.processInfo ?? currentProcessInfo)();
  logger.info(formatVersionLine(version), {
    host: version.target,
    pid: info.pid,
    uid: info.uid,
    gid: info.gid,
    cores: info.cores,
    node: info.node,
    commit: version.commitHash.slice(0, 8),
  });

  let closed = false;
  return {
    targets,
    dispatcher,
    logger,
    shutdown() {
      if (closed) return;
      closed = true;
      warnings.off('warning', onWarning);
      dispatcher.close();
      clearGlobalDispatcher(dispatcher);
    },
  };
}
