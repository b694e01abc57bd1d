/**
 * Logging and tracing flags shared by every program.
 *
 *   -v, --verbose            repeatable: -v, -vv, -vvv ...
 *   --log-filter <filter>    LOG_FILTER
 *   --log-format <format>    LOG_FORMAT (compact, pretty, json, otlp)
 *   --trace-flame <path>     TRACE_FLAME
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { z } from 'zod';
import { BatteriesError, errorMessage } from './errors.js';
import { LOG_FORMATS, parseLogFormat } from './logging/format/index.js';

export const loggingOptionsSchema = z.object({
  verbose: z.number().int().min(0).default(0),
  logFilter: z.string().default(''),
  logFormat: z.enum(LOG_FORMATS).default('pretty'),
  traceFlame: z.string().min(1).optional(),
});

export type LoggingOptions = z.infer<typeof loggingOptionsSchema>;

function increaseVerbosity(_value: string | undefined, previous: number): number {
  return previous + 1;
}

function logFormatArg(value: string): string {
  try {
    return parseLogFormat(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

export function addLoggingOptions(command: Command): Command {
  return command
    .option('-v, --verbose', 'Verbose mode (-v, -vv, -vvv, etc.)', increaseVerbosity, 0)
    .addOption(
      new Option('--log-filter <filter>', 'Log filter directives, e.g. "info,my_app=trace"')
        .env('LOG_FILTER')
        .default(''),
    )
    .addOption(
      new Option('--log-format <format>', `Log format, one of ${LOG_FORMATS.map(f => `'${f}'`).join(', ')}`)
        .env('LOG_FORMAT')
        .argParser(logFormatArg)
        .default('pretty'),
    )
    .addOption(
      new Option('--trace-flame <path>', 'Store traces in a folded-stack file for flame graph tools')
        .env('TRACE_FLAME'),
    );
}

/** Narrow parsed command options to the logging flags. Other keys are ignored. */
export function parseLoggingOptions(raw: Record<string, unknown>): LoggingOptions {
  const parsed = loggingOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new BatteriesError(`Invalid logging options: ${issues}`, { exitCode: 2 });
  }
  return parsed.data;
}
