import { BatteriesError } from '../../errors.js';
import type { Formatter } from '../types.js';
import { CompactFormatter } from './compact.js';
import { JsonFormatter } from './json.js';
import { OtlpFormatter } from './otlp.js';
import { PrettyFormatter } from './pretty.js';

export const LOG_FORMATS = ['compact', 'pretty', 'json', 'otlp'] as const;

export type LogFormat = typeof LOG_FORMATS[number];

export function parseLogFormat(text: string): LogFormat {
  const format = LOG_FORMATS.find(f => f === text);
  if (!format) {
    throw new BatteriesError(`Invalid log format: ${text}`);
  }
  return format;
}

export interface FormatterOptions {
  now?: () => number;
  colors?: boolean;
  threadName?: () => string;
}

export function createFormatter(format: LogFormat, options: FormatterOptions = {}): Formatter {
  switch (format) {
    case 'compact': return new CompactFormatter(options.now);
    case 'pretty': return new PrettyFormatter({ colors: options.colors });
    case 'json': return new JsonFormatter();
    case 'otlp': return new OtlpFormatter({ threadName: options.threadName });
  }
}

export { CompactFormatter, logfmtValue } from './compact.js';
export { JsonFormatter } from './json.js';
export { OtlpFormatter, currentThreadName } from './otlp.js';
export { PrettyFormatter } from './pretty.js';
