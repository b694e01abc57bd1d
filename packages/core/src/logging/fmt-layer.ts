import type { Level } from '../filter/level.js';
import type { Targets } from '../filter/targets.js';
import type { Formatter, Layer, LogRecord, LogWriter } from './types.js';

/** Formats records that pass `targets` and writes one per line. */
export class FmtLayer implements Layer {
  constructor(
    private readonly formatter: Formatter,
    private readonly writer: LogWriter,
    private readonly targets: Targets | null = null,
  ) {}

  enabled(target: string, level: Level): boolean {
    return this.targets ? this.targets.enabled(target, level) : true;
  }

  onRecord(record: LogRecord): void {
    this.writer.write(`${this.formatter.format(record)}\n`);
  }
}
