/**
 * Example program: reads a file and reports its size.
 *
 *   batteries-example --file package.json -vv --log-format compact
 */

import * as fs from 'node:fs/promises';
import { Option } from 'commander';
import { z } from 'zod';
import { instrument, wrapError, type App, type Logger } from '@cli-batteries/core';

export const optionsSchema = z.object({
  file: z.string().min(1),
});

export type ExampleOptions = z.infer<typeof optionsSchema>;

export interface FileSummary {
  path: string;
  bytes: number;
  lines: number;
}

export function summarize(path: string, content: string): FileSummary {
  const lines = content === '' ? 0 : content.split('\n').length - (content.endsWith('\n') ? 1 : 0);
  return { path, bytes: Buffer.byteLength(content), lines };
}

export function readSummary(logger: Logger): (path: string) => Promise<FileSummary> {
  return instrument(logger, 'read_file', async (path: string) => {
    let content: string;
    try {
      content = await fs.readFile(path, 'utf-8');
    } catch (err) {
      throw wrapError(err, `Error reading ${path}`);
    }
    const summary = summarize(path, content);
    logger.debug('read file', { bytes: summary.bytes });
    return summary;
  }, path => ({ path }));
}

export const app: App<ExampleOptions> = {
  description: 'Read a file and report its size',
  configure(command) {
    command.addOption(
      new Option('--file <path>', 'File to read').env('FILE').default('README.md'),
    );
  },
  schema: optionsSchema,
  async main(options, { logger, signal }) {
    if (signal.aborted) return;
    const summary = await readSummary(logger)(options.file);
    logger.info('file summary', { path: summary.path, bytes: summary.bytes, lines: summary.lines });
  },
};
