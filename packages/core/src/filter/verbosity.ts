import { Targets } from './targets.js';
import type { LevelFilter } from './level.js';
import type { Version } from '../version.js';

/**
 * `-v` count → [every target, the application's own targets].
 * Counts past the end of the table use the last row.
 */
const VERBOSITY_TABLE: ReadonlyArray<readonly [LevelFilter, LevelFilter]> = [
  ['error', 'info'],
  ['info', 'info'],
  ['info', 'debug'],
  ['info', 'trace'],
  ['debug', 'trace'],
  ['trace', 'trace'],
];

/** Targets the application logs under: package and command names, with `-` and `_` spellings. */
export function appTargets(version: Pick<Version, 'pkgName' | 'appName'>): string[] {
  const names = [version.pkgName, version.appName].flatMap(name => [name, name.replace(/-/g, '_')]);
  return [...new Set(names)];
}

export function verbosityTargets(verbose: number, version: Pick<Version, 'pkgName' | 'appName'>): Targets {
  const row = Math.min(Math.max(Math.trunc(verbose), 0), VERBOSITY_TABLE.length - 1);
  const [all, app] = VERBOSITY_TABLE[row] ?? ['error', 'info'];

  let targets = new Targets().withDefault(all);
  for (const name of appTargets(version)) {
    targets = targets.withTarget(name, app);
  }
  return targets;
}
