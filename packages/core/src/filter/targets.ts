/**
 * Per-target level filtering.
 *
 * Filter text is a comma-separated list of directives:
 *
 *   info                   default level for every target
 *   my_app=debug           level for targets starting with `my_app`
 *   my_app:db              bare target, enabled at `trace`
 *
 * The directive with the longest matching prefix wins; targets no
 * directive matches fall back to the default, and with no default they
 * are disabled.
 */

import { BatteriesError } from '../errors.js';
import {
  levelEnabled,
  mostVerbose,
  parseLevelFilter,
  type Level,
  type LevelFilter,
} from './level.js';

export interface Directive {
  target: string;
  level: LevelFilter;
}

const INVALID_TARGET = /[\s=,]/;

export class Targets {
  readonly defaultLevel: LevelFilter | null;
  readonly directives: readonly Directive[];

  constructor(defaultLevel: LevelFilter | null = null, directives: readonly Directive[] = []) {
    this.defaultLevel = defaultLevel;
    this.directives = directives;
  }

  static parse(text: string): Targets {
    let targets = new Targets();
    for (const raw of text.split(',')) {
      const directive = raw.trim();
      if (!directive) continue;

      const eq = directive.indexOf('=');
      if (eq === -1) {
        const level = parseLevelFilter(directive);
        if (level) {
          targets = targets.withDefault(level);
        } else if (INVALID_TARGET.test(directive)) {
          throw new BatteriesError(`invalid filter directive "${directive}"`);
        } else {
          targets = targets.withTarget(directive, 'trace');
        }
        continue;
      }

      const target = directive.slice(0, eq).trim();
      const levelText = directive.slice(eq + 1).trim();
      if (!target || INVALID_TARGET.test(target)) {
        throw new BatteriesError(`invalid target in filter directive "${directive}"`);
      }
      const level = parseLevelFilter(levelText);
      if (!level) {
        throw new BatteriesError(`invalid level "${levelText}" in filter directive "${directive}"`);
      }
      targets = targets.withTarget(target, level);
    }
    return targets;
  }

  withDefault(level: LevelFilter): Targets {
    return new Targets(level, this.directives);
  }

  /** Add a directive, replacing any existing one for the same target in place. */
  withTarget(target: string, level: LevelFilter): Targets {
    const index = this.directives.findIndex(d => d.target === target);
    if (index === -1) {
      return new Targets(this.defaultLevel, [...this.directives, { target, level }]);
    }
    const directives = [...this.directives];
    directives[index] = { target, level };
    return new Targets(this.defaultLevel, directives);
  }

  /** Merge `other` over this filter: its default and directives take precedence. */
  withTargets(other: Targets): Targets {
    let merged: Targets = other.defaultLevel ? this.withDefault(other.defaultLevel) : this;
    for (const { target, level } of other.directives) {
      merged = merged.withTarget(target, level);
    }
    return merged;
  }

  levelFor(target: string): LevelFilter {
    let best: Directive | null = null;
    for (const directive of this.directives) {
      if (!target.startsWith(directive.target)) continue;
      if (!best || directive.target.length > best.target.length) {
        best = directive;
      }
    }
    return best?.level ?? this.defaultLevel ?? 'off';
  }

  enabled(target: string, level: Level): boolean {
    return levelEnabled(this.levelFor(target), level);
  }

  /** The most verbose level any target can reach. */
  maxLevel(): LevelFilter {
    return this.directives.reduce<LevelFilter>(
      (acc, d) => mostVerbose(acc, d.level),
      this.defaultLevel ?? 'off',
    );
  }

  toString(): string {
    const parts = this.directives.map(d => `${d.target}=${d.level}`);
    return this.defaultLevel ? [this.defaultLevel, ...parts].join(',') : parts.join(',');
  }
}
