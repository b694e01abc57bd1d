/**
 * Log levels and level filters.
 *
 * Severity numbers follow the OpenTelemetry log data model so the OTLP
 * formatter can emit them unchanged.
 */

export const LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type Level = typeof LEVELS[number];

/** A level, or `off` to disable a target entirely. */
export type LevelFilter = Level | 'off';

export const SEVERITY_NUMBER: Record<Level, number> = {
  trace: 1,
  debug: 5,
  info: 9,
  warn: 13,
  error: 17,
};

export function severityText(level: Level): string {
  return level.toUpperCase();
}

export function isLevel(value: string): value is Level {
  return (LEVELS as readonly string[]).includes(value);
}

/** Parse a level name, case-insensitively. Returns null for anything else. */
export function parseLevel(text: string): Level | null {
  const lower = text.trim().toLowerCase();
  return isLevel(lower) ? lower : null;
}

export function parseLevelFilter(text: string): LevelFilter | null {
  const lower = text.trim().toLowerCase();
  if (lower === 'off') return 'off';
  return parseLevel(lower);
}

/** True when an event at `level` passes `filter`. */
export function levelEnabled(filter: LevelFilter, level: Level): boolean {
  if (filter === 'off') return false;
  return SEVERITY_NUMBER[level] >= SEVERITY_NUMBER[filter];
}

/** The more verbose of two filters. */
export function mostVerbose(a: LevelFilter, b: LevelFilter): LevelFilter {
  if (a === 'off') return b;
  if (b === 'off') return a;
  return SEVERITY_NUMBER[a] <= SEVERITY_NUMBER[b] ? a : b;
}
