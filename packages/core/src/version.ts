/**
 * Version metadata for the running program.
 *
 * Read from the application's package.json so the banner, `--version`
 * and the verbosity targets all agree on the program's name.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { BatteriesError, wrapError } from './errors.js';

export interface Version {
  /** npm package name, scope included */
  pkgName: string;
  pkgVersion: string;
  /** Command name: first `bin` entry, else the unscoped package name */
  appName: string;
  commitHash: string;
  /** `<platform>-<arch>` of the running process */
  target: string;
  longVersion: string;
}

export const packageJsonSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  bin: z.union([z.string(), z.record(z.string())]).optional(),
  gitHead: z.string().optional(),
});

export type PackageJson = z.infer<typeof packageJsonSchema>;

const UNKNOWN_COMMIT = 'unknown';

function unscoped(name: string): string {
  return name.startsWith('@') ? name.slice(name.indexOf('/') + 1) : name;
}

function appNameOf(pkg: PackageJson): string {
  if (pkg.bin && typeof pkg.bin !== 'string') {
    const [first] = Object.keys(pkg.bin);
    if (first) return first;
  }
  return unscoped(pkg.name);
}

export function createVersion(pkg: unknown, env: NodeJS.ProcessEnv = process.env): Version {
  const parsed = packageJsonSchema.safeParse(pkg);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new BatteriesError(`Invalid package.json: ${issues}`);
  }

  const data = parsed.data;
  const commitHash = data.gitHead ?? env.GIT_COMMIT ?? UNKNOWN_COMMIT;
  const target = `${process.platform}-${process.arch}`;

  return {
    pkgName: data.name,
    pkgVersion: data.version,
    appName: appNameOf(data),
    commitHash,
    target,
    longVersion: [
      data.version,
      `commit: ${commitHash}`,
      `target: ${target}`,
      `node: ${process.version}`,
    ].join('\n'),
  };
}

/** Find the nearest package.json at or above `startDir`. */
export function findPackageJson(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Build the version of the package that contains `moduleUrl`.
 *
 *   const version = readVersion(import.meta.url);
 */
export function readVersion(moduleUrl: string, env: NodeJS.ProcessEnv = process.env): Version {
  const startDir = path.dirname(fileURLToPath(moduleUrl));
  const file = findPackageJson(startDir);
  if (!file) {
    throw new BatteriesError(`No package.json found above ${startDir}`);
  }

  let pkg: unknown;
  try {
    pkg = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw wrapError(err, `Error reading ${file}`);
  }
  return createVersion(pkg, env);
}

export function formatVersionLine(version: Version): string {
  return `${version.appName} ${version.pkgVersion}`;
}
