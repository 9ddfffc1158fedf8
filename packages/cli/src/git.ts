/**
 * Git repository root discovery
 */

import { execFileSync } from 'child_process';

/**
 * Top-level directory of the git repository containing `cwd`, or null
 * when `cwd` is not inside one (or git is not installed)
 */
export function findGitRoot(cwd: string): string | null {
  try {
    const output = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    return output.trim() || null;
  } catch {
    return null;
  }
}

/**
 * The default project root: the enclosing git repository, else `cwd`
 */
export function defaultRoot(cwd: string = process.cwd()): string {
  return findGitRoot(cwd) ?? cwd;
}
