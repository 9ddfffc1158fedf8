/**
 * Remapping auto-discovery for installed libraries
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import type { Remapping, RemappingDiscovery } from './schema.js';

const SOURCE_DIRS = ['src', 'contracts'];
const NESTED_LIB_DIR = 'lib';
const MAX_DEPTH = 3;

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function listDirectories(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => !entry.name.startsWith('.'))
    // linked packages (npm link, pnpm) are symlinks to directories
    .filter((entry) => entry.isDirectory() || (entry.isSymbolicLink() && isDirectory(join(dir, entry.name))))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Map one installed dependency to the directory its imports should resolve under
 */
function remappingFor(name: string, dir: string): Remapping {
  const sourceDir = SOURCE_DIRS.find((candidate) => existsSync(join(dir, candidate)));
  const target = sourceDir ? join(dir, sourceDir) : dir;
  return { prefix: `${name}/`, target: `${target}/` };
}

function discoverIn(libraryPath: string, depth: number): Remapping[] {
  if (depth > MAX_DEPTH || !isDirectory(libraryPath)) {
    return [];
  }

  const remappings: Remapping[] = [];
  for (const name of listDirectories(libraryPath)) {
    const dir = join(libraryPath, name);

    // npm scopes hold packages one level down
    if (name.startsWith('@')) {
      for (const scoped of listDirectories(dir)) {
        remappings.push(remappingFor(`${name}/${scoped}`, join(dir, scoped)));
      }
      continue;
    }

    remappings.push(remappingFor(name, dir));
    remappings.push(...discoverIn(join(dir, NESTED_LIB_DIR), depth + 1));
  }
  return remappings;
}

/**
 * Treats every child directory of a library path as a dependency named after
 * the directory, and searches the dependency's own `lib/` for more.
 */
export const directoryRemappingDiscovery: RemappingDiscovery = {
  discover(libraryPath: string): Remapping[] {
    return discoverIn(libraryPath, 1);
  },
};
