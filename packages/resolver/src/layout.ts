/**
 * Project layout heuristics
 */

import { existsSync, statSync } from 'fs';
import { join } from 'path';
import type { LayoutStrategy } from './schema.js';

const SOURCE_CANDIDATES = ['src', 'contracts'];
const ARTIFACT_CANDIDATES = ['out', 'artifacts'];
const LIBRARY_CANDIDATES = ['lib', 'node_modules'];

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * First candidate that exists under root, or the first candidate if none do
 */
function firstExisting(root: string, candidates: string[]): string {
  const found = candidates.find((name) => isDirectory(join(root, name)));
  return join(root, found ?? candidates[0]);
}

/**
 * dapptools-style layout: `src/`, `out/` and `lib/`, with the
 * Hardhat-style names accepted when only those are present
 */
export const conventionalLayout: LayoutStrategy = {
  findSources: (root) => firstExisting(root, SOURCE_CANDIDATES),
  findArtifacts: (root) => firstExisting(root, ARTIFACT_CANDIDATES),
  findLibraries: (root) => {
    const found = LIBRARY_CANDIDATES.map((name) => join(root, name)).filter(isDirectory);
    return found.length > 0 ? found : [join(root, LIBRARY_CANDIDATES[0])];
  },
};

export const hardhatLayout: LayoutStrategy = {
  findSources: (root) => join(root, 'contracts'),
  findArtifacts: (root) => join(root, 'artifacts'),
  findLibraries: (root) => [join(root, 'node_modules')],
};
