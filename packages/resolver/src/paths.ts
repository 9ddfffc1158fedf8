/**
 * Root validation and directory resolution
 */

import { existsSync, realpathSync, statSync } from 'fs';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { ResolutionError } from './errors.js';
import { conventionalLayout, hardhatLayout } from './layout.js';
import type { LayoutPreset, LayoutStrategy, ResolvedPaths } from './schema.js';

export const CACHE_DIR = 'cache';

/**
 * Canonicalize the root. It must exist and be a directory.
 */
export function resolveRoot(root: string): string {
  const absolute = resolve(root);
  if (!existsSync(absolute)) {
    throw new ResolutionError('InvalidRoot', `root path does not exist: ${root}`, { input: root });
  }

  let canonical: string;
  try {
    canonical = realpathSync(absolute);
  } catch (error) {
    throw new ResolutionError('InvalidRoot', `root path could not be canonicalized: ${root}`, {
      input: root,
      cause: error,
    });
  }

  if (!statSync(canonical).isDirectory()) {
    throw new ResolutionError('InvalidRoot', `root path is not a directory: ${root}`, { input: root });
  }
  return canonical;
}

export interface PathInput {
  /** Canonical root, as returned by resolveRoot */
  root: string;
  sources?: string;
  artifacts?: string;
  libraryPaths?: string[];
  preset?: LayoutPreset;
}

export type DirectoryPaths = Omit<ResolvedPaths, 'remappings'>;

/**
 * Determine source, artifact and library directories. Explicit values win,
 * then the preset, then the layout heuristic.
 */
export function resolvePaths(
  input: PathInput,
  layout: LayoutStrategy = conventionalLayout
): DirectoryPaths {
  const { root } = input;
  const hardhat = input.preset === 'hardhat';

  if (hardhat && input.sources !== undefined) {
    throw new ResolutionError(
      'ConfigurationBuildFailure',
      'the hardhat layout cannot be combined with an explicit contracts directory',
      { input: input.sources }
    );
  }

  const defaults = hardhat ? hardhatLayout : layout;
  const sources = input.sources !== undefined ? resolve(root, input.sources) : defaults.findSources(root);
  const artifacts =
    input.artifacts !== undefined ? resolve(root, input.artifacts) : defaults.findArtifacts(root);
  const libraryPaths = resolveLibraryPaths(root, input.libraryPaths ?? [], hardhat, defaults);

  checkArtifactsDir(root, sources, artifacts);

  return {
    root,
    sources,
    artifacts,
    cache: join(root, CACHE_DIR),
    libraryPaths,
    allowedPaths: unique([root, ...libraryPaths]),
  };
}

function resolveLibraryPaths(
  root: string,
  explicit: string[],
  hardhat: boolean,
  defaults: LayoutStrategy
): string[] {
  if (explicit.length === 0) {
    return defaults.findLibraries(root);
  }

  // kept verbatim: discovery probes relative entries from the working directory
  const libs = [...explicit];
  const nodeModules = join(root, 'node_modules');
  // hardhat projects always resolve packages from node_modules; only this check resolves explicit entries against root
  if (hardhat && !explicit.some((lib) => resolve(root, lib) === nodeModules)) {
    libs.push(nodeModules);
  }
  return libs;
}

/**
 * A rebuild deletes the artifacts directory, so it may never hold the
 * root or the sources
 */
function checkArtifactsDir(root: string, sources: string, artifacts: string): void {
  for (const [label, dir] of [
    ['project root', root],
    ['sources directory', sources],
  ] as const) {
    if (isWithin(artifacts, dir)) {
      throw new ResolutionError(
        'ConfigurationBuildFailure',
        `artifacts directory ${artifacts} must not contain the ${label}`,
        { input: artifacts }
      );
    }
  }
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

function unique(paths: string[]): string[] {
  return [...new Set(paths)];
}
