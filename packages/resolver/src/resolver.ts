/**
 * solbuild Config Resolver
 * Turns partially specified build inputs into one ProjectConfig
 */

import { attempt, type Result, type ResolutionError } from './errors.js';
import { directoryRemappingDiscovery } from './discovery.js';
import { conventionalLayout } from './layout.js';
import { buildLibraryLinkTable } from './libraries.js';
import { resolvePaths, resolveRoot } from './paths.js';
import { aggregateRemappings } from './remappings.js';
import { assembleSettings, cleanBuildState, fsBuildStateCleaner } from './settings.js';
import type { ProjectConfig, ResolveInput, ResolvedPaths, ResolverOptions } from './schema.js';

/**
 * Resolve a project configuration. Never throws for malformed input;
 * failures come back as a ResolutionError.
 */
export function resolveProject(
  input: ResolveInput,
  options: ResolverOptions = {}
): Result<ProjectConfig, ResolutionError> {
  const result = attempt(() => buildProject(input, options));
  if (!result.success) {
    options.logger?.warn(`Resolution failed: ${result.error.message}`, { kind: result.error.kind });
  }
  return result;
}

/**
 * Like resolveProject, but throws the ResolutionError
 */
export function resolveProjectOrThrow(input: ResolveInput, options: ResolverOptions = {}): ProjectConfig {
  const result = resolveProject(input, options);
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}

function buildProject(input: ResolveInput, options: ResolverOptions): ProjectConfig {
  const { logger } = options;

  // 1. Root
  const root = resolveRoot(input.root);
  logger?.debug(`Using project root ${root}`);

  // 2. Sources, artifacts and library paths
  const dirs = resolvePaths(
    {
      root,
      sources: input.sources,
      artifacts: input.artifacts,
      libraryPaths: input.libraryPaths,
      preset: input.preset,
    },
    options.layout ?? conventionalLayout
  );
  logger?.debug('Resolved directories', dirs);

  // 3. Remappings for everything above
  const remappings = aggregateRemappings(
    {
      root,
      libraryPaths: dirs.libraryPaths,
      remappings: input.remappings,
      remappingsEnv: input.remappingsEnv,
    },
    options.discovery ?? directoryRemappingDiscovery,
    logger
  );
  const paths: ResolvedPaths = { ...dirs, remappings };

  // 4. Linked libraries
  const libraries = buildLibraryLinkTable(input.libraries ?? []);

  // 5. Settings
  const settings = assembleSettings(
    {
      optimizer: input.optimizer,
      optimizerRuns: input.optimizerRuns,
      evmVersion: input.evmVersion,
      ignoredErrorCodes: input.ignoredErrorCodes,
    },
    libraries
  );

  const forceRebuild = input.forceRebuild ?? false;
  if (forceRebuild) {
    logger?.info('Removing cached build output', { cache: paths.cache, artifacts: paths.artifacts });
    cleanBuildState(options.cleaner ?? fsBuildStateCleaner, paths);
  }

  return deepFreeze({
    paths,
    settings,
    noAutoDetect: input.noAutoDetect ?? false,
    forceRebuild,
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
