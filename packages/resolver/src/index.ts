/**
 * @solbuild/resolver
 * Build configuration resolver for Solidity projects
 */

// Schema types
export type {
  LayoutPreset,
  EvmVersion,
  ResolveInput,
  Remapping,
  ResolvedPaths,
  LibraryLinkTable,
  LibraryLink,
  OptimizerSettings,
  CompilerSettings,
  ProjectConfig,
  LayoutStrategy,
  RemappingDiscovery,
  BuildStateCleaner,
  ResolverLogger,
  ResolverOptions,
} from './schema.js';
export { EVM_VERSIONS } from './schema.js';

// Errors
export { ResolutionError, isResolutionError, type ResolutionErrorKind, type Result } from './errors.js';

// Resolver
export { resolveProject, resolveProjectOrThrow } from './resolver.js';

// Paths
export { resolveRoot, resolvePaths, CACHE_DIR, type PathInput, type DirectoryPaths } from './paths.js';
export { conventionalLayout, hardhatLayout } from './layout.js';

// Remappings
export {
  parseRemapping,
  formatRemapping,
  compareRemappings,
  dedupeRemappings,
  parseRemappingLines,
  readRemappingsFile,
  aggregateRemappings,
  REMAPPINGS_FILENAME,
} from './remappings.js';
export { directoryRemappingDiscovery } from './discovery.js';

// Libraries
export { parseLibraryLink, buildLibraryLinkTable, formatLibraryLinks } from './libraries.js';

// Settings
export {
  assembleSettings,
  toCompilerInputSettings,
  cleanBuildState,
  fsBuildStateCleaner,
  DEFAULT_OPTIMIZER_RUNS,
  DEFAULT_EVM_VERSION,
  type SettingsInput,
  type CompilerInputSettings,
} from './settings.js';
