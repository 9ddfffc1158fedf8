/**
 * solbuild Resolver Schema
 * TypeScript interfaces for resolver inputs and the resolved project config
 */

// =============================================================================
// Inputs
// =============================================================================

export type LayoutPreset = 'default' | 'hardhat';

export const EVM_VERSIONS = [
  'homestead',
  'tangerineWhistle',
  'spuriousDragon',
  'byzantium',
  'constantinople',
  'petersburg',
  'istanbul',
  'berlin',
  'london',
] as const;

export type EvmVersion = (typeof EVM_VERSIONS)[number];

/**
 * Everything the resolver consumes. Values arrive already bound from flags
 * and environment by the caller; the resolver never reads process state.
 */
export interface ResolveInput {
  /** Project root. Must exist and be a directory. */
  root: string;
  /** Source directory, relative to root unless absolute */
  sources?: string;
  /** Artifact directory, relative to root unless absolute */
  artifacts?: string;
  preset?: LayoutPreset;
  libraryPaths?: string[];
  remappings?: Remapping[];
  /** Newline-delimited remapping override */
  remappingsEnv?: string;
  optimizer?: boolean;
  optimizerRuns?: number;
  evmVersion?: EvmVersion;
  ignoredErrorCodes?: number[];
  /** `file:library:address` entries */
  libraries?: string[];
  noAutoDetect?: boolean;
  forceRebuild?: boolean;
}

// =============================================================================
// Resolved values
// =============================================================================

export interface Remapping {
  prefix: string;
  target: string;
}

export interface ResolvedPaths {
  root: string;
  sources: string;
  artifacts: string;
  cache: string;
  libraryPaths: string[];
  /** Directories outside of sources the compiler may read from */
  allowedPaths: string[];
  remappings: Remapping[];
}

/** file -> library -> deployed address */
export type LibraryLinkTable = Record<string, Record<string, string>>;

export interface LibraryLink {
  file: string;
  library: string;
  address: string;
}

export interface OptimizerSettings {
  enabled: boolean;
  runs: number;
}

export interface CompilerSettings {
  optimizer: OptimizerSettings;
  evmVersion: EvmVersion;
  libraries: LibraryLinkTable;
  ignoredErrorCodes: number[];
}

export interface ProjectConfig {
  paths: ResolvedPaths;
  settings: CompilerSettings;
  noAutoDetect: boolean;
  forceRebuild: boolean;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Default-directory heuristics, used when a directory was not given explicitly
 */
export interface LayoutStrategy {
  findSources(root: string): string;
  findArtifacts(root: string): string;
  findLibraries(root: string): string[];
}

/**
 * Produces the remappings a library directory implies
 */
export interface RemappingDiscovery {
  discover(libraryPath: string): Remapping[];
}

/**
 * Discards previous build output. Must throw when deletion fails.
 */
export interface BuildStateCleaner {
  clean(paths: ResolvedPaths): void;
}

export interface ResolverLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
}

export interface ResolverOptions {
  layout?: LayoutStrategy;
  discovery?: RemappingDiscovery;
  cleaner?: BuildStateCleaner;
  logger?: ResolverLogger;
}
