/**
 * Compiler settings assembly and build state cleanup
 */

import { rmSync } from 'fs';
import { z } from 'zod';
import { ResolutionError } from './errors.js';
import { EVM_VERSIONS } from './schema.js';
import type {
  BuildStateCleaner,
  CompilerSettings,
  EvmVersion,
  LibraryLinkTable,
  ResolvedPaths,
} from './schema.js';

export const DEFAULT_OPTIMIZER_RUNS = 200;
export const DEFAULT_EVM_VERSION: EvmVersion = 'london';

const settingsInputSchema = z.object({
  optimizer: z.boolean().default(false),
  optimizerRuns: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).default(DEFAULT_OPTIMIZER_RUNS),
  evmVersion: z.enum(EVM_VERSIONS).default(DEFAULT_EVM_VERSION),
  ignoredErrorCodes: z.array(z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)).default([]),
});

export type SettingsInput = z.input<typeof settingsInputSchema>;

export function assembleSettings(input: SettingsInput, libraries: LibraryLinkTable): CompilerSettings {
  const parsed = settingsInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ResolutionError(
      'ConfigurationBuildFailure',
      `invalid compiler setting ${issue.path.join('.')}: ${issue.message}`,
      { cause: parsed.error }
    );
  }

  const { optimizer, optimizerRuns, evmVersion, ignoredErrorCodes } = parsed.data;
  return {
    optimizer: { enabled: optimizer, runs: optimizerRuns },
    evmVersion,
    libraries,
    ignoredErrorCodes: [...new Set(ignoredErrorCodes)].sort((a, b) => a - b),
  };
}

/**
 * The `settings` object of the compiler's standard JSON input
 */
export interface CompilerInputSettings {
  optimizer: { enabled: boolean; runs: number };
  evmVersion: EvmVersion;
  libraries: LibraryLinkTable;
}

export function toCompilerInputSettings(settings: CompilerSettings): CompilerInputSettings {
  return {
    optimizer: { ...settings.optimizer },
    evmVersion: settings.evmVersion,
    libraries: Object.fromEntries(
      Object.entries(settings.libraries).map(([file, libs]) => [file, { ...libs }])
    ),
  };
}

/**
 * Removes the cache and artifacts directories
 */
export const fsBuildStateCleaner: BuildStateCleaner = {
  clean(paths: ResolvedPaths): void {
    rmSync(paths.cache, { recursive: true, force: true });
    rmSync(paths.artifacts, { recursive: true, force: true });
  },
};

export function cleanBuildState(cleaner: BuildStateCleaner, paths: ResolvedPaths): void {
  try {
    cleaner.clean(paths);
  } catch (error) {
    throw new ResolutionError(
      'ConfigurationBuildFailure',
      `could not remove previous build output: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
