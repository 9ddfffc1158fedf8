/**
 * Build flags shared by every command that resolves a project
 *
 * Environment bindings:
 *   DAPP_SRC         -> --contracts
 *   DAPP_REMAPPINGS  -> --remappings-env
 *   DAPP_LIBRARIES   -> --libraries (comma or whitespace separated)
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import {
  EVM_VERSIONS,
  parseRemapping,
  isResolutionError,
  type EvmVersion,
  type Remapping,
  type ResolveInput,
} from '@solbuild/resolver';

export type BuildOptions = {
  root?: string;
  contracts?: string;
  hardhat?: boolean;
  hh?: boolean;
  out?: string;
  libPaths: string[];
  remappings: Remapping[];
  remappingsEnv?: string;
  optimize?: boolean;
  optimizeRuns: number;
  evmVersion: EvmVersion;
  ignoredErrorCodes: number[];
  autoDetect: boolean;
  force?: boolean;
  libraries: string[];
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectRemapping(value: string, previous: Remapping[]): Remapping[] {
  try {
    return [...previous, parseRemapping(value)];
  } catch (error) {
    if (isResolutionError(error)) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

function collectLibraries(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(/[\s,]+/).filter(Boolean)];
}

function parseUint(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
}

function collectUint(value: string, previous: number[]): number[] {
  return [...previous, parseUint(value)];
}

/**
 * Add the build flags to a command
 */
export function addBuildOptions(command: Command): Command {
  return command
    .option('--root <path>', "the project's root path (default: the git repository root, else the working directory)")
    .addOption(
      new Option('-c, --contracts <path>', 'the directory relative to the root under which the smart contracts are')
        .env('DAPP_SRC')
    )
    .addOption(
      new Option('--hardhat', 'use a hardhat style project layout (contracts/, artifacts/, node_modules/)').conflicts(
        'contracts'
      )
    )
    .addOption(new Option('--hh').hideHelp().conflicts('contracts'))
    .option('-o, --out <path>', 'path to where the contract artifacts are stored')
    .option('--lib-paths <path>', 'a path where libraries are installed (repeatable)', collect, [])
    .option('-r, --remappings <remapping>', 'a remapping in the form prefix=target (repeatable)', collectRemapping, [])
    .addOption(
      new Option('--remappings-env <remappings>', 'newline-separated remappings').env('DAPP_REMAPPINGS')
    )
    .option('--optimize', 'enable the optimizer')
    .option('--optimize-runs <runs>', 'optimizer runs', parseUint, 200)
    .addOption(
      new Option('--evm-version <version>', 'the EVM version to target').choices(EVM_VERSIONS).default('london')
    )
    .option('--ignored-error-codes <code>', 'ignore warnings with this error code (repeatable)', collectUint, [])
    .option('--no-auto-detect', "skip compiler auto-detection and use what is on $PATH")
    .option('--force', 'delete the cache and artifacts folders before building')
    .addOption(
      new Option('--libraries <libraries>', 'linked libraries as file:library:address (repeatable)')
        .env('DAPP_LIBRARIES')
        .argParser(collectLibraries)
        .default([])
    );
}

/**
 * Turn parsed flags into resolver input
 */
export function toResolveInput(options: BuildOptions, resolveDefaultRoot: () => string): ResolveInput {
  const hardhat = Boolean(options.hardhat || options.hh);

  return {
    root: options.root ?? resolveDefaultRoot(),
    sources: options.contracts,
    artifacts: options.out,
    preset: hardhat ? 'hardhat' : 'default',
    libraryPaths: options.libPaths,
    remappings: options.remappings,
    remappingsEnv: options.remappingsEnv,
    optimizer: options.optimize ?? false,
    optimizerRuns: options.optimizeRuns,
    evmVersion: options.evmVersion,
    ignoredErrorCodes: options.ignoredErrorCodes,
    libraries: options.libraries,
    noAutoDetect: !options.autoDetect,
    forceRebuild: options.force ?? false,
  };
}
