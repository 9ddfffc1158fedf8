/**
 * Resolve the project described by the build flags, reporting failures
 * on the terminal and in the debug log
 */

import chalk from 'chalk';
import ora from 'ora';
import { resolveProject, type ProjectConfig } from '@solbuild/resolver';
import { defaultRoot } from './git.js';
import { logFullError, type CommandLogger } from './logger.js';
import { toResolveInput, type BuildOptions } from './options.js';

export function loadProject(
  options: BuildOptions,
  log: CommandLogger,
  { quiet = false }: { quiet?: boolean } = {}
): ProjectConfig | null {
  const input = toResolveInput(options, () => defaultRoot());
  log.command('resolve', { ...input });

  const spinner = quiet ? null : ora('Resolving project configuration...').start();
  const result = resolveProject(input, { logger: log });

  if (!result.success) {
    spinner?.fail('Could not resolve project configuration');
    console.error(chalk.red(`\n  Error: ${result.error.message}\n`));
    logFullError('resolve', result.error, { kind: result.error.kind, input: result.error.input });
    process.exitCode = 1;
    return null;
  }

  if (result.value.forceRebuild) {
    spinner?.succeed('Resolved project configuration (previous build output removed)');
  } else {
    spinner?.succeed('Resolved project configuration');
  }
  return result.value;
}
