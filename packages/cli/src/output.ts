/**
 * Terminal rendering of a resolved project
 */

import chalk from 'chalk';
import * as path from 'path';
import { formatLibraryLinks, formatRemapping, type ProjectConfig } from '@solbuild/resolver';

function display(root: string, target: string): string {
  const rel = path.relative(root, target);
  return rel === '' ? '.' : rel.startsWith('..') || path.isAbsolute(rel) ? target : rel;
}

function list(title: string, items: string[]): string[] {
  if (items.length === 0) {
    return [chalk.cyan(`\n  ${title}:`) + chalk.gray(' none')];
  }
  return [chalk.cyan(`\n  ${title}:`), ...items.map((item) => chalk.white(`    - ${item}`))];
}

/**
 * Summary lines for `solbuild config`
 */
export function formatProjectSummary(config: ProjectConfig): string[] {
  const { paths, settings } = config;
  const rel = (target: string) => display(paths.root, target);

  const optimizer = settings.optimizer.enabled
    ? `enabled (${settings.optimizer.runs} runs)`
    : 'disabled';

  return [
    chalk.bold('\n  solbuild Project Configuration\n'),
    chalk.cyan('  Paths:'),
    chalk.white(`    Root:        ${paths.root}`),
    chalk.white(`    Sources:     ${rel(paths.sources)}`),
    chalk.white(`    Artifacts:   ${rel(paths.artifacts)}`),
    chalk.white(`    Cache:       ${rel(paths.cache)}`),
    ...list('Library paths', paths.libraryPaths.map(rel)),
    ...list('Remappings', paths.remappings.map(formatRemapping)),
    chalk.cyan('\n  Compiler:'),
    chalk.white(`    Optimizer:   ${optimizer}`),
    chalk.white(`    EVM version: ${settings.evmVersion}`),
    chalk.white(`    Auto-detect: ${config.noAutoDetect ? 'off' : 'on'}`),
    ...list('Linked libraries', formatLibraryLinks(settings.libraries)),
    ...list('Ignored error codes', settings.ignoredErrorCodes.map(String)),
    '',
  ];
}
