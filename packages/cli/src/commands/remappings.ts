/**
 * solbuild remappings
 *
 * Print the resolved remappings, one per line.
 */

import { Command } from 'commander';
import { formatRemapping } from '@solbuild/resolver';
import { createCommandLogger } from '../logger.js';
import { addBuildOptions, type BuildOptions } from '../options.js';
import { loadProject } from '../project.js';

export const remappingsCommand = addBuildOptions(
  new Command('remappings').description('Print the resolved remappings')
).action((options: BuildOptions) => {
  const log = createCommandLogger('remappings');
  const config = loadProject(options, log, { quiet: true });
  if (!config) return;

  for (const remapping of config.paths.remappings) {
    console.log(formatRemapping(remapping));
  }
});
