/**
 * solbuild config
 *
 * Resolve the project and show the configuration handed to the compiler.
 */

import { Command } from 'commander';
import { toCompilerInputSettings } from '@solbuild/resolver';
import { createCommandLogger } from '../logger.js';
import { addBuildOptions, type BuildOptions } from '../options.js';
import { formatProjectSummary } from '../output.js';
import { loadProject } from '../project.js';

type ConfigOptions = BuildOptions & { json?: boolean };

export const configCommand = addBuildOptions(
  new Command('config').description('Show the resolved project configuration')
)
  .option('--json', 'Output as JSON')
  .action((options: ConfigOptions) => {
    const log = createCommandLogger('config');
    const config = loadProject(options, log, { quiet: options.json });
    if (!config) return;

    if (options.json) {
      console.log(
        JSON.stringify({ ...config, compilerInput: toCompilerInputSettings(config.settings) }, null, 2)
      );
      return;
    }

    for (const line of formatProjectSummary(config)) {
      console.log(line);
    }
  });
