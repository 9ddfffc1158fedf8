/**
 * @solbuild/cli
 *
 * CLI entry point for solbuild commands.
 */

import { Command } from 'commander';
import { configCommand, remappingsCommand } from './commands/index.js';

const program = new Command();

program
  .name('solbuild')
  .description('Resolve Solidity project build configuration')
  .version('0.1.0');

program.addCommand(configCommand);
program.addCommand(remappingsCommand);

program.parse();
