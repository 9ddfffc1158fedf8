/**
 * solbuild CLI Commands
 */

export { configCommand } from './config.js';
export { remappingsCommand } from './remappings.js';
