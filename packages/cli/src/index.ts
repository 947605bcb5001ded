/**
 * @contractor-connect/cli
 */

export { buildProgram, type ExitHandler } from './program.js';
export { withServices, waitForProcessSignal, type CliContext } from './context.js';
export { consoleOutput, createCliLogger, type CliOutput } from './output.js';
export * from './settings.js';
export * from './commands/admin.js';
export * from './commands/dev.js';
export * from './commands/email.js';
export * from './commands/setup.js';
export * from './commands/worker.js';
