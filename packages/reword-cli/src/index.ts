/**
 * reword CLI
 *
 * @module @reword/cli
 */

export { createProgram, runCli } from './cli/program';
export { createCliContext, type CliContext, type CliDependencies, type CliUi } from './cli/context';
export * from './cli/commands';
