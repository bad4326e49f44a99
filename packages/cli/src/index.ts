export { main, runCliEntrypoint, isExecutedAsScript } from './entrypoint.js';
export { formatExecutionPlan } from './commands/compile.js';
export { CliConfigError, resolveCliConfig } from './execution.js';
export * from './constants.js';
export {
  defaultDependencies,
  type CliConfig,
  type CliDependencies,
  type CliEntrypointRuntime,
  type CliIo,
  type ExitCode,
  type MainOptions,
} from './types.js';
