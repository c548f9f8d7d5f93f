export { buildRunConfig, createProgram, runCLI, type CliOptions } from './main';
export { getDefaultOutputPath } from './output';
export * from './cli.utils';
