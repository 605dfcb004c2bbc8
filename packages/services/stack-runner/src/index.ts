export {
  parseStackConfig,
  describeConfig,
  CONFIG_VARIABLES,
  type StackConfig,
  type ConfigVariable,
} from './config/environment';
export { loadEnvironmentFile } from './config/env-file';
export {
  buildStack,
  openBlobStore,
  type Stack,
  type StackOptions,
  type StackActorName,
  type BlobStoreHandle,
} from './stack';
export { parseArgs, runCommand, USAGE, type Command, type CommandIO, type ParsedArgs } from './cli';
