/**
 * Source Loading
 * @module sources
 */

export {
  ConfigTreeBuilder,
  countFiles,
  joinRelative,
  type ConfigFile,
  type ConfigTree,
  type ModuleEntry,
} from './config-tree';

export {
  describeSource,
  exactVersion,
  parseLocator,
  parseModuleSource,
  registryGitSource,
  type GitModuleSource,
  type LocalModuleSource,
  type ModuleSource,
  type RegistryModuleSource,
  type SourceLocator,
  type UnsupportedModuleSource,
} from './module-source';

export {
  GitFetcher,
  execFileRunner,
  isTimeout,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type GitFetcherOptions,
} from './git-fetcher';

export { loadSources, type LoadedSources, type SourceLoaderOptions } from './source-loader';
