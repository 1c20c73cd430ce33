/**
 * Source Loader
 * @module sources/source-loader
 *
 * Materializes source locators into one configuration tree. Remote
 * locators and module sources are cloned into a per-run staging directory
 * that is removed once loading finishes. Later locators override files of
 * the same name from earlier ones.
 */

import { mkdir, mkdtemp, readFile, readdir, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';

import type { SourceConfig } from '../config';
import {
  ConfigurationError,
  MalformedConfigError,
  SourceErrorCodes,
  SourceUnavailableError,
  getErrorMessage,
} from '../errors';
import type { StructuredLogger } from '../logging';
import { createModuleLogger } from '../logging';
import { HCLParser } from '../parsers/terraform/hcl-parser';
import { JSONConfigParser } from '../parsers/terraform/json-config-parser';
import type { TerraformFile } from '../parsers/terraform/types';
import { ModulePath, ROOT_MODULE, joinModulePath } from '../types';
import { ConfigFile, ConfigTree, ConfigTreeBuilder, countFiles, joinRelative } from './config-tree';
import { CommandRunner, GitFetcher } from './git-fetcher';
import {
  GitModuleSource,
  parseLocator,
  parseModuleSource,
  registryGitSource,
} from './module-source';

// ============================================================================
// Types
// ============================================================================

export interface SourceLoaderOptions {
  sources: SourceConfig;
  /** Replaces the git executable, e.g. in tests */
  runner?: CommandRunner;
  logger?: StructuredLogger;
}

export interface LoadedSources {
  readonly tree: ConfigTree;
  /** Variable definition files, lowest precedence first */
  readonly variableFiles: readonly ConfigFile[];
}

interface LoadedFile {
  /** Absolute directory the file was read from */
  readonly directory: string;
  readonly content: string;
}

interface ModuleCall {
  readonly name: string;
  readonly source: string;
  readonly version: string | null;
  /** Absolute directory of the file declaring the call */
  readonly callerDirectory: string;
}

const MAX_MODULE_DEPTH = 32;

/** Variable files the root module loads without being asked, in load order */
const DEFAULT_VARIABLE_FILES = ['terraform.tfvars', 'terraform.tfvars.json'];

function isAutoVariableFile(name: string): boolean {
  return name.endsWith('.auto.tfvars') || name.endsWith('.auto.tfvars.json');
}

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Loader
// ============================================================================

class SourceLoader {
  private readonly builder = new ConfigTreeBuilder();
  private readonly fetcher: GitFetcher;
  private readonly hcl: HCLParser;
  private readonly json: JSONConfigParser;
  /** Clone directory by url and ref */
  private readonly clones = new Map<string, string>();

  constructor(
    private readonly staging: string,
    private readonly config: SourceConfig,
    runner: CommandRunner | undefined,
    private readonly logger: StructuredLogger
  ) {
    this.fetcher = new GitFetcher({
      gitBinary: config.gitBinary,
      cloneDepth: config.cloneDepth,
      fetchTimeoutMs: config.fetchTimeoutMs,
      runner,
      logger,
    });
    this.hcl = new HCLParser({ maxFileSize: config.maxFileSize });
    this.json = new JSONConfigParser({ maxFileSize: config.maxFileSize });
  }

  async load(locators: readonly string[], variableFiles: readonly string[]): Promise<LoadedSources> {
    if (locators.length === 0) {
      throw new ConfigurationError('At least one source locator is required');
    }

    const rootDirectories: string[] = [];
    for (const locator of locators) {
      rootDirectories.push(await this.materializeLocator(locator));
    }

    this.builder.addModule(ROOT_MODULE, '.', locators.join(', '));
    const rootFiles = await this.addFiles(ROOT_MODULE, '.', rootDirectories);
    await this.discoverChildren(ROOT_MODULE, '.', rootFiles, 0);

    const autoFiles = await this.autoVariableFiles(rootDirectories);
    const userFiles = await Promise.all(variableFiles.map((file) => this.readVariableFile(file)));

    const tree = this.builder.build();
    this.logger.sourceLoaded(locators.join(', '), tree.modules.size, countFiles(tree));

    return { tree, variableFiles: [...autoFiles, ...userFiles] };
  }

  // ==========================================================================
  // Locators and Module Sources
  // ==========================================================================

  private async materializeLocator(locator: string): Promise<string> {
    const source = parseLocator(locator);

    if (source.type === 'local') {
      const directory = path.resolve(source.path);
      await this.assertDirectory(directory, locator);
      return directory;
    }

    return this.materializeGit(source, locator);
  }

  private async materializeGit(source: GitModuleSource, label: string): Promise<string> {
    const key = `${source.url}#${source.ref ?? ''}`;
    let clone = this.clones.get(key);

    if (clone === undefined) {
      clone = path.join(this.staging, `source-${this.clones.size}`);
      await this.fetcher.fetch(source, clone);
      this.clones.set(key, clone);
    }

    const directory = source.subdir ? path.join(clone, source.subdir) : clone;
    await this.assertDirectory(directory, label);
    return directory;
  }

  /**
   * Absolute directory of a called module, and its directory relative to
   * the configuration root
   */
  private async resolveCall(
    call: ModuleCall,
    parentDirectory: string,
    childPath: ModulePath
  ): Promise<{ absolute: string; directory: string }> {
    const source = parseModuleSource(call.source);

    switch (source.type) {
      case 'local': {
        const absolute = path.resolve(call.callerDirectory, source.path);
        await this.assertDirectory(absolute, call.source);
        return {
          absolute,
          directory: path.posix.normalize(path.posix.join(parentDirectory, source.path)),
        };
      }

      case 'git':
      case 'registry': {
        const git = source.type === 'git' ? source : registryGitSource(source, call.version);
        const absolute = await this.materializeGit(git, call.source);
        const installed = `.terraform/modules/${childPath}`;
        return {
          absolute,
          directory: git.subdir ? `${installed}/${git.subdir}` : installed,
        };
      }

      case 'unsupported':
        throw new SourceUnavailableError(source.raw, 'unsupported module source type');
    }
  }

  // ==========================================================================
  // Modules
  // ==========================================================================

  private async discoverChildren(
    modulePath: ModulePath,
    directory: string,
    files: ReadonlyMap<string, LoadedFile>,
    depth: number
  ): Promise<void> {
    const calls = this.moduleCalls(directory, files);

    for (const call of calls) {
      if (depth + 1 > MAX_MODULE_DEPTH) {
        throw new SourceUnavailableError(call.source, `module nesting exceeds ${MAX_MODULE_DEPTH} levels`);
      }

      const childPath = joinModulePath(modulePath, call.name);
      const child = await this.resolveCall(call, directory, childPath);

      this.builder.addModule(childPath, child.directory, call.source);
      const childFiles = await this.addFiles(childPath, child.directory, [child.absolute]);
      await this.discoverChildren(childPath, child.directory, childFiles, depth + 1);
    }
  }

  /**
   * Module calls declared across the module's files, first declaration wins
   */
  private moduleCalls(directory: string, files: ReadonlyMap<string, LoadedFile>): ModuleCall[] {
    const calls = new Map<string, ModuleCall>();

    for (const name of [...files.keys()].sort(byName)) {
      const file = files.get(name);
      if (!file) continue;

      const parsed = this.parse(name, joinRelative(directory, name), file.content);

      for (const block of parsed.blocks) {
        if (block.type !== 'module' || block.labels.length !== 1) continue;
        const [callName] = block.labels;
        if (calls.has(callName)) continue;

        const source = block.attributes.source;
        if (!source || source.type !== 'literal' || typeof source.value !== 'string') {
          throw new MalformedConfigError(
            parsed.path,
            { line: block.location.lineStart, column: block.location.columnStart },
            `module "${callName}" requires a literal string source`
          );
        }

        const version = block.attributes.version;
        calls.set(callName, {
          name: callName,
          source: source.value,
          version: version && version.type === 'literal' && typeof version.value === 'string' ? version.value : null,
          callerDirectory: file.directory,
        });
      }
    }

    return [...calls.values()];
  }

  private parse(name: string, displayPath: string, content: string): TerraformFile {
    return name.endsWith('.json') ? this.json.parse(content, displayPath) : this.hcl.parse(content, displayPath);
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  /**
   * Add configuration files of `directories` to a module, later directories
   * replacing files of the same name
   */
  private async addFiles(
    modulePath: ModulePath,
    displayDirectory: string,
    directories: readonly string[]
  ): Promise<Map<string, LoadedFile>> {
    const loaded = new Map<string, LoadedFile>();

    for (const directory of directories) {
      const names = await this.listFiles(directory, (name) =>
        this.config.fileExtensions.some((extension) => name.endsWith(extension))
      );
      const contents = await Promise.all(
        names.map((name) => this.readSourceFile(path.join(directory, name), joinRelative(displayDirectory, name)))
      );

      names.forEach((name, i) => {
        this.builder.addFile(modulePath, name, contents[i]);
        loaded.set(name, { directory, content: contents[i] });
      });
    }

    return loaded;
  }

  private async listFiles(directory: string, accept: (name: string) => boolean): Promise<string[]> {
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && accept(entry.name))
        .map((entry) => entry.name)
        .sort(byName);
    } catch (error) {
      throw new SourceUnavailableError(directory, getErrorMessage(error), SourceErrorCodes.FILE_READ_ERROR);
    }
  }

  private async readSourceFile(absolute: string, label: string): Promise<string> {
    try {
      const stats = await stat(absolute);
      if (stats.size > this.config.maxFileSize) {
        throw new SourceUnavailableError(
          label,
          `file size ${stats.size} exceeds maximum ${this.config.maxFileSize}`,
          SourceErrorCodes.FILE_TOO_LARGE
        );
      }
      return await readFile(absolute, 'utf-8');
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      if (isMissing(error)) {
        throw SourceUnavailableError.notFound(label);
      }
      throw new SourceUnavailableError(label, getErrorMessage(error), SourceErrorCodes.FILE_READ_ERROR);
    }
  }

  private async assertDirectory(directory: string, label: string): Promise<void> {
    try {
      const stats = await stat(directory);
      if (!stats.isDirectory()) {
        throw new SourceUnavailableError(label, 'not a directory');
      }
    } catch (error) {
      if (error instanceof SourceUnavailableError) {
        throw error;
      }
      if (isMissing(error)) {
        throw SourceUnavailableError.notFound(label);
      }
      throw new SourceUnavailableError(label, getErrorMessage(error), SourceErrorCodes.FILE_READ_ERROR);
    }
  }

  // ==========================================================================
  // Variable Files
  // ==========================================================================

  private async autoVariableFiles(rootDirectories: readonly string[]): Promise<ConfigFile[]> {
    const files = new Map<string, ConfigFile>();

    for (const directory of rootDirectories) {
      const names = await this.listFiles(
        directory,
        (name) => DEFAULT_VARIABLE_FILES.includes(name) || isAutoVariableFile(name)
      );
      for (const name of names) {
        const content = await this.readSourceFile(path.join(directory, name), name);
        files.set(name, { name, path: name, content });
      }
    }

    const rank = (name: string): number => {
      const index = DEFAULT_VARIABLE_FILES.indexOf(name);
      return index === -1 ? DEFAULT_VARIABLE_FILES.length : index;
    };

    return [...files.values()].sort((a, b) => rank(a.name) - rank(b.name) || byName(a.name, b.name));
  }

  private async readVariableFile(file: string): Promise<ConfigFile> {
    const content = await this.readSourceFile(path.resolve(file), file);
    return { name: path.basename(file), path: file, content };
  }
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Load every locator into one configuration tree, plus the variable files
 * that apply to the root module
 */
export async function loadSources(
  locators: readonly string[],
  variableFiles: readonly string[],
  options: SourceLoaderOptions
): Promise<LoadedSources> {
  const logger = options.logger ?? createModuleLogger('source-loader');
  const base = options.sources.stagingDir ?? tmpdir();
  await mkdir(base, { recursive: true });
  const staging = await mkdtemp(path.join(base, 'infragraph-'));

  try {
    const loader = new SourceLoader(staging, options.sources, options.runner, logger);
    return await loader.load(locators, variableFiles);
  } finally {
    try {
      await rm(staging, { recursive: true, force: true });
      logger.debug({ staging }, 'Cleaned up staging directory');
    } catch (cleanupError) {
      logger.warn({ staging, err: cleanupError }, 'Failed to clean up staging directory');
    }
  }
}
