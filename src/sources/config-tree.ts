/**
 * Configuration Tree
 * @module sources/config-tree
 *
 * Uniform in-memory view of a loaded configuration: module path to the raw
 * files of that module. Produced once by the source loader and read-only
 * afterwards.
 */

import { ConfigurationError } from '../errors';
import {
  ModulePath,
  ROOT_MODULE,
  compareModulePaths,
  displayModulePath,
  parentModulePath,
} from '../types';

// ============================================================================
// Types
// ============================================================================

export interface ConfigFile {
  /** File name within its module directory */
  readonly name: string;
  /** Provenance path relative to the locator root */
  readonly path: string;
  readonly content: string;
}

export interface ModuleEntry {
  readonly path: ModulePath;
  /** Module directory relative to the locator root (`path.module`) */
  readonly directory: string;
  /** Locator or module source the files came from */
  readonly source: string;
  /** Ordered by file name */
  readonly files: readonly ConfigFile[];
}

export interface ConfigTree {
  /** Ordered parents first, siblings by name */
  readonly modules: ReadonlyMap<ModulePath, ModuleEntry>;
}

// ============================================================================
// Builder
// ============================================================================

interface MutableEntry {
  path: ModulePath;
  directory: string;
  source: string;
  files: Map<string, ConfigFile>;
}

export function joinRelative(directory: string, name: string): string {
  return directory === '' || directory === '.' ? name : `${directory}/${name}`;
}

/**
 * Accumulates modules and files. Adding a file whose name already exists in
 * the module replaces it, so later sources win.
 */
export class ConfigTreeBuilder {
  private readonly entries = new Map<ModulePath, MutableEntry>();

  hasModule(path: ModulePath): boolean {
    return this.entries.has(path);
  }

  addModule(path: ModulePath, directory: string, source: string): this {
    const existing = this.entries.get(path);
    if (existing) {
      existing.directory = directory;
      existing.source = source;
    } else {
      this.entries.set(path, { path, directory, source, files: new Map() });
    }
    return this;
  }

  addFile(path: ModulePath, name: string, content: string): this {
    const entry = this.entries.get(path);
    if (!entry) {
      throw new ConfigurationError(`Cannot add ${name} to unknown module ${displayModulePath(path)}`);
    }
    entry.files.set(name, { name, path: joinRelative(entry.directory, name), content });
    return this;
  }

  build(): ConfigTree {
    if (!this.entries.has(ROOT_MODULE)) {
      throw new ConfigurationError('Configuration tree has no root module');
    }

    for (const path of this.entries.keys()) {
      const parent = parentModulePath(path);
      if (parent !== null && !this.entries.has(parent)) {
        throw new ConfigurationError(
          `Module ${displayModulePath(path)} has no parent module ${displayModulePath(parent)}`
        );
      }
    }

    const modules = new Map<ModulePath, ModuleEntry>();
    const ordered = [...this.entries.keys()].sort(compareModulePaths);

    for (const path of ordered) {
      const entry = this.entries.get(path);
      if (!entry) continue;
      const files = [...entry.files.values()].sort((a, b) =>
        a.name < b.name ? -1 : a.name > b.name ? 1 : 0
      );
      modules.set(path, Object.freeze({
        path,
        directory: entry.directory,
        source: entry.source,
        files: Object.freeze(files),
      }));
    }

    return { modules };
  }
}

export function countFiles(tree: ConfigTree): number {
  let total = 0;
  for (const entry of tree.modules.values()) {
    total += entry.files.length;
  }
  return total;
}
