/**
 * Module Sources
 * @module sources/module-source
 *
 * Classifies module `source` strings and source locators into local paths,
 * git repositories and registry addresses.
 */

// ============================================================================
// Types
// ============================================================================

export type ModuleSource =
  | LocalModuleSource
  | GitModuleSource
  | RegistryModuleSource
  | UnsupportedModuleSource;

export interface LocalModuleSource {
  type: 'local';
  path: string;
}

export interface GitModuleSource {
  type: 'git';
  /** Clone URL without subdirectory or query */
  url: string;
  ref: string | null;
  /** Directory inside the repository (`//subdir`) */
  subdir: string | null;
}

export interface RegistryModuleSource {
  type: 'registry';
  hostname: string;
  namespace: string;
  name: string;
  provider: string;
  subdir: string | null;
}

export interface UnsupportedModuleSource {
  type: 'unsupported';
  raw: string;
}

export type SourceLocator = LocalModuleSource | GitModuleSource;

// ============================================================================
// Patterns
// ============================================================================

const SOURCE_PATTERNS = {
  // Local paths
  local: /^\.\.?\//,

  // [hostname/]namespace/name/provider
  registry: /^(?:([a-z0-9.-]+\.[a-z0-9.-]+)\/)?([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_-]+)\/([a-z0-9]+)$/,

  // GitHub shortcuts
  github: /^github\.com\/([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+?)(?:\.git)?$/,

  // scp-like address: git@host:org/repo.git
  scp: /^[a-zA-Z0-9_.-]+@[a-zA-Z0-9_.-]+:.+$/,

  // Plain https URL of a repository
  httpsRepository: /^https?:\/\/.+\.git$/,

  // Forced getters this loader cannot fetch
  forcedGetter: /^(s3|gcs|hg|http|https)::/,
};

const DEFAULT_REGISTRY = 'registry.terraform.io';

/**
 * Split `?ref=` off a source and drop other query parameters
 */
function splitQuery(source: string): { base: string; ref: string | null } {
  const index = source.indexOf('?');
  if (index === -1) {
    return { base: source, ref: null };
  }
  const params = new URLSearchParams(source.slice(index + 1));
  return { base: source.slice(0, index), ref: params.get('ref') };
}

/**
 * Split a `//subdir` suffix off a source, ignoring the `//` of a URL scheme
 */
function splitSubdir(source: string): { base: string; subdir: string | null } {
  const scheme = source.indexOf('://');
  const start = scheme === -1 ? 0 : scheme + 3;
  const index = source.indexOf('//', start);
  if (index === -1) {
    return { base: source, subdir: null };
  }
  const subdir = source.slice(index + 2).replace(/\/+$/, '');
  return { base: source.slice(0, index), subdir: subdir === '' ? null : subdir };
}

function gitSource(url: string, ref: string | null, subdir: string | null): GitModuleSource {
  return { type: 'git', url, ref, subdir };
}

/**
 * Remote git form of a source, or null when the source is not a git address
 */
function parseRemote(source: string): GitModuleSource | null {
  const forced = source.startsWith('git::');
  const unforced = forced ? source.slice('git::'.length) : source;
  const { base: withSubdir, ref } = splitQuery(unforced);
  const { base, subdir } = splitSubdir(withSubdir);

  const github = base.match(SOURCE_PATTERNS.github);
  if (github) {
    const [, owner, repo] = github;
    return gitSource(`https://github.com/${owner}/${repo}.git`, ref, subdir);
  }

  if (forced || SOURCE_PATTERNS.scp.test(base) || SOURCE_PATTERNS.httpsRepository.test(base)) {
    return gitSource(base, ref, subdir);
  }

  return null;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a module call's `source` argument
 */
export function parseModuleSource(source: string): ModuleSource {
  const trimmed = source.trim();

  if (SOURCE_PATTERNS.local.test(trimmed)) {
    return { type: 'local', path: trimmed };
  }

  if (SOURCE_PATTERNS.forcedGetter.test(trimmed)) {
    return { type: 'unsupported', raw: trimmed };
  }

  const remote = parseRemote(trimmed);
  if (remote) {
    return remote;
  }

  const { base, subdir } = splitSubdir(trimmed);
  const registry = base.match(SOURCE_PATTERNS.registry);
  if (registry) {
    const [, hostname, namespace, name, provider] = registry;
    return {
      type: 'registry',
      hostname: hostname ?? DEFAULT_REGISTRY,
      namespace,
      name,
      provider,
      subdir,
    };
  }

  return { type: 'unsupported', raw: trimmed };
}

/**
 * Parse a top-level source locator: a remote git reference or a directory
 */
export function parseLocator(locator: string): SourceLocator {
  const trimmed = locator.trim();
  if (SOURCE_PATTERNS.local.test(trimmed)) {
    return { type: 'local', path: trimmed };
  }
  return parseRemote(trimmed) ?? { type: 'local', path: trimmed };
}

/**
 * Exact version pinned by a `version` argument (`1.2.0` or `= 1.2.0`), if any
 */
export function exactVersion(constraint: string | null): string | null {
  if (constraint === null) {
    return null;
  }
  const match = constraint.trim().match(/^=?\s*v?(\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?)$/);
  return match ? match[1] : null;
}

/**
 * Registry modules are fetched from their conventional GitHub repository,
 * `<namespace>/terraform-<provider>-<name>`, tagged `v<version>`
 */
export function registryGitSource(source: RegistryModuleSource, version: string | null): GitModuleSource {
  const pinned = exactVersion(version);
  return gitSource(
    `https://github.com/${source.namespace}/terraform-${source.provider}-${source.name}.git`,
    pinned === null ? null : `v${pinned}`,
    source.subdir
  );
}

export function describeSource(source: ModuleSource): string {
  switch (source.type) {
    case 'local':
      return source.path;
    case 'git':
      return [source.url, source.subdir ? `//${source.subdir}` : '', source.ref ? `?ref=${source.ref}` : ''].join('');
    case 'registry':
      return `${source.hostname}/${source.namespace}/${source.name}/${source.provider}`;
    case 'unsupported':
      return source.raw;
  }
}
