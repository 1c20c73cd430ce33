/**
 * Git Fetcher
 * @module sources/git-fetcher
 *
 * Shallow-clones remote sources into the staging area. One attempt per
 * source, bounded by a timeout; failures are never retried.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

import { SourceUnavailableError, getErrorMessage } from '../errors';
import type { StructuredLogger } from '../logging';
import { createModuleLogger, sanitizeUrl } from '../logging';
import type { GitModuleSource } from './module-source';

const execFileAsync = promisify(execFile);

// ============================================================================
// Command Runner
// ============================================================================

export interface CommandOptions {
  timeout: number;
  cwd?: string;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable; rejects when it exits non-zero or times out
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandOptions
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    timeout: options.timeout,
    cwd: options.cwd,
    maxBuffer: 50 * 1024 * 1024,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

/**
 * Whether a runner failure was caused by the timeout killing the process
 */
export function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;
}

// ============================================================================
// Fetcher
// ============================================================================

export interface GitFetcherOptions {
  gitBinary: string;
  cloneDepth: number;
  fetchTimeoutMs: number;
  runner?: CommandRunner;
  logger?: StructuredLogger;
}

export class GitFetcher {
  private readonly runner: CommandRunner;
  private readonly logger: StructuredLogger;

  constructor(private readonly options: GitFetcherOptions) {
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger ?? createModuleLogger('git-fetcher');
  }

  /**
   * Clone `source` into `destination`, which must not exist yet
   */
  async fetch(source: GitModuleSource, destination: string): Promise<void> {
    const args = ['clone', `--depth=${this.options.cloneDepth}`];
    if (source.ref) {
      args.push('--branch', source.ref);
    }
    args.push('--', source.url, destination);

    const start = Date.now();
    this.logger.sourceFetchStarted(source.url, source.ref);

    try {
      await this.runner(this.options.gitBinary, args, { timeout: this.options.fetchTimeoutMs });
    } catch (error) {
      const failure = isTimeout(error)
        ? SourceUnavailableError.timeout(sanitizeUrl(source.url), this.options.fetchTimeoutMs)
        : new SourceUnavailableError(sanitizeUrl(source.url), `git clone failed: ${sanitizeUrl(getErrorMessage(error))}`);
      this.logger.sourceFetchFailed(source.url, failure);
      throw failure;
    }

    this.logger.sourceFetchCompleted(source.url, Date.now() - start);
  }
}
