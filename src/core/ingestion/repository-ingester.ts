/**
 * Repository ingestion
 *
 * Turns a local path or a GitHub URL into a RepositorySnapshot: every
 * readable text file ranked by priority plus the latest commits.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import logger from '../../utils/logger.js';
import { errors } from '../../utils/errors.js';
import { withCleanup, type ShutdownManager } from '../../utils/shutdown.js';
import { walkRepository, type FileWalkerOptions } from './file-walker.js';
import { readRecentCommits } from './commit-reader.js';
import { GitCloner, type RepositoryCloner } from '../github/repository-cloner.js';
import type { RepositorySnapshot } from '../../types/index.js';

export interface IngestOptions {
  walker?: FileWalkerOptions;
  /** Defaults to a git-backed shallow cloner */
  cloner?: RepositoryCloner;
  /** Where to register clone cleanup for interrupts; defaults to the global manager */
  shutdown?: ShutdownManager;
}

/**
 * Whether a source string refers to GitHub rather than a local path
 */
export function isGithubUrl(source: string): boolean {
  return source.toLowerCase().includes('github.com');
}

/**
 * Snapshot a directory on disk
 */
export async function ingestLocalRepository(
  repoPath: string,
  options: Pick<IngestOptions, 'walker'> = {}
): Promise<RepositorySnapshot> {
  const rootPath = resolve(repoPath);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(rootPath)).isDirectory();
  } catch {
    throw errors.invalidRepositoryPath(rootPath);
  }
  if (!isDirectory) {
    throw errors.notADirectory(rootPath);
  }

  logger.discovery(`Walking ${rootPath}`);
  const files = await walkRepository(rootPath, options.walker);
  const recentCommits = await readRecentCommits(rootPath);
  logger.debug(`Collected ${files.length} files and ${recentCommits.length} commits`);

  return {
    rootPath,
    files,
    recentCommits,
    isGitRepo: recentCommits.length > 0,
    githubUrl: null,
    isGithubClone: false,
  };
}

/**
 * Clone a GitHub repository to a temporary directory, snapshot it and remove the clone
 */
export async function ingestGithubRepository(
  githubUrl: string,
  options: IngestOptions = {}
): Promise<RepositorySnapshot> {
  const cloner = options.cloner ?? new GitCloner();
  const clonePath = await cloner.clone(githubUrl);

  const snapshot = await withCleanup(
    () => cloner.cleanup(clonePath),
    () => ingestLocalRepository(clonePath, options),
    options.shutdown
  );

  logger.success(`Ingested GitHub repository ${githubUrl}`);
  return { ...snapshot, githubUrl, isGithubClone: true };
}

/**
 * Snapshot a local path or GitHub URL
 */
export async function ingestRepository(source: string, options: IngestOptions = {}): Promise<RepositorySnapshot> {
  return isGithubUrl(source) ? ingestGithubRepository(source, options) : ingestLocalRepository(source, options);
}
