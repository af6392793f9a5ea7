/**
 * Shallow cloning of GitHub repositories into temporary directories
 */

import { execFile } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { promisify } from 'node:util';
import logger from '../../utils/logger.js';
import { errors, errorMessage } from '../../utils/errors.js';
import { parseGithubUrl } from './github-client.js';

const execFileAsync = promisify(execFile);

/**
 * Fetches a remote repository into a local directory
 */
export interface RepositoryCloner {
  /** Clone and return the local path; the caller owns the directory */
  clone(githubUrl: string): Promise<string>;
  /** Remove a directory returned by clone */
  cleanup(clonePath: string): Promise<void>;
}

/**
 * RepositoryCloner backed by the git executable
 */
export class GitCloner implements RepositoryCloner {
  async clone(githubUrl: string): Promise<string> {
    const { owner, repo } = parseGithubUrl(githubUrl);
    const cloneUrl = `https://github.com/${owner}/${repo}.git`;
    const target = await mkdtemp(join(tmpdir(), `repo-profiler-${repo}-`));

    logger.discovery(`Cloning ${cloneUrl}`);
    try {
      await execFileAsync('git', ['clone', '--depth', '1', '--single-branch', cloneUrl, target]);
    } catch (error) {
      await this.cleanup(target);
      throw errors.cloneFailed(cloneUrl, errorMessage(error));
    }

    logger.debug(`Cloned ${owner}/${repo} to ${target}`);
    return target;
  }

  async cleanup(clonePath: string): Promise<void> {
    logger.debug(`Removing temporary clone at ${clonePath}`);
    await rm(clonePath, { recursive: true, force: true });
  }
}
