/**
 * Recent commit history via git log
 */

import { execFile } from 'node:child_process';
import { realpath } from 'node:fs/promises';
import { promisify } from 'node:util';
import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { CommitRecord } from '../../types/index.js';

const execFileAsync = promisify(execFile);

const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';

/** hash, author, author date (strict ISO), raw body */
const LOG_FORMAT = ['%H', '%an', '%aI', '%B'].join(FIELD_SEPARATOR) + RECORD_SEPARATOR;

export const DEFAULT_COMMIT_LIMIT = 10;

/**
 * Parse `git log` output written with LOG_FORMAT
 */
export function parseGitLog(output: string): CommitRecord[] {
  const commits: CommitRecord[] = [];

  for (const record of output.split(RECORD_SEPARATOR)) {
    const fields = record.replace(/^\n+/, '').split(FIELD_SEPARATOR);
    if (fields.length < 4 || !fields[0]) continue;

    const [hash, author, date, ...body] = fields;
    commits.push({
      hash: hash.trim(),
      author,
      date,
      message: body.join(FIELD_SEPARATOR).trim(),
    });
  }

  return commits;
}

/**
 * Whether rootPath is the top level of a git work tree, not a directory
 * somewhere inside one
 */
async function isRepositoryRoot(rootPath: string): Promise<boolean> {
  const { stdout } = await execFileAsync('git', ['rev-parse', '--show-toplevel'], { cwd: rootPath });
  const [topLevel, root] = await Promise.all([realpath(stdout.trim()), realpath(rootPath)]);
  return topLevel === root;
}

/**
 * Read the newest commits of a repository, newest first.
 * Returns an empty list when the directory has no readable history
 * of its own.
 */
export async function readRecentCommits(
  rootPath: string,
  limit = DEFAULT_COMMIT_LIMIT
): Promise<CommitRecord[]> {
  try {
    if (!(await isRepositoryRoot(rootPath))) {
      logger.debug(`${rootPath} is inside another repository, ignoring its history`);
      return [];
    }
    const { stdout } = await execFileAsync(
      'git',
      ['log', '-n', String(limit), `--format=${LOG_FORMAT}`],
      { cwd: rootPath, maxBuffer: 10 * 1024 * 1024 }
    );
    return parseGitLog(stdout);
  } catch (error) {
    logger.debug(`No git history at ${rootPath}: ${errorMessage(error)}`);
    return [];
  }
}
