/**
 * FileWalker Service
 *
 * Traverses a repository, skipping ignored directories and binary files,
 * reads every remaining text file and ranks it by how much it tells us
 * about the project.
 */

import { opendir, readFile, stat } from 'node:fs/promises';
import { join, relative, basename, extname, sep } from 'node:path';
import ignoreModule from 'ignore';
const ignore = ignoreModule.default ?? ignoreModule;
type Ignore = ReturnType<typeof ignore>;
import logger from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import type { FileEntry } from '../../types/index.js';

/**
 * Options for the FileWalker
 */
export interface FileWalkerOptions {
  /** Files larger than this many bytes are skipped */
  maxFileSize?: number;
  /** Stop collecting after this many files */
  maxFiles?: number;
  /** Honour the repository's own .gitignore */
  useGitignore?: boolean;
}

/**
 * Directories never descended into
 */
const IGNORE_DIRECTORIES = [
  '.git',
  '__pycache__',
  'node_modules',
  'venv',
  'env',
  '.venv',
  'build',
  'dist',
  '.pytest_cache',
  '.mypy_cache',
  '.tox',
  '.eggs',
  '*.egg-info',
  '.repo-profiler',
];

/**
 * Binary, media and lock files
 */
const SKIP_EXTENSIONS = new Set([
  '.lock', '.lockb', '.map',
  '.png', '.jpg', '.jpeg', '.gif', '.ico', '.webp', '.bmp',
  '.woff', '.woff2', '.ttf', '.eot', '.otf',
  '.mp3', '.mp4', '.wav', '.avi', '.mov', '.webm',
  '.pdf', '.doc', '.docx', '.xls', '.xlsx',
  '.zip', '.tar', '.gz', '.rar', '.7z',
  '.pyc', '.pyo', '.class', '.o', '.so', '.dll', '.exe',
]);

const SKIP_FILENAMES = new Set([
  'package-lock.json',
  'pnpm-lock.yaml',
  'yarn.lock',
  '.DS_Store',
  'Thumbs.db',
]);

export const README_FILES = new Set([
  'readme.md',
  'readme.txt',
  'readme.rst',
  'readme',
]);

/**
 * Package manifests, build files and licenses
 */
const MANIFEST_FILES = new Set([
  'requirements.txt',
  'pyproject.toml',
  'setup.py',
  'setup.cfg',
  'package.json',
  'tsconfig.json',
  'dockerfile',
  'docker-compose.yml',
  'makefile',
  '.gitignore',
  'license',
  'license.txt',
  'license.md',
  'cargo.toml',
  'go.mod',
  'pom.xml',
  'build.gradle',
  'gemfile',
  'composer.json',
]);

const DOC_EXTENSIONS = new Set(['.md', '.txt', '.rst']);

const SOURCE_EXTENSIONS = new Set([
  '.py', '.js', '.ts', '.tsx', '.jsx', '.java', '.cpp', '.c', '.h', '.go', '.rs',
]);

export const PRIORITY = {
  readme: 10,
  manifest: 8,
  documentation: 7,
  source: 5,
  other: 1,
} as const;

const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;
const DEFAULT_MAX_FILES = 5000;

/**
 * Rank a file by name and extension (higher is more important)
 */
export function calculatePriority(filePath: string): number {
  const name = basename(filePath).toLowerCase();
  const ext = extname(name);

  if (README_FILES.has(name)) return PRIORITY.readme;
  if (MANIFEST_FILES.has(name)) return PRIORITY.manifest;
  if (SOURCE_EXTENSIONS.has(ext)) return PRIORITY.source;
  if (DOC_EXTENSIONS.has(ext)) return PRIORITY.documentation;
  return PRIORITY.other;
}

/**
 * Decode bytes as text, or null when they look binary
 */
export function decodeText(buffer: Buffer): string | null {
  if (buffer.includes(0)) {
    return null;
  }
  return new TextDecoder('utf-8', { fatal: false }).decode(buffer);
}

async function loadIgnorePatterns(rootPath: string, useGitignore: boolean): Promise<Ignore> {
  const ig = ignore();

  for (const dir of IGNORE_DIRECTORIES) {
    ig.add(`${dir}/`);
  }

  if (useGitignore) {
    try {
      ig.add(await readFile(join(rootPath, '.gitignore'), 'utf-8'));
    } catch (error) {
      logger.debug(`No .gitignore read in ${rootPath}: ${errorMessage(error)}`);
    }
  }

  return ig;
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

function pathDepth(relativePath: string): number {
  return relativePath.split('/').length;
}

/**
 * FileWalker class for collecting repository content
 */
export class FileWalker {
  private rootPath: string;
  private options: Required<FileWalkerOptions>;
  private ig: Ignore | null = null;
  private files: FileEntry[] = [];
  private skipped = 0;

  constructor(rootPath: string, options: FileWalkerOptions = {}) {
    this.rootPath = rootPath;
    this.options = {
      maxFileSize: options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
      maxFiles: options.maxFiles ?? DEFAULT_MAX_FILES,
      useGitignore: options.useGitignore ?? true,
    };
  }

  /**
   * Number of files skipped during the last walk
   */
  getSkippedCount(): number {
    return this.skipped;
  }

  private shouldSkipFile(relativePath: string, fileName: string): boolean {
    if (SKIP_FILENAMES.has(fileName)) return true;
    if (SKIP_EXTENSIONS.has(extname(fileName).toLowerCase())) return true;
    return this.ig !== null && this.ig.ignores(relativePath);
  }

  private async walkDirectory(dirPath: string): Promise<void> {
    if (this.files.length >= this.options.maxFiles) {
      return;
    }

    let entries: { name: string; isDirectory: boolean; isFile: boolean }[];
    try {
      const dir = await opendir(dirPath);
      entries = [];
      for await (const entry of dir) {
        entries.push({
          name: entry.name,
          isDirectory: entry.isDirectory(),
          isFile: entry.isFile(),
        });
      }
    } catch (error) {
      logger.debug(`Skipping unreadable directory ${dirPath}: ${errorMessage(error)}`);
      this.skipped++;
      return;
    }

    // Name order keeps the result deterministic across file systems
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (this.files.length >= this.options.maxFiles) break;

      const absolutePath = join(dirPath, entry.name);
      const relativePath = toPosix(relative(this.rootPath, absolutePath));

      if (entry.isDirectory) {
        if (this.ig && this.ig.ignores(`${relativePath}/`)) {
          continue;
        }
        await this.walkDirectory(absolutePath);
      } else if (entry.isFile) {
        if (this.shouldSkipFile(relativePath, entry.name)) {
          this.skipped++;
          continue;
        }
        await this.readEntry(absolutePath, relativePath);
      }
    }
  }

  private async readEntry(absolutePath: string, relativePath: string): Promise<void> {
    try {
      const fileStat = await stat(absolutePath);
      if (fileStat.size > this.options.maxFileSize) {
        logger.debug(`Skipping large file: ${relativePath} (${fileStat.size} bytes)`);
        this.skipped++;
        return;
      }

      const content = decodeText(await readFile(absolutePath));
      if (content === null) {
        logger.debug(`Skipping binary file: ${relativePath}`);
        this.skipped++;
        return;
      }

      this.files.push({
        path: relativePath,
        absolutePath,
        content,
        priority: calculatePriority(relativePath),
      });
    } catch (error) {
      logger.debug(`Skipping unreadable file: ${relativePath}: ${errorMessage(error)}`);
      this.skipped++;
    }
  }

  /**
   * Walk the repository and return its files, most important first
   */
  async walk(): Promise<FileEntry[]> {
    this.files = [];
    this.skipped = 0;
    this.ig = await loadIgnorePatterns(this.rootPath, this.options.useGitignore);

    await this.walkDirectory(this.rootPath);

    // Shallower paths first within a priority; the stable sort keeps walk order after that
    return [...this.files].sort((a, b) => b.priority - a.priority || pathDepth(a.path) - pathDepth(b.path));
  }
}

/**
 * Convenience function to walk a repository
 */
export async function walkRepository(
  rootPath: string,
  options?: FileWalkerOptions
): Promise<FileEntry[]> {
  return new FileWalker(rootPath, options).walk();
}
