/**
 * GitHub REST client
 *
 * Fetches repository metadata, contributors and language statistics.
 * Only the repository lookup is essential; the secondary lookups degrade
 * to empty results so a profile can still be produced.
 */

import logger from '../../utils/logger.js';
import { errors, errorMessage } from '../../utils/errors.js';
import {
  isRecord,
  stringField,
  nullableStringField,
  numberField,
  booleanField,
  stringArrayField,
  type JsonRecord,
} from '../../utils/json-fields.js';
import type {
  GitHubContributor,
  GitHubLanguageStats,
  GitHubMetrics,
  GitHubRepository,
  RateLimitStatus,
} from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GitHubClientOptions {
  /** API root, without trailing slash */
  apiBaseUrl?: string;
  /** Per-request timeout in ms */
  timeoutMs?: number;
}

export interface GitHubRepoRef {
  owner: string;
  repo: string;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_CONTRIBUTOR_LIMIT = 30;
const DEFAULT_TIMEOUT_MS = 30000;
const USER_AGENT = 'repo-profiler/0.3';

// ============================================================================
// URL PARSING
// ============================================================================

const GITHUB_URL_PATTERNS = [
  /github\.com[:/]([^/]+)\/([^/]+?)(?:\.git)?\/?$/,
  /github\.com\/([^/]+)\/([^/]+)/,
];

/**
 * Extract owner and repository name from an https or ssh GitHub URL
 */
export function parseGithubUrl(url: string): GitHubRepoRef {
  for (const pattern of GITHUB_URL_PATTERNS) {
    const match = url.match(pattern);
    if (match) {
      return { owner: match[1], repo: match[2] };
    }
  }
  throw errors.invalidGithubUrl(url);
}

// ============================================================================
// RESPONSE MAPPING
// ============================================================================

function toRepository(data: JsonRecord): GitHubRepository {
  const license = data.license;
  return {
    name: stringField(data, 'name'),
    fullName: stringField(data, 'full_name'),
    description: nullableStringField(data, 'description'),
    stars: numberField(data, 'stargazers_count'),
    forks: numberField(data, 'forks_count'),
    openIssues: numberField(data, 'open_issues_count'),
    language: nullableStringField(data, 'language'),
    topics: stringArrayField(data, 'topics'),
    createdAt: stringField(data, 'created_at'),
    updatedAt: stringField(data, 'updated_at'),
    pushedAt: stringField(data, 'pushed_at'),
    size: numberField(data, 'size'),
    defaultBranch: stringField(data, 'default_branch', 'main'),
    license: isRecord(license) ? nullableStringField(license, 'name') : null,
    hasWiki: booleanField(data, 'has_wiki'),
    hasPages: booleanField(data, 'has_pages'),
    hasProjects: booleanField(data, 'has_projects'),
    archived: booleanField(data, 'archived'),
    disabled: booleanField(data, 'disabled'),
  };
}

function toContributors(data: unknown): GitHubContributor[] {
  if (!Array.isArray(data)) {
    throw new Error('expected a list of contributors');
  }
  return data.filter(isRecord).map((entry) => ({
    login: stringField(entry, 'login'),
    contributions: numberField(entry, 'contributions'),
    type: stringField(entry, 'type', 'User'),
  }));
}

function toLanguageStats(data: unknown): GitHubLanguageStats {
  if (!isRecord(data)) {
    throw new Error('expected a language map');
  }
  const languages: Record<string, number> = {};
  let totalBytes = 0;
  for (const [language, bytes] of Object.entries(data)) {
    if (typeof bytes === 'number') {
      languages[language] = bytes;
      totalBytes += bytes;
    }
  }
  return { languages, totalBytes };
}

function toRateLimit(data: unknown): RateLimitStatus | null {
  if (!isRecord(data)) return null;
  const resources = data.resources;
  const core = isRecord(resources) && isRecord(resources.core) ? resources.core : data.rate;
  if (!isRecord(core)) return null;
  return {
    limit: numberField(core, 'limit'),
    remaining: numberField(core, 'remaining'),
    reset: numberField(core, 'reset'),
    used: numberField(core, 'used'),
  };
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * GitHub API client for fetching repository metadata
 */
export class GitHubClient {
  private token: string | null;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(token: string | null = null, options: GitHubClientOptions = {}) {
    this.token = token;
    this.baseUrl = (options.apiBaseUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      Accept: 'application/vnd.github+json',
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async request(path: string): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`);
    }

    return response.json();
  }

  /**
   * Fetch repository metadata. Failures are fatal.
   */
  async getRepository(owner: string, repo: string): Promise<GitHubRepository> {
    const resource = `${owner}/${repo}`;
    let data: unknown;
    try {
      data = await this.request(`/repos/${resource}`);
    } catch (error) {
      throw errors.githubApiError(resource, errorMessage(error));
    }

    if (!isRecord(data) || typeof data.name !== 'string') {
      throw errors.githubApiError(resource, 'unexpected response body');
    }
    return toRepository(data);
  }

  /**
   * Fetch up to `limit` contributors, or an empty list on failure
   */
  async getContributors(owner: string, repo: string, limit = DEFAULT_CONTRIBUTOR_LIMIT): Promise<GitHubContributor[]> {
    try {
      return toContributors(await this.request(`/repos/${owner}/${repo}/contributors?per_page=${limit}`));
    } catch (error) {
      logger.warning(`Failed to fetch contributors for ${owner}/${repo}: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Fetch bytes per language, or empty stats on failure
   */
  async getLanguageStats(owner: string, repo: string): Promise<GitHubLanguageStats> {
    try {
      return toLanguageStats(await this.request(`/repos/${owner}/${repo}/languages`));
    } catch (error) {
      logger.warning(`Failed to fetch language stats for ${owner}/${repo}: ${errorMessage(error)}`);
      return { languages: {}, totalBytes: 0 };
    }
  }

  /**
   * Fetch everything known about a repository from its URL
   */
  async getRepositoryMetrics(githubUrl: string): Promise<GitHubMetrics> {
    const { owner, repo } = parseGithubUrl(githubUrl);
    logger.discovery(`Fetching GitHub metrics for ${owner}/${repo}`);

    const repository = await this.getRepository(owner, repo);
    const contributors = await this.getContributors(owner, repo);
    const languageStats = await this.getLanguageStats(owner, repo);

    return {
      repository,
      contributors,
      languageStats,
      cloneUrl: `https://github.com/${owner}/${repo}.git`,
      sshUrl: `git@github.com:${owner}/${repo}.git`,
    };
  }

  /**
   * Current core rate limit, or null when it cannot be read
   */
  async checkRateLimit(): Promise<RateLimitStatus | null> {
    try {
      const status = toRateLimit(await this.request('/rate_limit'));
      if (!status) {
        logger.warning('Failed to check rate limit: unexpected response body');
      }
      return status;
    } catch (error) {
      logger.warning(`Failed to check rate limit: ${errorMessage(error)}`);
      return null;
    }
  }
}
