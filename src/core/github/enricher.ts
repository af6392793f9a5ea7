/**
 * GitHub data enrichment for repository snapshots
 */

import logger from '../../utils/logger.js';
import { errors } from '../../utils/errors.js';
import { GitHubClient } from './github-client.js';
import { githubActivityLevel } from './repository-metrics.js';
import type { GitHubMetrics, RepositorySnapshot } from '../../types/index.js';

/** Languages below this share of the byte count are left out */
const SIGNIFICANT_LANGUAGE_PERCENT = 5;
const MAX_LANGUAGES = 10;

/**
 * Enriches repository snapshots with GitHub metadata
 */
export class GitHubEnricher {
  constructor(
    private client: GitHubClient,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Fetch metrics for the snapshot's GitHub repository.
   * Repository lookup failures propagate to the caller.
   */
  async enrich(snapshot: RepositorySnapshot): Promise<GitHubMetrics> {
    if (!snapshot.githubUrl) {
      throw errors.invalidGithubUrl(snapshot.rootPath);
    }

    const metrics = await this.client.getRepositoryMetrics(snapshot.githubUrl);
    logger.success(
      `GitHub data: ${metrics.repository.stars} stars, ${metrics.contributors.length} contributors`
    );
    return metrics;
  }

  /**
   * Whether the repository is popular or active enough for its GitHub data to count
   */
  shouldUseGithubData(metrics: GitHubMetrics): boolean {
    const activity = githubActivityLevel(metrics.repository.pushedAt, this.now());
    return (
      metrics.repository.stars > 5 ||
      metrics.contributors.length > 2 ||
      activity === 'active' ||
      activity === 'very_active'
    );
  }

  /**
   * GitHub's significant languages by size, then locally detected ones
   */
  mergeLanguageData(localLanguages: string[], metrics: GitHubMetrics): string[] {
    const { languages, totalBytes } = metrics.languageStats;

    const githubLanguages = Object.entries(languages)
      .sort((a, b) => b[1] - a[1])
      .filter(([, bytes]) => totalBytes > 0 && (bytes / totalBytes) * 100 >= SIGNIFICANT_LANGUAGE_PERCENT)
      .map(([language]) => language);

    const combined = githubLanguages.length > 0
      ? [...githubLanguages, ...localLanguages.filter((language) => !githubLanguages.includes(language))]
      : localLanguages;

    return combined.slice(0, MAX_LANGUAGES);
  }
}
