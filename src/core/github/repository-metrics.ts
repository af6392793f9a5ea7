/**
 * Derived GitHub metrics: popularity, activity and maturity
 */

import type { GitHubActivityLevel, GitHubMaturityIndicators, GitHubMetrics } from '../../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function daysSince(isoDate: string, now: Date): number {
  return Math.floor((now.getTime() - new Date(isoDate).getTime()) / DAY_MS);
}

/**
 * stars + 0.5 * forks + 0.3 * contributors
 */
export function popularityScore(metrics: GitHubMetrics): number {
  return metrics.repository.stars + metrics.repository.forks * 0.5 + metrics.contributors.length * 0.3;
}

/**
 * Activity tier from the last push date. An unreadable date counts as inactive.
 */
export function githubActivityLevel(pushedAt: string, now: Date = new Date()): GitHubActivityLevel {
  const days = daysSince(pushedAt, now);
  if (Number.isNaN(days)) return 'inactive';
  if (days <= 7) return 'very_active';
  if (days <= 30) return 'active';
  if (days <= 90) return 'moderate';
  return 'inactive';
}

export function maturityIndicators(metrics: GitHubMetrics, now: Date = new Date()): GitHubMaturityIndicators {
  const { repository } = metrics;
  const age = daysSince(repository.createdAt, now);
  return {
    hasLicense: repository.license !== null,
    hasWiki: repository.hasWiki,
    hasPages: repository.hasPages,
    multipleContributors: metrics.contributors.length > 1,
    established: age > 90,
    popular: repository.stars > 10,
  };
}
