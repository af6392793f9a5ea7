/**
 * Shared GitHub fixtures for tests
 */

import type { GitHubMetrics, GitHubRepository } from '../../types/index.js';

export function makeRepository(overrides: Partial<GitHubRepository> = {}): GitHubRepository {
  return {
    name: 'demo',
    fullName: 'owner/demo',
    description: 'Demo repository',
    stars: 0,
    forks: 0,
    openIssues: 0,
    language: 'TypeScript',
    topics: [],
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-06-01T00:00:00Z',
    pushedAt: '2024-06-01T00:00:00Z',
    size: 120,
    defaultBranch: 'main',
    license: 'MIT License',
    hasWiki: false,
    hasPages: false,
    hasProjects: false,
    archived: false,
    disabled: false,
    ...overrides,
  };
}

export function makeMetrics(
  repository: Partial<GitHubRepository> = {},
  rest: Partial<Omit<GitHubMetrics, 'repository'>> = {}
): GitHubMetrics {
  return {
    repository: makeRepository(repository),
    contributors: [],
    languageStats: { languages: {}, totalBytes: 0 },
    cloneUrl: 'https://github.com/owner/demo.git',
    sshUrl: 'git@github.com:owner/demo.git',
    ...rest,
  };
}

export function makeContributors(count: number): GitHubMetrics['contributors'] {
  return Array.from({ length: count }, (_, i) => ({ login: `dev${i}`, contributions: 10 - i, type: 'User' }));
}
