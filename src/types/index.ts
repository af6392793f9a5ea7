/**
 * Core type definitions for repo-profiler
 */

// Profile enumerations
export const PROJECT_TYPES = ['cli', 'api', 'web_app', 'ml', 'automation', 'library', 'other'] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export const PROJECT_STATUSES = ['prototype', 'mvp', 'production'] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export type ActivityLevel = 'high' | 'medium' | 'low' | 'unknown';

export type GitHubActivityLevel = 'very_active' | 'active' | 'moderate' | 'inactive';

// Ingestion types
export interface FileEntry {
  /** Path relative to the repository root, always with forward slashes */
  path: string;
  absolutePath: string;
  content: string;
  /** Higher values for more important files */
  priority: number;
}

export interface CommitRecord {
  hash: string;
  message: string;
  author: string;
  /** ISO 8601 author date */
  date: string;
}

export interface RepositorySnapshot {
  rootPath: string;
  files: FileEntry[];
  recentCommits: CommitRecord[];
  isGitRepo: boolean;
  githubUrl: string | null;
  isGithubClone: boolean;
}

// Analysis types
export interface TechnicalSignals {
  languages: string[];
  frameworks: string[];
  projectType: ProjectType;
  maturity: ProjectStatus;
  activityLevel: ActivityLevel;
  techStack: string[];
}

export interface MaturityIndicators {
  hasTests: boolean;
  hasCi: boolean;
  hasDocs: boolean;
  hasVersion: boolean;
}

// GitHub types
export interface GitHubRepository {
  name: string;
  fullName: string;
  description: string | null;
  stars: number;
  forks: number;
  openIssues: number;
  language: string | null;
  topics: string[];
  createdAt: string;
  updatedAt: string;
  pushedAt: string;
  /** Repository size in KB */
  size: number;
  defaultBranch: string;
  license: string | null;
  hasWiki: boolean;
  hasPages: boolean;
  hasProjects: boolean;
  archived: boolean;
  disabled: boolean;
}

export interface GitHubContributor {
  login: string;
  contributions: number;
  /** "User" or "Bot" */
  type: string;
}

export interface GitHubLanguageStats {
  /** language -> bytes */
  languages: Record<string, number>;
  totalBytes: number;
}

export interface GitHubMetrics {
  repository: GitHubRepository;
  contributors: GitHubContributor[];
  languageStats: GitHubLanguageStats;
  cloneUrl: string;
  sshUrl: string;
}

export interface GitHubMaturityIndicators {
  hasLicense: boolean;
  hasWiki: boolean;
  hasPages: boolean;
  multipleContributors: boolean;
  established: boolean;
  popular: boolean;
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  /** Epoch seconds */
  reset: number;
  used: number;
}

// Reasoning types
export interface Insights {
  problem: string;
  solution: string;
  valueProposition: string;
  targetUsers: string;
  keyFeatures: string[];
  currentFocus: string;
  futurePlans: string;
}

// Output document
export interface ProfileMetadata {
  version: string;
  generatedAt: string;
}

export interface ProjectProfile {
  projectName: string;
  oneLiner: string;
  problem: string;
  solution: string;
  valueProposition: string;
  techStack: string[];
  projectType: ProjectType;
  status: ProjectStatus;
  keyFeatures: string[];
  targetUsers: string;
  currentFocus: string;
  futurePlans: string;
  risksOrGaps: string | null;
  metadata: ProfileMetadata;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Configuration types
export type EngineName = 'openai' | 'anthropic' | 'local' | 'rules' | 'mock';

export interface ReasoningCredentials {
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

export interface ProfilerConfigFile {
  reasoning?: {
    provider?: string;
    model?: string | null;
    localBaseUrl?: string;
    timeoutMs?: number;
  };
  github?: {
    apiBaseUrl?: string;
  };
  output?: {
    fileName?: string;
  };
  walker?: {
    maxFileSize?: number;
    maxFiles?: number;
  };
}

export interface ResolvedConfig {
  reasoning: {
    provider: string;
    model: string | null;
    credentials: ReasoningCredentials;
    openaiBaseUrl: string | null;
    anthropicBaseUrl: string | null;
    localBaseUrl: string;
    timeoutMs: number;
  };
  github: {
    token: string | null;
    apiBaseUrl: string;
  };
  output: {
    fileName: string;
  };
  walker: {
    maxFileSize: number;
    maxFiles: number;
  };
}

// CLI option types
export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
  color: boolean;
  config: string;
}

export interface GenerateOptions {
  output?: string;
  force?: boolean;
  aiProvider?: string;
  aiModel?: string;
  openaiKey?: string;
  anthropicKey?: string;
  githubToken?: string;
  interactive?: boolean;
}
