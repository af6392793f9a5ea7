/**
 * Custom error classes for repo-profiler with helpful user-facing messages
 */

export type ErrorCode =
  | 'INVALID_REPOSITORY_PATH'
  | 'NOT_A_DIRECTORY'
  | 'INVALID_GITHUB_URL'
  | 'GITHUB_API_ERROR'
  | 'GITHUB_TOKEN_REQUIRED'
  | 'CLONE_FAILED'
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_VALIDATION_FAILED'
  | 'INVALID_CONFIG'
  | 'FILE_WRITE_ERROR'
  | 'OUTPUT_EXISTS'
  | 'UNKNOWN_ERROR';

/**
 * Base error class for repo-profiler with code and suggestion
 */
export class ProfilerError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public suggestion?: string
  ) {
    super(message);
    this.name = 'ProfilerError';
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Single-line rendering for CLI output
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const reset = useColor ? '\x1b[0m' : '';
    return `${red}Error [${this.code}]:${reset} ${this.message}`;
  }
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  invalidRepositoryPath(path: string): ProfilerError {
    return new ProfilerError(
      `Repository path does not exist: ${path}`,
      'INVALID_REPOSITORY_PATH',
      'Pass an existing directory or a GitHub URL.'
    );
  },

  notADirectory(path: string): ProfilerError {
    return new ProfilerError(
      `Repository path is not a directory: ${path}`,
      'NOT_A_DIRECTORY',
      'Point at the repository root, not a file inside it.'
    );
  },

  invalidGithubUrl(url: string): ProfilerError {
    return new ProfilerError(
      `Invalid GitHub URL format: ${url}`,
      'INVALID_GITHUB_URL',
      'Use https://github.com/<owner>/<repo> or git@github.com:<owner>/<repo>.git'
    );
  },

  githubApiError(resource: string, reason: string): ProfilerError {
    return new ProfilerError(
      `GitHub API request for ${resource} failed: ${reason}`,
      'GITHUB_API_ERROR',
      "Check the token and the rate limit with 'repo-profiler rate-limit'."
    );
  },

  githubTokenRequired(): ProfilerError {
    return new ProfilerError(
      'GitHub token required',
      'GITHUB_TOKEN_REQUIRED',
      'Set the GITHUB_TOKEN environment variable or pass --github-token.'
    );
  },

  cloneFailed(url: string, reason: string): ProfilerError {
    return new ProfilerError(
      `Failed to clone ${url}: ${reason}`,
      'CLONE_FAILED',
      'Make sure git is installed and the repository is public or reachable.'
    );
  },

  documentNotFound(path: string): ProfilerError {
    return new ProfilerError(
      `Profile file not found: ${path}`,
      'DOCUMENT_NOT_FOUND',
      "Run 'repo-profiler init <repo>' to generate one."
    );
  },

  documentValidationFailed(path: string, details: string[]): ProfilerError {
    return new ProfilerError(
      `Invalid profile at ${path}: ${details.join('; ')}`,
      'DOCUMENT_VALIDATION_FAILED',
      'Fix the listed fields or regenerate the profile.'
    );
  },

  invalidConfig(path: string, details?: string): ProfilerError {
    return new ProfilerError(
      `Invalid configuration file at ${path}${details ? `: ${details}` : ''}`,
      'INVALID_CONFIG',
      'Check the JSON syntax and field types, or delete the file to use defaults.'
    );
  },

  fileWriteError(path: string, reason?: string): ProfilerError {
    return new ProfilerError(
      `Failed to write file ${path}${reason ? `: ${reason}` : ''}`,
      'FILE_WRITE_ERROR',
      'Check that you have write permissions for the directory.'
    );
  },

  outputExists(path: string): ProfilerError {
    return new ProfilerError(
      `Output file already exists: ${path}`,
      'OUTPUT_EXISTS',
      'Use --force to overwrite it, or --output to pick another path.'
    );
  },

  unknown(error: unknown): ProfilerError {
    const message = error instanceof Error ? error.message : String(error);
    return new ProfilerError(
      `An unexpected error occurred: ${message}`,
      'UNKNOWN_ERROR'
    );
  },
};

/**
 * Type guard to check if an error is a ProfilerError
 */
export function isProfilerError(error: unknown): error is ProfilerError {
  return error instanceof ProfilerError;
}

/**
 * Format any error for CLI display
 */
export function formatError(error: unknown, useColor = true): string {
  if (isProfilerError(error)) {
    return error.format(useColor);
  }
  return errors.unknown(error).format(useColor);
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
