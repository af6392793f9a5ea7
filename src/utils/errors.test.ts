/**
 * Tests for error helpers
 */

import { describe, it, expect } from 'vitest';
import { ProfilerError, errors, formatError, isProfilerError, errorMessage } from './errors.js';

describe('ProfilerError', () => {
  it('should carry code and suggestion', () => {
    const error = errors.invalidGithubUrl('https://gitlab.com/a/b');

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('INVALID_GITHUB_URL');
    expect(error.message).toBe('Invalid GitHub URL format: https://gitlab.com/a/b');
    expect(error.suggestion).toContain('github.com');
  });

  it('should format as a single line without color', () => {
    const error = errors.documentValidationFailed('profile.yaml', ['missing field: problem', 'bad status']);

    expect(error.format(false)).toBe(
      'Error [DOCUMENT_VALIDATION_FAILED]: Invalid profile at profile.yaml: missing field: problem; bad status'
    );
  });
});

describe('formatError', () => {
  it('should wrap unknown errors', () => {
    expect(formatError(new Error('boom'), false)).toBe(
      'Error [UNKNOWN_ERROR]: An unexpected error occurred: boom'
    );
    expect(formatError('plain', false)).toBe('Error [UNKNOWN_ERROR]: An unexpected error occurred: plain');
  });

  it('should keep profiler errors as they are', () => {
    expect(formatError(errors.githubTokenRequired(), false)).toBe(
      'Error [GITHUB_TOKEN_REQUIRED]: GitHub token required'
    );
  });
});

describe('helpers', () => {
  it('should recognise profiler errors', () => {
    expect(isProfilerError(new ProfilerError('x', 'UNKNOWN_ERROR'))).toBe(true);
    expect(isProfilerError(new Error('x'))).toBe(false);
  });

  it('should extract messages from any thrown value', () => {
    expect(errorMessage(new TypeError('bad'))).toBe('bad');
    expect(errorMessage(42)).toBe('42');
  });
});
