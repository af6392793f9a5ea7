/**
 * Signal Extractor
 *
 * Derives technical signals (languages, frameworks, project type,
 * maturity, activity) from a repository snapshot. Every function here is
 * pure: the same snapshot and clock always give the same signals.
 */

import { basename, extname } from 'node:path';
import type {
  ActivityLevel,
  CommitRecord,
  FileEntry,
  MaturityIndicators,
  ProjectStatus,
  ProjectType,
  RepositorySnapshot,
  TechnicalSignals,
} from '../../types/index.js';

// ============================================================================
// TABLES
// ============================================================================

export const LANGUAGE_EXTENSIONS: Readonly<Record<string, string>> = {
  '.py': 'Python',
  '.js': 'JavaScript',
  '.jsx': 'JavaScript',
  '.ts': 'TypeScript',
  '.tsx': 'TypeScript',
  '.java': 'Java',
  '.cpp': 'C++',
  '.c': 'C',
  '.h': 'C',
  '.go': 'Go',
  '.rs': 'Rust',
  '.rb': 'Ruby',
  '.php': 'PHP',
  '.cs': 'C#',
  '.scala': 'Scala',
  '.kt': 'Kotlin',
  '.swift': 'Swift',
  '.dart': 'Dart',
};

export const FRAMEWORK_KEYWORDS: Readonly<Record<string, string>> = {
  flask: 'Flask',
  django: 'Django',
  fastapi: 'FastAPI',
  typer: 'Typer',
  click: 'Click',
  streamlit: 'Streamlit',
  react: 'React',
  vue: 'Vue',
  angular: 'Angular',
  express: 'Express',
  spring: 'Spring',
  tensorflow: 'TensorFlow',
  pytorch: 'PyTorch',
  pandas: 'Pandas',
  numpy: 'NumPy',
};

const MANIFEST_NAMES = new Set(['requirements.txt', 'pyproject.toml', 'package.json']);
const IMPORT_SCANNED_EXTENSIONS = new Set(['.py', '.js', '.ts']);

interface ProjectTypeRule {
  type: ProjectType;
  tokens: string[];
  fileNames?: string[];
}

/** Evaluated in order; the first rule any file matches wins */
const PROJECT_TYPE_RULES: ProjectTypeRule[] = [
  { type: 'cli', tokens: ['cli'], fileNames: ['main.py', 'main.js'] },
  { type: 'api', tokens: ['api'], fileNames: ['app.py', 'server.js'] },
  { type: 'web_app', tokens: ['web'], fileNames: ['index.html'] },
  { type: 'ml', tokens: ['ml', 'model', 'models'] },
  { type: 'automation', tokens: ['script', 'scripts', 'automation'] },
  { type: 'library', tokens: ['lib', 'libs', 'library'] },
];

const TEST_TOKENS = new Set(['test', 'tests', 'spec', 'specs']);
const CI_TOKENS = new Set(['ci', 'circleci', 'travis', 'jenkinsfile']);

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Lowercase path components split on separators, dots, underscores and dashes.
 * Matching whole tokens keeps "toml" from reading as "ml".
 */
export function pathTokens(path: string): string[] {
  return path.toLowerCase().split(/[/._-]+/).filter(Boolean);
}

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

// ============================================================================
// EXTRACTION
// ============================================================================

export function extractLanguages(files: FileEntry[]): string[] {
  const languages: string[] = [];
  for (const file of files) {
    const language = LANGUAGE_EXTENSIONS[extname(file.path).toLowerCase()];
    if (language) languages.push(language);
  }
  return sortedUnique(languages);
}

/**
 * Frameworks named in a manifest, or imported by a Python/JS/TS source file
 */
export function extractFrameworks(files: FileEntry[]): string[] {
  const frameworks: string[] = [];

  for (const file of files) {
    const name = basename(file.path).toLowerCase();
    const content = file.content.toLowerCase();

    if (MANIFEST_NAMES.has(name)) {
      for (const [keyword, framework] of Object.entries(FRAMEWORK_KEYWORDS)) {
        if (content.includes(keyword)) frameworks.push(framework);
      }
    } else if (IMPORT_SCANNED_EXTENSIONS.has(extname(name))) {
      for (const [keyword, framework] of Object.entries(FRAMEWORK_KEYWORDS)) {
        if (content.includes(`import ${keyword}`) || content.includes(`from ${keyword}`)) {
          frameworks.push(framework);
        }
      }
    }
  }

  return sortedUnique(frameworks);
}

export function inferProjectType(files: FileEntry[]): ProjectType {
  const described = files.map((file) => ({
    tokens: new Set(pathTokens(file.path)),
    fileName: basename(file.path).toLowerCase(),
  }));

  for (const rule of PROJECT_TYPE_RULES) {
    const matches = described.some(
      ({ tokens, fileName }) =>
        rule.tokens.some((token) => tokens.has(token)) || (rule.fileNames?.includes(fileName) ?? false)
    );
    if (matches) return rule.type;
  }

  return 'other';
}

export function detectMaturityIndicators(files: FileEntry[]): MaturityIndicators {
  const indicators: MaturityIndicators = { hasTests: false, hasCi: false, hasDocs: false, hasVersion: false };

  for (const file of files) {
    const lowerPath = file.path.toLowerCase();
    const tokens = pathTokens(lowerPath);
    const fileName = basename(lowerPath);

    if (tokens.some((token) => TEST_TOKENS.has(token))) indicators.hasTests = true;
    if (
      tokens.some((token) => CI_TOKENS.has(token)) ||
      lowerPath.startsWith('.github/') ||
      lowerPath.includes('/.github/')
    ) {
      indicators.hasCi = true;
    }
    if (tokens.some((token) => token.startsWith('doc') || token === 'readme')) indicators.hasDocs = true;
    if (fileName.includes('version') || fileName.includes('changelog')) indicators.hasVersion = true;
  }

  return indicators;
}

/**
 * production needs all four indicators, mvp needs tests and docs
 */
export function maturityFromIndicators(indicators: MaturityIndicators): ProjectStatus {
  const { hasTests, hasCi, hasDocs, hasVersion } = indicators;
  if (hasTests && hasCi && hasDocs && hasVersion) return 'production';
  if (hasTests && hasDocs) return 'mvp';
  return 'prototype';
}

export function inferMaturity(files: FileEntry[]): ProjectStatus {
  return maturityFromIndicators(detectMaturityIndicators(files));
}

/**
 * Activity from the newest commit: under 30 days high, under 90 medium, otherwise low
 */
export function inferActivityLevel(commits: CommitRecord[], now: Date = new Date()): ActivityLevel {
  if (commits.length === 0) return 'low';

  const committed = Date.parse(commits[0].date);
  if (Number.isNaN(committed)) return 'unknown';

  const days = Math.floor((now.getTime() - committed) / DAY_MS);
  if (days < 30) return 'high';
  if (days < 90) return 'medium';
  return 'low';
}

export function extractTechStack(languages: string[], frameworks: string[]): string[] {
  return sortedUnique([...languages, ...frameworks]);
}

/**
 * Extract all technical signals from a repository snapshot
 */
export function extractSignals(snapshot: RepositorySnapshot, now: Date = new Date()): TechnicalSignals {
  const languages = extractLanguages(snapshot.files);
  const frameworks = extractFrameworks(snapshot.files);

  return {
    languages,
    frameworks,
    projectType: inferProjectType(snapshot.files),
    maturity: inferMaturity(snapshot.files),
    activityLevel: inferActivityLevel(snapshot.recentCommits, now),
    techStack: extractTechStack(languages, frameworks),
  };
}
