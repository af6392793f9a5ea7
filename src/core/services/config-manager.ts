/**
 * Configuration management service
 *
 * Reads .repo-profiler/config.json and resolves it against the
 * environment and command-line flags into one explicit object.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { errors } from '../../utils/errors.js';
import { isRecord, type JsonRecord } from '../../utils/json-fields.js';
import { DEFAULT_LOCAL_BASE_URL } from './llm-service.js';
import { DEFAULT_GITHUB_API_URL } from '../github/github-client.js';
import type { GenerateOptions, ProfilerConfigFile, ResolvedConfig } from '../../types/index.js';

export const CONFIG_DIR = '.repo-profiler';
export const DEFAULT_CONFIG_PATH = join(CONFIG_DIR, 'config.json');
export const DEFAULT_OUTPUT_FILE = 'project-profile.yaml';

/**
 * Environment variables that feed the resolved configuration
 */
export interface ProfilerEnv {
  GITHUB_TOKEN?: string;
  OPENAI_API_KEY?: string;
  ANTHROPIC_API_KEY?: string;
  OPENAI_API_BASE?: string;
  ANTHROPIC_API_BASE?: string;
  LOCAL_LLM_BASE_URL?: string;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  reasoning: {
    provider: 'auto',
    model: null,
    credentials: {},
    openaiBaseUrl: null,
    anthropicBaseUrl: null,
    localBaseUrl: DEFAULT_LOCAL_BASE_URL,
    timeoutMs: 60000,
  },
  github: {
    token: null,
    apiBaseUrl: DEFAULT_GITHUB_API_URL,
  },
  output: {
    fileName: DEFAULT_OUTPUT_FILE,
  },
  walker: {
    maxFileSize: 1024 * 1024,
    maxFiles: 5000,
  },
};

// ============================================================================
// FILE VALIDATION
// ============================================================================

type FieldKind = 'string' | 'nullable-string' | 'positive-number';

const SECTION_FIELDS: Record<keyof ProfilerConfigFile, Record<string, FieldKind>> = {
  reasoning: { provider: 'string', model: 'nullable-string', localBaseUrl: 'string', timeoutMs: 'positive-number' },
  github: { apiBaseUrl: 'string' },
  output: { fileName: 'string' },
  walker: { maxFileSize: 'positive-number', maxFiles: 'positive-number' },
};

function isSectionName(key: string): key is keyof ProfilerConfigFile {
  return key in SECTION_FIELDS;
}

function matchesKind(value: unknown, kind: FieldKind): boolean {
  switch (kind) {
    case 'string':
      return typeof value === 'string';
    case 'nullable-string':
      return value === null || typeof value === 'string';
    case 'positive-number':
      return typeof value === 'number' && Number.isFinite(value) && value > 0;
  }
}

/**
 * List the problems with a parsed config value; unknown keys are ignored
 */
export function validateConfigFile(value: unknown): string[] {
  if (!isRecord(value)) {
    return ['configuration must be a JSON object'];
  }

  const problems: string[] = [];
  for (const [section, body] of Object.entries(value)) {
    if (!isSectionName(section)) continue;
    if (!isRecord(body)) {
      problems.push(`"${section}" must be an object`);
      continue;
    }
    for (const [field, kind] of Object.entries(SECTION_FIELDS[section])) {
      if (field in body && !matchesKind(body[field], kind)) {
        problems.push(`"${section}.${field}" must be ${kind === 'positive-number' ? 'a positive number' : kind === 'nullable-string' ? 'a string or null' : 'a string'}`);
      }
    }
  }
  return problems;
}

function section(value: JsonRecord, key: string): JsonRecord {
  const body = value[key];
  return isRecord(body) ? body : {};
}

function optionalString(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(record: JsonRecord, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

function toConfigFile(value: JsonRecord): ProfilerConfigFile {
  const reasoning = section(value, 'reasoning');
  const model = reasoning.model;
  return {
    reasoning: {
      provider: optionalString(reasoning, 'provider'),
      model: model === null ? null : typeof model === 'string' ? model : undefined,
      localBaseUrl: optionalString(reasoning, 'localBaseUrl'),
      timeoutMs: optionalNumber(reasoning, 'timeoutMs'),
    },
    github: { apiBaseUrl: optionalString(section(value, 'github'), 'apiBaseUrl') },
    output: { fileName: optionalString(section(value, 'output'), 'fileName') },
    walker: {
      maxFileSize: optionalNumber(section(value, 'walker'), 'maxFileSize'),
      maxFiles: optionalNumber(section(value, 'walker'), 'maxFiles'),
    },
  };
}

// ============================================================================
// READ / RESOLVE
// ============================================================================

/**
 * Read a config file. A missing file yields an empty config;
 * malformed JSON or wrongly-typed fields throw INVALID_CONFIG.
 */
export async function readConfigFile(configPath: string = DEFAULT_CONFIG_PATH): Promise<ProfilerConfigFile> {
  const fullPath = resolve(configPath);

  let content: string;
  try {
    content = await readFile(fullPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw errors.invalidConfig(fullPath, error instanceof Error ? error.message : String(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw errors.invalidConfig(fullPath, error instanceof Error ? error.message : 'malformed JSON');
  }

  const problems = validateConfigFile(parsed);
  if (problems.length > 0 || !isRecord(parsed)) {
    throw errors.invalidConfig(fullPath, problems.join('; '));
  }

  return toConfigFile(parsed);
}

function firstSet(...values: (string | null | undefined)[]): string | undefined {
  for (const value of values) {
    if (value) return value;
  }
  return undefined;
}

/**
 * Combine file, environment and CLI settings. CLI > environment > file > defaults.
 */
export function resolveConfig(
  fileConfig: ProfilerConfigFile = {},
  env: ProfilerEnv = {},
  cliOptions: GenerateOptions = {}
): ResolvedConfig {
  const fileReasoning = fileConfig.reasoning ?? {};
  const defaults = DEFAULT_CONFIG;

  const openaiApiKey = firstSet(cliOptions.openaiKey, env.OPENAI_API_KEY);
  const anthropicApiKey = firstSet(cliOptions.anthropicKey, env.ANTHROPIC_API_KEY);

  return {
    reasoning: {
      provider: firstSet(cliOptions.aiProvider, fileReasoning.provider) ?? defaults.reasoning.provider,
      model: firstSet(cliOptions.aiModel, fileReasoning.model) ?? defaults.reasoning.model,
      credentials: {
        ...(openaiApiKey ? { openaiApiKey } : {}),
        ...(anthropicApiKey ? { anthropicApiKey } : {}),
      },
      openaiBaseUrl: firstSet(env.OPENAI_API_BASE) ?? null,
      anthropicBaseUrl: firstSet(env.ANTHROPIC_API_BASE) ?? null,
      localBaseUrl:
        firstSet(env.LOCAL_LLM_BASE_URL, fileReasoning.localBaseUrl) ?? defaults.reasoning.localBaseUrl,
      timeoutMs: fileReasoning.timeoutMs ?? defaults.reasoning.timeoutMs,
    },
    github: {
      token: firstSet(cliOptions.githubToken, env.GITHUB_TOKEN) ?? null,
      apiBaseUrl: firstSet(fileConfig.github?.apiBaseUrl) ?? defaults.github.apiBaseUrl,
    },
    output: {
      fileName: firstSet(fileConfig.output?.fileName) ?? defaults.output.fileName,
    },
    walker: {
      maxFileSize: fileConfig.walker?.maxFileSize ?? defaults.walker.maxFileSize,
      maxFiles: fileConfig.walker?.maxFiles ?? defaults.walker.maxFiles,
    },
  };
}

/**
 * Pick the profiler's variables out of a process environment
 */
export function profilerEnv(source: NodeJS.ProcessEnv = process.env): ProfilerEnv {
  return {
    GITHUB_TOKEN: source.GITHUB_TOKEN,
    OPENAI_API_KEY: source.OPENAI_API_KEY,
    ANTHROPIC_API_KEY: source.ANTHROPIC_API_KEY,
    OPENAI_API_BASE: source.OPENAI_API_BASE,
    ANTHROPIC_API_BASE: source.ANTHROPIC_API_BASE,
    LOCAL_LLM_BASE_URL: source.LOCAL_LLM_BASE_URL,
  };
}

/**
 * Read the config file and resolve it for a command invocation
 */
export async function loadConfig(configPath: string, cliOptions: GenerateOptions = {}): Promise<ResolvedConfig> {
  return resolveConfig(await readConfigFile(configPath), profilerEnv(), cliOptions);
}
