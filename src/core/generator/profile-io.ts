/**
 * Profile serialization
 *
 * The on-disk document is YAML with snake_case keys. Loading re-validates
 * every field before handing back a ProjectProfile.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import logger from '../../utils/logger.js';
import { errors, errorMessage } from '../../utils/errors.js';
import { isRecord, isStringArray, type JsonRecord } from '../../utils/json-fields.js';
import {
  PROJECT_STATUSES,
  PROJECT_TYPES,
  type ProjectProfile,
  type ProjectStatus,
  type ProjectType,
  type ValidationResult,
} from '../../types/index.js';

// ============================================================================
// MAPPING
// ============================================================================

const REQUIRED_TEXT_FIELDS = [
  'project_name',
  'one_liner',
  'problem',
  'solution',
  'value_proposition',
  'target_users',
  'current_focus',
  'future_plans',
] as const;

const LIST_FIELDS = ['tech_stack', 'key_features'] as const;

const KNOWN_FIELDS = new Set<string>([
  ...REQUIRED_TEXT_FIELDS,
  ...LIST_FIELDS,
  'project_type',
  'status',
  'risks_or_gaps',
  'metadata',
]);

/**
 * Snake_case document in the field order written to disk
 */
export function toDocument(profile: ProjectProfile): JsonRecord {
  return {
    project_name: profile.projectName,
    one_liner: profile.oneLiner,
    problem: profile.problem,
    solution: profile.solution,
    value_proposition: profile.valueProposition,
    tech_stack: profile.techStack,
    project_type: profile.projectType,
    status: profile.status,
    key_features: profile.keyFeatures,
    target_users: profile.targetUsers,
    current_focus: profile.currentFocus,
    future_plans: profile.futurePlans,
    risks_or_gaps: profile.risksOrGaps,
    metadata: {
      version: profile.metadata.version,
      generated_at: profile.metadata.generatedAt,
    },
  };
}

export function serializeProfile(profile: ProjectProfile): string {
  return stringifyYaml(toDocument(profile), { lineWidth: 100 });
}

// ============================================================================
// VALIDATION
// ============================================================================

function isProjectType(value: unknown): value is ProjectType {
  return PROJECT_TYPES.some((type) => type === value);
}

function isProjectStatus(value: unknown): value is ProjectStatus {
  return PROJECT_STATUSES.some((status) => status === value);
}

/**
 * Check a parsed document for required fields and known enumeration values
 */
export function validateProfileData(data: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(data)) {
    errors.push('Profile must be a mapping');
    return { valid: false, errors, warnings };
  }

  for (const field of REQUIRED_TEXT_FIELDS) {
    if (data[field] === undefined || data[field] === null) {
      errors.push(`Missing required field: ${field}`);
    } else if (typeof data[field] !== 'string') {
      errors.push(`${field} must be a string`);
    }
  }

  for (const field of LIST_FIELDS) {
    if (data[field] !== undefined && !isStringArray(data[field])) {
      errors.push(`${field} must be a list of strings`);
    }
  }

  if (data.project_type === undefined) {
    errors.push('Missing required field: project_type');
  } else if (!isProjectType(data.project_type)) {
    errors.push(`Unknown project_type: ${String(data.project_type)} (expected one of ${PROJECT_TYPES.join(', ')})`);
  }

  if (data.status === undefined) {
    errors.push('Missing required field: status');
  } else if (!isProjectStatus(data.status)) {
    errors.push(`Unknown status: ${String(data.status)} (expected one of ${PROJECT_STATUSES.join(', ')})`);
  }

  const risks = data.risks_or_gaps;
  if (risks !== undefined && risks !== null && typeof risks !== 'string') {
    errors.push('risks_or_gaps must be a string or null');
  }

  if (!isRecord(data.metadata)) {
    errors.push('Missing required field: metadata');
  } else {
    if (typeof data.metadata.version !== 'string') {
      errors.push('metadata.version must be a string');
    }
    if (typeof data.metadata.generated_at !== 'string') {
      errors.push('metadata.generated_at must be a string');
    } else if (Number.isNaN(Date.parse(data.metadata.generated_at))) {
      warnings.push('metadata.generated_at is not a valid timestamp');
    }
  }

  if (isStringArray(data.key_features) && data.key_features.length === 0) {
    warnings.push('key_features is empty');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_FIELDS.has(key)) {
      warnings.push(`Unknown field: ${key}`);
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

function text(data: JsonRecord, key: string): string {
  const value = data[key];
  return typeof value === 'string' ? value : '';
}

function list(data: JsonRecord, key: string): string[] {
  const value = data[key];
  return isStringArray(value) ? [...value] : [];
}

// ============================================================================
// PARSE / LOAD / SAVE
// ============================================================================

export interface ParsedProfile {
  profile: ProjectProfile;
  warnings: string[];
}

/**
 * Parse and validate YAML text, keeping the validation warnings.
 * `source` names the document in errors.
 */
export function parseProfileWithWarnings(content: string, source = '<input>'): ParsedProfile {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw errors.documentValidationFailed(source, [`invalid YAML: ${errorMessage(error)}`]);
  }

  const result = validateProfileData(data);
  if (!result.valid || !isRecord(data) || !isRecord(data.metadata)) {
    throw errors.documentValidationFailed(source, result.errors);
  }

  const projectType = data.project_type;
  const status = data.status;
  if (!isProjectType(projectType) || !isProjectStatus(status)) {
    throw errors.documentValidationFailed(source, result.errors);
  }

  const risks = data.risks_or_gaps;

  const profile: ProjectProfile = {
    projectName: text(data, 'project_name'),
    oneLiner: text(data, 'one_liner'),
    problem: text(data, 'problem'),
    solution: text(data, 'solution'),
    valueProposition: text(data, 'value_proposition'),
    techStack: list(data, 'tech_stack'),
    projectType,
    status,
    keyFeatures: list(data, 'key_features'),
    targetUsers: text(data, 'target_users'),
    currentFocus: text(data, 'current_focus'),
    futurePlans: text(data, 'future_plans'),
    risksOrGaps: typeof risks === 'string' ? risks : null,
    metadata: {
      version: text(data.metadata, 'version'),
      generatedAt: text(data.metadata, 'generated_at'),
    },
  };

  return { profile, warnings: result.warnings };
}

/**
 * Parse and validate YAML text
 */
export function parseProfile(content: string, source = '<input>'): ProjectProfile {
  const { profile, warnings } = parseProfileWithWarnings(content, source);
  for (const warning of warnings) {
    logger.debug(`${source}: ${warning}`);
  }
  return profile;
}

/**
 * Write the profile, creating parent directories
 */
export async function saveProfile(profile: ProjectProfile, outputPath: string): Promise<string> {
  const fullPath = resolve(outputPath);
  try {
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, serializeProfile(profile), 'utf-8');
  } catch (error) {
    throw errors.fileWriteError(fullPath, errorMessage(error));
  }
  logger.debug(`Profile written to ${fullPath}`);
  return fullPath;
}

/**
 * Read and validate a profile from disk, keeping the validation warnings
 */
export async function readProfile(filePath: string): Promise<ParsedProfile> {
  const fullPath = resolve(filePath);
  let content: string;
  try {
    content = await readFile(fullPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw errors.documentNotFound(fullPath);
    }
    throw errors.documentValidationFailed(fullPath, [errorMessage(error)]);
  }
  return parseProfileWithWarnings(content, fullPath);
}

/**
 * Read and validate a profile from disk
 */
export async function loadProfile(filePath: string): Promise<ProjectProfile> {
  const { profile, warnings } = await readProfile(filePath);
  for (const warning of warnings) {
    logger.debug(`${filePath}: ${warning}`);
  }
  return profile;
}
