/**
 * repo-profiler validate command
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { readProfile, type ParsedProfile } from '../../core/generator/profile-io.js';
import { reportCommandError } from '../shared.js';

export async function runValidate(file: string): Promise<ParsedProfile> {
  const parsed = await readProfile(file);
  const { profile, warnings } = parsed;

  logger.success(`${file} is a valid project profile`);
  logger.info('Project', profile.projectName);
  logger.info('Type', profile.projectType);
  logger.info('Status', profile.status);
  logger.info('Generated', profile.metadata.generatedAt);
  for (const warning of warnings) {
    logger.warning(warning);
  }
  return parsed;
}

export const validateCommand = new Command('validate')
  .description('Check that a project profile file is well formed')
  .argument('<file>', 'Path to a project-profile.yaml')
  .action(async (file: string) => {
    try {
      await runValidate(file);
    } catch (error) {
      reportCommandError(error);
    }
  });
