/**
 * Settings validation
 */

import { z } from 'zod';
import type { ProvisionSettings, SettingsIssue, SettingsValidationResult } from './types';
import { LOG_LEVELS } from '../types/core';

const commandName = z
  .string()
  .min(1, 'Must not be empty')
  .regex(/^\S+$/, 'Must be a single executable name or path');

export const provisionSettingsSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  aptCommand: commandName,
  pipCommand: commandName,
  localeGenCommand: commandName,
  releaseCommand: commandName,
  ambryCommand: commandName,
  locale: z.string().regex(/^[A-Za-z]{1,3}(_[A-Z]{2})?(\.[\w-]+)?$/, 'Must look like en_US.UTF-8'),
  ambryRepository: z.string().min(1, 'Must not be empty'),
  ambryDevBranch: z.string().regex(/^[\w./-]+$/, 'Must be a branch name'),
  pysqliteSource: z.string().min(1, 'Must not be empty'),
  commandTimeoutMs: z.number().int('Must be an integer').min(0, 'Must be 0 or greater'),
  strict: z.boolean(),
  legacyExitStatus: z.boolean(),
}) satisfies z.ZodType<ProvisionSettings>;

/**
 * Validate provisioning settings
 */
export function validateSettings(settings: ProvisionSettings): SettingsValidationResult {
  const warnings: SettingsIssue[] = [];
  const parsed = provisionSettingsSchema.safeParse(settings);

  const errors: SettingsIssue[] = parsed.success
    ? []
    : parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message:
          issue.path[0] === 'logLevel' ? `Must be one of ${LOG_LEVELS.join(', ')}` : issue.message,
      }));

  if (!/^(https?|git|ssh):\/\//.test(settings.ambryRepository)) {
    warnings.push({
      path: 'ambryRepository',
      message: 'Not a URL; pip will treat it as a local path',
    });
  }

  if (settings.commandTimeoutMs > 0 && settings.commandTimeoutMs < 60000) {
    warnings.push({
      path: 'commandTimeoutMs',
      message: 'Package installs commonly take longer than a minute',
    });
  }

  if (settings.legacyExitStatus && settings.strict) {
    warnings.push({
      path: 'legacyExitStatus',
      message: 'Strict mode aborts with exit status 0 when legacy exit status is enabled',
    });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
