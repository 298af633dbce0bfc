/**
 * Provisioning settings types
 */

import type { LogLevel } from '../types/core';

export interface ProvisionSettings {
  logLevel: LogLevel;
  /** OS package manager binary, `apt-get` on Debian-family hosts */
  aptCommand: string;
  pipCommand: string;
  localeGenCommand: string;
  releaseCommand: string;
  ambryCommand: string;
  locale: string;
  ambryRepository: string;
  ambryDevBranch: string;
  pysqliteSource: string;
  commandTimeoutMs: number;
  strict: boolean;
  legacyExitStatus: boolean;
}

/**
 * Values the CLI may override on top of environment settings
 */
export type SettingsOverrides = Partial<
  Pick<ProvisionSettings, 'logLevel' | 'commandTimeoutMs' | 'strict' | 'legacyExitStatus'>
>;

export interface SettingsIssue {
  path: string;
  message: string;
}

export interface SettingsValidationResult {
  isValid: boolean;
  errors: SettingsIssue[];
  warnings: SettingsIssue[];
}
