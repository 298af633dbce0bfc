/**
 * Provisioning settings with environment overrides
 */

import type { ProvisionSettings, SettingsOverrides } from './types';
import {
  DEFAULT_COMMANDS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_LOCALE,
  DEFAULT_SOURCES,
} from './defaults';
import { LOG_LEVELS, type LogLevel } from '../types/core';

/**
 * Create default settings
 */
function createDefaultSettings(): ProvisionSettings {
  return {
    logLevel: 'info',
    aptCommand: DEFAULT_COMMANDS.apt,
    pipCommand: DEFAULT_COMMANDS.pip,
    localeGenCommand: DEFAULT_COMMANDS.localeGen,
    releaseCommand: DEFAULT_COMMANDS.release,
    ambryCommand: DEFAULT_COMMANDS.ambry,
    locale: DEFAULT_LOCALE,
    ambryRepository: DEFAULT_SOURCES.ambryRepository,
    ambryDevBranch: DEFAULT_SOURCES.ambryDevBranch,
    pysqliteSource: DEFAULT_SOURCES.pysqlite,
    commandTimeoutMs: DEFAULT_COMMAND_TIMEOUT_MS,
    strict: false,
    legacyExitStatus: false,
  };
}

/**
 * Parse integer with fallback; unparseable values are reported through `warnings`
 */
function parseIntWithFallback(
  value: string | undefined,
  fallback: number,
  varName: string,
  warnings: string[],
): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    warnings.push(`Invalid ${varName}: ${value}. Using default: ${fallback}`);
    return fallback;
  }
  return parsed;
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function parseBooleanFlag(
  value: string | undefined,
  fallback: boolean,
  varName: string,
  warnings: string[],
): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  warnings.push(`Invalid ${varName}: ${value}. Using default: ${fallback}`);
  return fallback;
}

function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel,
  warnings: string[],
): LogLevel {
  if (!value) return fallback;
  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    warnings.push(`Invalid LOG_LEVEL: ${value}. Using default: ${fallback}`);
    return fallback;
  }
  return level;
}

/**
 * Create settings from environment variables layered over the defaults
 * @param env - environment to read, `process.env` by default
 * @param warnings - collects messages about ignored values
 */
function createSettings(
  env: NodeJS.ProcessEnv = process.env,
  warnings: string[] = [],
): ProvisionSettings {
  const defaults = createDefaultSettings();

  return {
    ...defaults,
    logLevel: parseLogLevel(env.LOG_LEVEL, defaults.logLevel, warnings),
    aptCommand: env.PROVISION_APT_COMMAND || defaults.aptCommand,
    pipCommand: env.PROVISION_PIP_COMMAND || defaults.pipCommand,
    ambryCommand: env.AMBRY_COMMAND || defaults.ambryCommand,
    locale: env.PROVISION_LOCALE || defaults.locale,
    ambryRepository: env.AMBRY_REPOSITORY || defaults.ambryRepository,
    ambryDevBranch: env.AMBRY_DEV_BRANCH || defaults.ambryDevBranch,
    pysqliteSource: env.PYSQLITE_SOURCE || defaults.pysqliteSource,
    commandTimeoutMs: parseIntWithFallback(
      env.PROVISION_COMMAND_TIMEOUT,
      defaults.commandTimeoutMs,
      'PROVISION_COMMAND_TIMEOUT',
      warnings,
    ),
    strict: parseBooleanFlag(env.PROVISION_STRICT, defaults.strict, 'PROVISION_STRICT', warnings),
    legacyExitStatus: parseBooleanFlag(
      env.PROVISION_LEGACY_EXIT_STATUS,
      defaults.legacyExitStatus,
      'PROVISION_LEGACY_EXIT_STATUS',
      warnings,
    ),
  };
}

/**
 * Apply command-line overrides; undefined values leave the setting alone
 */
function applyOverrides(
  settings: ProvisionSettings,
  overrides: SettingsOverrides,
): ProvisionSettings {
  const merged = { ...settings };
  if (overrides.logLevel !== undefined) merged.logLevel = overrides.logLevel;
  if (overrides.commandTimeoutMs !== undefined) merged.commandTimeoutMs = overrides.commandTimeoutMs;
  if (overrides.strict !== undefined) merged.strict = overrides.strict;
  if (overrides.legacyExitStatus !== undefined) merged.legacyExitStatus = overrides.legacyExitStatus;
  return merged;
}

export { createDefaultSettings, createSettings, applyOverrides };
