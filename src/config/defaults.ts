/**
 * Centralized Configuration Defaults
 */

export const DEFAULT_COMMANDS = {
  apt: 'apt-get',
  pip: 'pip',
  localeGen: 'locale-gen',
  release: 'lsb_release',
  ambry: 'ambry',
} as const;

export const DEFAULT_SOURCES = {
  ambryRepository: 'https://github.com/CivicKnowledge/ambry.git',
  ambryDevBranch: 'develop',
  // Patched driver that lets SQLAlchemy load the spatialite extension
  pysqlite: 'git+https://github.com/clarinova/pysqlite.git#egg=pysqlite',
} as const;

export const DEFAULT_LOCALE = 'en_US.UTF-8';

/**
 * Package installs routinely run for many minutes, so no timeout by default
 */
export const DEFAULT_COMMAND_TIMEOUT_MS = 0;

export const DEFAULT_CONFIG_OUTPUT = 'ambry.yaml';
