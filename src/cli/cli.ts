#!/usr/bin/env node
/**
 * ambry-provision CLI
 * Bootstraps a Debian-family host for ambry and writes its default configuration
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { applyOverrides, createSettings, validateSettings } from '../config';
import { DEFAULT_CONFIG_OUTPUT } from '../config/defaults';
import type { ProvisionSettings, SettingsOverrides } from '../config/types';
import { CommandExecutor, type CommandRunner } from '../infrastructure/command-executor';
import {
  ReleaseDetectionError,
  ValidationError,
  isProvisionError,
  toError,
} from '../lib/errors';
import { createLogger } from '../lib/logger';
import { resolvePackageFile } from '../lib/resources';
import {
  assemblePackageList,
  detectRelease,
  isDevMode,
  loadPackageCatalog,
  parseRelease,
  provision,
} from '../provisioning';
import {
  findDanglingReferences,
  loadSampleConfig,
  readAmbryConfig,
  withFilesystemRoot,
  writeAmbryConfig,
} from '../ambry-config';
import { LOG_LEVELS, type LogLevel } from '../types/core';

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  cwd: string;
  createLogger: (level: LogLevel) => Logger;
  createRunner: (logger: Logger) => CommandRunner;
  /** Receives command output meant for stdout, one line per call */
  print: (line: string) => void;
  setExitCode: (code: number) => void;
  /** Mirror child process output to the terminal */
  passthrough: boolean;
}

interface InstallCliOptions {
  release?: string;
  dryRun?: boolean;
  strict?: boolean;
  legacyExitStatus?: boolean;
  logLevel?: LogLevel;
  timeout?: number;
  catalog?: string;
  quiet?: boolean;
}

interface WriteConfigCliOptions {
  output: string;
  root?: string;
  from?: string;
  force?: boolean;
  logLevel?: LogLevel;
}

interface ShowPackagesCliOptions {
  release?: string;
  catalog?: string;
  logLevel?: LogLevel;
}

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(resolvePackageFile('package.json'), 'utf-8'));
  const parsed = packageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : '0.0.0';
}

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a whole number of milliseconds (0 disables)');
  }
  return parsed;
}

function parseReleaseOption(value: string): string {
  const parsed = parseRelease(value);
  if (!parsed.ok) {
    throw new InvalidArgumentError(parsed.error);
  }
  return parsed.value.raw;
}

function catalogPath(deps: CliDependencies, catalog: string | undefined): string | undefined {
  return catalog ? resolve(deps.cwd, catalog) : undefined;
}

function logLevelOption(): Option {
  return new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Environment settings with CLI overrides applied, validated
 */
function resolveSettings(
  deps: CliDependencies,
  overrides: SettingsOverrides,
): { settings: ProvisionSettings; warnings: string[] } {
  const warnings: string[] = [];
  const settings = applyOverrides(createSettings(deps.env, warnings), overrides);
  const validation = validateSettings(settings);

  if (!validation.isValid) {
    throw new ValidationError('Invalid provisioning settings', validation.errors);
  }

  return {
    settings,
    warnings: [
      ...warnings,
      ...validation.warnings.map((warning) => `${warning.path}: ${warning.message}`),
    ],
  };
}

/**
 * Run a command body, logging any failure and mapping it to exit status 1
 */
async function runAction(
  deps: CliDependencies,
  level: LogLevel | undefined,
  body: (logger: Logger) => Promise<number>,
): Promise<void> {
  const fallbackLevel = deps.env.LOG_LEVEL;
  const logger = deps.createLogger(
    level ?? (fallbackLevel !== undefined && isLogLevel(fallbackLevel) ? fallbackLevel : 'info'),
  );

  try {
    deps.setExitCode(await body(logger));
  } catch (error) {
    if (isProvisionError(error)) {
      logger.error({ code: error.code, details: error.details }, error.getUserMessage());
    } else {
      logger.error({ err: toError(error) }, 'Unexpected failure');
    }
    deps.setExitCode(1);
  }
}

export function buildProgram(deps: CliDependencies): Command {
  const program = new Command();

  program
    .name('ambry-provision')
    .description('Provision a Debian-family host for the ambry data library manager')
    .version(readVersion());

  program
    .command('install')
    .description('install OS packages, Python drivers and ambry, then run `ambry config install`')
    .argument('[is_dev]', 'any non-empty value installs ambry in editable mode from its dev branch')
    .option('--release <version>', 'use this OS release instead of asking lsb_release', parseReleaseOption)
    .option('--dry-run', 'log the plan without running any step')
    .option('--strict', 'stop at the first failing step of any kind')
    .option('--legacy-exit-status', 'exit 0 when the OS package install fails, as the old shell bootstrap did')
    .option('--timeout <ms>', 'per-command timeout in milliseconds', parseTimeout)
    .option('--catalog <path>', 'package catalog JSON to use instead of the bundled one')
    .option('--quiet', 'do not mirror command output to the terminal')
    .addOption(logLevelOption())
    .action(async (isDev: string | undefined, options: InstallCliOptions) => {
      await runAction(deps, options.logLevel, async (logger) => {
        const { settings, warnings } = resolveSettings(deps, {
          logLevel: options.logLevel,
          commandTimeoutMs: options.timeout,
          strict: options.strict,
          legacyExitStatus: options.legacyExitStatus,
        });
        for (const warning of warnings) {
          logger.warn(warning);
        }

        const outcome = await provision({
          runner: deps.createRunner(logger),
          logger,
          settings,
          catalog: loadPackageCatalog(catalogPath(deps, options.catalog)),
          isDev: isDevMode(isDev),
          ...(options.release !== undefined ? { release: options.release } : {}),
          dryRun: options.dryRun ?? false,
          passthrough: deps.passthrough && !options.quiet,
        });

        if (options.dryRun) {
          for (const step of outcome.steps) {
            deps.print(step.command);
          }
        }
        return outcome.exitCode;
      });
    });

  program
    .command('write-config')
    .description('write a default ambry configuration file')
    .option('-o, --output <path>', 'destination file', DEFAULT_CONFIG_OUTPUT)
    .option('--root <dir>', 'filesystem root for ambry data')
    .option('--from <path>', 'start from an existing configuration instead of the bundled default')
    .option('--force', 'overwrite an existing file')
    .addOption(logLevelOption())
    .action(async (options: WriteConfigCliOptions) => {
      await runAction(deps, options.logLevel, async (logger) => {
        let config = options.from
          ? await readAmbryConfig(resolve(deps.cwd, options.from))
          : loadSampleConfig();
        if (options.root) {
          config = withFilesystemRoot(config, resolve(deps.cwd, options.root));
        }

        for (const problem of findDanglingReferences(config)) {
          logger.warn(problem);
        }

        const written = await writeAmbryConfig(resolve(deps.cwd, options.output), config, {
          force: options.force ?? false,
        });
        logger.info({ path: written }, 'Wrote ambry configuration');
        deps.print(written);
        return 0;
      });
    });

  program
    .command('show-packages')
    .description('print the OS packages that would be installed')
    .option('--release <version>', 'use this OS release instead of asking lsb_release', parseReleaseOption)
    .option('--catalog <path>', 'package catalog JSON to use instead of the bundled one')
    .addOption(logLevelOption())
    .action(async (options: ShowPackagesCliOptions) => {
      await runAction(deps, options.logLevel, async (logger) => {
        const catalog = loadPackageCatalog(catalogPath(deps, options.catalog));
        const release =
          options.release !== undefined
            ? parseRelease(options.release)
            : await detectRelease(
                deps.createRunner(logger),
                logger,
                resolveSettings(deps, {}).settings.releaseCommand,
              );

        if (!release.ok) {
          throw new ReleaseDetectionError(release.error);
        }

        for (const name of assemblePackageList(release.value, catalog)) {
          deps.print(name);
        }
        return 0;
      });
    });

  return program;
}

export function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    cwd: process.cwd(),
    createLogger: (level) => createLogger({ level }),
    createRunner: (logger) => new CommandExecutor(logger),
    print: (line) => process.stdout.write(`${line}\n`),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    passthrough: true,
  };
}

if (require.main === module) {
  buildProgram(defaultDependencies())
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.stderr.write(`${toError(error).message}\n`);
      process.exitCode = 1;
    });
}
