/**
 * Provisioner - runs the ambry install plan step by step
 *
 * Steps run strictly in order. Only fatal steps can stop a run; failures of
 * the others are logged and the run moves on.
 */

import type { Logger } from 'pino';
import type { CommandResult, CommandRunner } from '../infrastructure/command-executor';
import { CommandError } from '../lib/errors';
import type { ProvisionSettings } from '../config/types';
import { createRunLogger, createTimer } from '../lib/logger';
import { assemblePackageList, type PackageCatalog } from './packages';
import { detectRelease, parseRelease, type OsRelease } from './release';
import {
  buildInstallSteps,
  buildPreparationSteps,
  formatStep,
  type ProvisionStep,
  type StepId,
} from './plan';
import type { Result } from '../types/core';

export interface StepResult {
  id: StepId;
  command: string;
  /** Null when the step never ran */
  exitCode: number | null;
  ok: boolean;
  skipped: boolean;
  durationMs: number;
  stderr?: string;
}

export interface ProvisionOutcome {
  /** Status the process should exit with */
  exitCode: number;
  aborted: boolean;
  release?: OsRelease;
  packages: string[];
  steps: StepResult[];
  failedStep?: StepId;
  error?: string;
}

export interface ProvisionOptions {
  runner: CommandRunner;
  logger: Logger;
  settings: ProvisionSettings;
  catalog: PackageCatalog;
  isDev: boolean;
  /** Release to use instead of asking lsb_release */
  release?: string;
  dryRun?: boolean;
  /** Mirror command output to the terminal */
  passthrough?: boolean;
}

interface FailedStep {
  step: ProvisionStep;
  exitCode: number;
}

interface StepRun {
  results: StepResult[];
  failed?: FailedStep;
}

/**
 * Exit status for a run stopped by a fatal step.
 *
 * Legacy mode keeps what the shell bootstrap this tool replaces reported: it
 * read `$?` after an intervening `[ ... ]` test and `echo`, so a failed
 * package install still exited 0.
 */
export function abortExitCode(failedStatus: number, legacyExitStatus: boolean): number {
  if (legacyExitStatus) {
    return 0;
  }
  // Signals and timeouts come back as -1
  return failedStatus > 0 ? failedStatus : 1;
}

function skippedResult(step: ProvisionStep): StepResult {
  return {
    id: step.id,
    command: formatStep(step),
    exitCode: null,
    ok: false,
    skipped: true,
    durationMs: 0,
  };
}

/**
 * Run one step's command. A runner that rejects with a CommandError, such as an
 * output overflow, counts as a failed step so the step's fatal flag decides.
 */
async function executeStep(step: ProvisionStep, options: ProvisionOptions): Promise<CommandResult> {
  try {
    return await options.runner.execute(step.command, step.args, {
      timeout: options.settings.commandTimeoutMs,
      passthrough: options.passthrough ?? false,
    });
  } catch (error) {
    if (error instanceof CommandError) {
      return { stdout: '', stderr: error.message, exitCode: error.exitCode, timedOut: false };
    }
    throw error;
  }
}

async function runSteps(
  steps: ProvisionStep[],
  options: ProvisionOptions,
  logger: Logger,
): Promise<StepRun> {
  const results: StepResult[] = [];

  for (const [index, step] of steps.entries()) {
    const command = formatStep(step);

    if (options.dryRun) {
      logger.info({ step: step.id, command, fatal: step.fatal }, `[dry-run] ${step.description}`);
      results.push(skippedResult(step));
      continue;
    }

    logger.info({ step: step.id, command }, step.description);
    const timer = createTimer(logger, step.id);
    const result = await executeStep(step, options);
    const ok = result.exitCode === 0 && result.timedOut !== true;

    const durationMs = ok
      ? timer.end({ exitCode: result.exitCode })
      : timer.error(result.stderr || `exit status ${result.exitCode}`, {
          exitCode: result.exitCode,
          timedOut: result.timedOut ?? false,
        });

    results.push({
      id: step.id,
      command,
      exitCode: result.exitCode,
      ok,
      skipped: false,
      durationMs,
      ...(result.stderr ? { stderr: result.stderr } : {}),
    });

    if (ok) {
      continue;
    }

    if (step.fatal) {
      for (const remaining of steps.slice(index + 1)) {
        results.push(skippedResult(remaining));
      }
      return { results, failed: { step, exitCode: result.exitCode } };
    }

    logger.warn(
      { step: step.id, exitCode: result.exitCode },
      `${step.description} failed; continuing`,
    );
  }

  return { results };
}

async function resolveRelease(
  options: ProvisionOptions,
  logger: Logger,
): Promise<Result<OsRelease>> {
  if (options.release !== undefined) {
    return parseRelease(options.release);
  }
  return detectRelease(options.runner, logger, options.settings.releaseCommand);
}

/**
 * Provision the host for ambry
 */
export async function provision(options: ProvisionOptions): Promise<ProvisionOutcome> {
  const logger = createRunLogger(options.logger);
  const { settings } = options;

  logger.info({ dev: options.isDev, dryRun: options.dryRun ?? false }, 'Installing ambry');

  const preparation = await runSteps(buildPreparationSteps(settings), options, logger);
  if (preparation.failed) {
    return abortOutcome(preparation.results, preparation.failed, [], undefined, settings, logger);
  }

  const release = await resolveRelease(options, logger);
  if (!release.ok) {
    logger.error({ error: release.error }, 'Cannot determine OS release');
    return {
      exitCode: 1,
      aborted: true,
      packages: [],
      steps: preparation.results,
      error: release.error,
    };
  }

  const packages = assemblePackageList(release.value, options.catalog);
  logger.debug({ release: release.value.raw, packages }, 'Assembled OS package list');

  const install = await runSteps(
    buildInstallSteps({ packages, isDev: options.isDev, settings }),
    options,
    logger,
  );
  const results = [...preparation.results, ...install.results];

  if (install.failed) {
    return abortOutcome(results, install.failed, packages, release.value, settings, logger);
  }

  logger.info(
    { failures: results.filter((step) => !step.ok && !step.skipped).length },
    options.dryRun ? 'Dry run complete' : 'ambry installation finished',
  );

  return {
    exitCode: 0,
    aborted: false,
    release: release.value,
    packages,
    steps: results,
  };
}

function abortOutcome(
  results: StepResult[],
  failed: FailedStep,
  packages: string[],
  release: OsRelease | undefined,
  settings: ProvisionSettings,
  logger: Logger,
): ProvisionOutcome {
  const exitCode = abortExitCode(failed.exitCode, settings.legacyExitStatus);
  const error =
    failed.step.id === 'install-os-packages'
      ? `Failed to install OS packages: ${packages.join(' ')}`
      : `${failed.step.description} failed with exit status ${failed.exitCode}`;

  logger.error({ step: failed.step.id, failedStatus: failed.exitCode, exitCode }, error);

  return {
    exitCode,
    aborted: true,
    ...(release ? { release } : {}),
    packages,
    steps: results,
    failedStep: failed.step.id,
    error,
  };
}
