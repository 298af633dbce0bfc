/**
 * OS release detection and parsing
 */

import type { Logger } from 'pino';
import type { CommandRunner } from '../infrastructure/command-executor';
import { Failure, Success, type Result } from '../types/core';

export interface OsRelease {
  /** Release as reported, e.g. `16.04` */
  raw: string;
  /** Release with the dots removed, e.g. `1604` */
  numeric: number;
}

const RELEASE_PATTERN = /^\d+(\.\d+)*$/;

/**
 * Numeric form of a release string: every `.` removed, read as an integer.
 * Undefined for anything that is not `digits(.digits)*`.
 */
export function toReleaseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (!RELEASE_PATTERN.test(trimmed)) {
    return undefined;
  }
  return parseInt(trimmed.replace(/\./g, ''), 10);
}

export function parseRelease(raw: string): Result<OsRelease> {
  const numeric = toReleaseNumber(raw);
  if (numeric === undefined) {
    return Failure(`Unrecognized OS release: '${raw.trim()}'`);
  }
  return Success({ raw: raw.trim(), numeric });
}

/**
 * Ask `lsb_release -r -s` for the host's release
 */
export async function detectRelease(
  runner: CommandRunner,
  logger: Logger,
  command = 'lsb_release',
): Promise<Result<OsRelease>> {
  const result = await runner.execute(command, ['-r', '-s']);

  if (result.exitCode !== 0) {
    return Failure(
      `${command} exited with status ${result.exitCode}${result.stderr ? `: ${result.stderr}` : ''}`,
    );
  }

  const parsed = parseRelease(result.stdout);
  if (parsed.ok) {
    logger.info({ release: parsed.value.raw }, 'Detected OS release');
  }
  return parsed;
}
