/**
 * Command Executor - runs package managers and other host commands
 */

import { spawn, SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { CommandError, ErrorCodes } from '../lib/errors';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the child is terminated; 0 disables the timeout */
  timeout?: number;
  /** Bytes of stdout to collect before the command is killed */
  maxBuffer?: number;
  /** Mirror the child's output to this process's stdout/stderr while collecting it */
  passthrough?: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut?: boolean;
}

/**
 * What the provisioner needs from a command runner
 */
export interface CommandRunner {
  execute(command: string, args?: string[], options?: CommandOptions): Promise<CommandResult>;
}

/** Shell status for a command that could not be found or started */
export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export class CommandExecutor implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  /**
   * Execute a command with arguments
   */
  async execute(
    command: string,
    args: string[] = [],
    options: CommandOptions = {},
  ): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 0,
      maxBuffer = 64 * 1024 * 1024, // 64MB
      passthrough = false,
    } = options;

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      // Raw chunks, decoded once on close so multibyte characters split across chunks survive
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let stdoutBytes = 0;
      let stderrBytes = 0;
      let timedOut = false;
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const spawnOptions: SpawnOptions = {
        cwd,
        env,
        shell: false,
      };

      const child = spawn(command, args, spawnOptions);

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          setTimeout(() => {
            if (child.exitCode === null) {
              child.kill('SIGKILL');
            }
          }, 5000).unref();
        }, timeout);
      }

      child.stdout?.on('data', (data: Buffer) => {
        if (passthrough) {
          process.stdout.write(data);
        }
        if (stdoutBytes + data.length <= maxBuffer) {
          stdoutChunks.push(data);
          stdoutBytes += data.length;
        } else if (!settled) {
          settled = true;
          child.kill('SIGTERM');
          reject(
            new CommandError(
              `Command output exceeded maximum buffer size of ${maxBuffer} bytes`,
              command,
              -1,
              ErrorCodes.OUTPUT_LIMIT_EXCEEDED,
            ),
          );
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        if (passthrough) {
          process.stderr.write(data);
        }
        if (stderrBytes + data.length <= maxBuffer) {
          stderrChunks.push(data);
          stderrBytes += data.length;
        }
      });

      child.on('close', (code: number | null) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        if (settled) return;
        settled = true;

        const exitCode = code ?? -1;

        this.logger.debug({ command, exitCode, timedOut }, 'Command completed');

        resolve({
          stdout: Buffer.concat(stdoutChunks).toString('utf-8').trim(),
          stderr: Buffer.concat(stderrChunks).toString('utf-8').trim(),
          exitCode,
          timedOut,
        });
      });

      // A missing binary surfaces here rather than as an exit status
      child.on('error', (error: Error) => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        if (settled) return;
        settled = true;

        this.logger.error({ command, error: error.message }, 'Command execution failed');

        resolve({
          stdout: '',
          stderr: error.message,
          exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
          timedOut: false,
        });
      });
    });
  }
}
