/**
 * ambry-provision public API
 */

export * from './provisioning';
export * from './ambry-config';
export * from './config';
export { CommandExecutor, COMMAND_NOT_FOUND_EXIT_CODE } from './infrastructure/command-executor';
export type { CommandRunner, CommandOptions, CommandResult } from './infrastructure/command-executor';
export { createLogger, createTimer } from './lib/logger';
export * from './lib/errors';
export { Success, Failure, isOk, isFail, type Result, type LogLevel } from './types/core';
export { buildProgram, defaultDependencies, type CliDependencies } from './cli/cli';
