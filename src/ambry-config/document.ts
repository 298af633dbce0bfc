/**
 * Read, write and adjust ambry configuration documents
 */

import { readFileSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import * as yaml from 'js-yaml';
import {
  ConfigurationError,
  ErrorCodes,
  ValidationError,
  toError,
} from '../lib/errors';
import { resolveResource } from '../lib/resources';
import { ambryConfigSchema, type AmbryConfig } from './schema';

const HEADER = '# ambry configuration written by ambry-provision\n';

export interface WriteConfigOptions {
  /** Replace an existing file instead of refusing */
  force?: boolean;
}

/**
 * Parse and validate YAML text as an ambry configuration
 */
export function parseAmbryConfig(text: string, source = '<inline>'): AmbryConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text, { filename: source });
  } catch (error) {
    throw new ConfigurationError(
      `Malformed YAML in ${source}: ${toError(error).message}`,
      ErrorCodes.CONFIG_INVALID,
      source,
      toError(error),
    );
  }

  const parsed = ambryConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const violations = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(`Invalid ambry configuration in ${source}`, violations);
  }
  return parsed.data;
}

export function serializeAmbryConfig(config: AmbryConfig): string {
  return (
    HEADER +
    yaml.dump(config, {
      lineWidth: -1,
      noRefs: true,
      sortKeys: false,
    })
  );
}

/**
 * The bundled default configuration
 */
export function loadSampleConfig(): AmbryConfig {
  const path = resolveResource('ambry-config.sample.yaml');
  return parseAmbryConfig(readFileSync(path, 'utf-8'), path);
}

/**
 * Copy of `config` with `filesystem.root` replaced; `{root}` placeholders are left for ambry
 */
export function withFilesystemRoot(config: AmbryConfig, root: string): AmbryConfig {
  return {
    ...config,
    filesystem: { ...config.filesystem, root },
  };
}

/**
 * Names used by one section that are not defined in the section they point at
 */
export function findDanglingReferences(config: AmbryConfig): string[] {
  const problems: string[] = [];
  const databases = new Set(Object.keys(config.database ?? {}));
  const filesystems = new Set(Object.keys(config.filesystem ?? {}));
  const libraries = new Set(Object.keys(config.library ?? {}));

  for (const [name, library] of Object.entries(config.library ?? {})) {
    if (!databases.has(library.database)) {
      problems.push(`library.${name}.database refers to unknown database '${library.database}'`);
    }
    if (!filesystems.has(library.filesystem)) {
      problems.push(
        `library.${name}.filesystem refers to unknown filesystem '${library.filesystem}'`,
      );
    }
  }

  for (const [name, server] of Object.entries(config.servers ?? {})) {
    if (server.library !== undefined && !libraries.has(server.library)) {
      problems.push(`servers.${name}.library refers to unknown library '${server.library}'`);
    }
  }

  return problems;
}

export async function readAmbryConfig(path: string): Promise<AmbryConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read ambry configuration: ${path}`,
      ErrorCodes.CONFIG_NOT_FOUND,
      path,
      toError(error),
    );
  }
  return parseAmbryConfig(text, path);
}

/**
 * Write `config` as YAML, creating parent directories as needed
 */
export async function writeAmbryConfig(
  path: string,
  config: AmbryConfig,
  options: WriteConfigOptions = {},
): Promise<string> {
  await mkdir(dirname(path), { recursive: true });

  try {
    await writeFile(path, serializeAmbryConfig(config), {
      encoding: 'utf-8',
      flag: options.force ? 'w' : 'wx',
    });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new ConfigurationError(
        `Refusing to overwrite existing configuration: ${path} (use --force)`,
        ErrorCodes.CONFIG_EXISTS,
        path,
        error,
      );
    }
    throw error;
  }

  return path;
}
