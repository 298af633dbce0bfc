/**
 * Locate files shipped at the package root, such as resources/ and package.json
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigurationError, ErrorCodes } from './errors';

// src/lib -> root when run from sources, dist/src/lib -> root when built
const PACKAGE_ROOTS = [join(__dirname, '../..'), join(__dirname, '../../..')];

export function resolvePackageFile(relativePath: string): string {
  for (const root of PACKAGE_ROOTS) {
    const candidate = join(root, relativePath);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  throw new ConfigurationError(
    `Bundled file not found: ${relativePath}`,
    ErrorCodes.RESOURCE_NOT_FOUND,
    relativePath,
  );
}

export function resolveResource(name: string): string {
  return resolvePackageFile(join('resources', name));
}
