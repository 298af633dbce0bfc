/**
 * OS package selection
 *
 * The spatialite shared library ships under different package names across
 * releases, so the install list is the base catalog plus a release-dependent
 * variant.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, ErrorCodes, toError } from '../lib/errors';
import { resolveResource } from '../lib/resources';
import { toReleaseNumber, type OsRelease } from './release';

const packageName = z.string().regex(/^[a-z0-9][a-z0-9+.-]*$/, 'Must be a Debian package name');

export const packageCatalogSchema = z.object({
  base: z.array(packageName).min(1),
  spatialite: z.object({
    threshold: z
      .string()
      .refine((value) => toReleaseNumber(value) !== undefined, 'Must be a release such as 14.04'),
    above: z.array(packageName).min(1),
    atOrBelow: z.array(packageName).min(1),
  }),
});

export type PackageCatalog = z.infer<typeof packageCatalogSchema>;

export type SpatialiteVariant = 'above' | 'atOrBelow';

/**
 * Load and validate the package catalog, the bundled packages.json by default
 */
export function loadPackageCatalog(path: string = resolveResource('packages.json')): PackageCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read package catalog: ${toError(error).message}`,
      ErrorCodes.CONFIG_INVALID,
      path,
      toError(error),
    );
  }

  const parsed = packageCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid package catalog: ${issues}`, ErrorCodes.CONFIG_INVALID, path);
  }
  return parsed.data;
}

export function selectSpatialiteVariant(release: OsRelease, catalog: PackageCatalog): SpatialiteVariant {
  // Validated by the schema, so a missing number only happens for hand-built catalogs
  const threshold = toReleaseNumber(catalog.spatialite.threshold) ?? Number.POSITIVE_INFINITY;
  return release.numeric > threshold ? 'above' : 'atOrBelow';
}

export function selectSpatialitePackages(release: OsRelease, catalog: PackageCatalog): string[] {
  return [...catalog.spatialite[selectSpatialiteVariant(release, catalog)]];
}

/**
 * Base packages followed by the release variant, first occurrence wins
 */
export function assemblePackageList(release: OsRelease, catalog: PackageCatalog): string[] {
  return [...new Set([...catalog.base, ...selectSpatialitePackages(release, catalog)])];
}
