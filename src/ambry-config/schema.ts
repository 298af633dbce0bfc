/**
 * Shape of the ambry configuration file
 *
 * Only the documented key groups are typed. Everything else is passed
 * through untouched because ambry itself is the consumer.
 */

import { z } from 'zod';

const port = z.number().int().min(1).max(65535);

export const databaseSchema = z
  .object({
    driver: z.string().min(1),
    dbname: z.string().min(1),
    server: z.string().optional(),
    port: port.optional(),
    username: z.string().optional(),
    password: z.string().optional(),
  })
  .passthrough();

/** `root` plus named directories; other values may use the `{root}` placeholder */
export const filesystemSchema = z.object({ root: z.string().min(1) }).catchall(z.string());

export const librarySchema = z
  .object({
    database: z.string().min(1),
    filesystem: z.string().min(1),
    remotes: z.array(z.string()).optional(),
  })
  .passthrough();

/** A bare DSN such as `sqlite:////tmp/w.db`, or a described warehouse */
export const warehouseSchema = z.union([
  z.string().min(1),
  z
    .object({
      database: z.string().min(1),
      title: z.string().optional(),
      name: z.string().optional(),
      summary: z.string().optional(),
      local_cache: z.string().optional(),
    })
    .passthrough(),
]);

export const serviceSchema = z
  .object({
    url: z.string().min(1),
    type: z.string().min(1),
  })
  .passthrough();

export const serverSchema = z
  .object({
    host: z.string().min(1),
    port,
    library: z.string().optional(),
    cache: z.string().optional(),
    unregistered_key: z.string().optional(),
    redis: z.object({ host: z.string().min(1), port }).passthrough().optional(),
  })
  .passthrough();

export const ambryConfigSchema = z
  .object({
    database: z.record(databaseSchema).optional(),
    filesystem: filesystemSchema.optional(),
    library: z.record(librarySchema).optional(),
    warehouse: z.record(warehouseSchema).optional(),
    services: z.record(serviceSchema).optional(),
    servers: z.record(serverSchema).optional(),
  })
  .passthrough();

export type AmbryConfig = z.infer<typeof ambryConfigSchema>;

export const CONFIG_KEY_GROUPS = [
  'database',
  'filesystem',
  'library',
  'warehouse',
  'services',
  'servers',
] as const;

