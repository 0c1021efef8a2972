/**
 * Zod schemas for tool arguments and the appliance payloads they read.
 *
 * Argument schemas run after the JSON-Schema check in the protocol handler,
 * so they only apply defaults, aliases and cross-field rules.
 */

import { z } from 'zod';
import { PAGINATION } from '../constants.js';

// ============================================
// Shared
// ============================================

const PaginationShape = {
  limit: z.number()
    .int()
    .min(1)
    .max(PAGINATION.MAX_LIMIT)
    .default(PAGINATION.DEFAULT_LIMIT)
    .describe(`Max items to return (default: ${PAGINATION.DEFAULT_LIMIT}, max: ${PAGINATION.MAX_LIMIT})`),

  offset: z.number()
    .int()
    .min(0)
    .default(0)
    .describe('Items to skip for pagination')
};

/**
 * Appliance property: bare value or `{value, parsed, rawvalue}`
 */
const PropertySchema = z.unknown();

// ============================================
// Storage Tools
// ============================================

export const ListPoolsInputSchema = z.object({ ...PaginationShape });

export type ListPoolsInput = z.infer<typeof ListPoolsInputSchema>;

export const PoolNameInputSchema = z.object({
  pool_name: z.string().min(1, 'pool_name is required')
});

export type PoolNameInput = z.infer<typeof PoolNameInputSchema>;

export const ListDatasetsInputSchema = z.object({
  ...PaginationShape,
  include_children: z.boolean().default(true),
  pool_name: z.string().optional()
});

export type ListDatasetsInput = z.infer<typeof ListDatasetsInputSchema>;

export const GetDatasetInputSchema = z.object({
  dataset: z.string().min(1, 'dataset is required'),
  include_children: z.boolean().default(true)
});

export type GetDatasetInput = z.infer<typeof GetDatasetInputSchema>;

/**
 * Accepts `pool`/`name` as aliases of `pool_name`/`dataset_name`
 */
export const CreateDatasetInputSchema = z.object({
  pool_name: z.string().optional(),
  dataset_name: z.string().optional(),
  pool: z.string().optional(),
  name: z.string().optional(),
  compression: z.enum(['lz4', 'gzip', 'zstd', 'off']).default('lz4'),
  quota: z.union([z.string(), z.number()]).optional(),
  recordsize: z.string().default('128K'),
  sync: z.enum(['standard', 'always', 'disabled']).default('standard'),
  atime: z.boolean().default(true)
}).transform((input, ctx) => {
  const pool = input.pool_name || input.pool;
  const name = input.dataset_name || input.name;
  if (!pool || !name) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Missing required fields: pool_name, dataset_name',
      path: [pool ? 'dataset_name' : 'pool_name']
    });
    return z.NEVER;
  }
  return {
    pool,
    name,
    compression: input.compression,
    quota: input.quota,
    recordsize: input.recordsize,
    sync: input.sync,
    atime: input.atime
  };
});

export type CreateDatasetInput = z.output<typeof CreateDatasetInputSchema>;

export const DeleteDatasetInputSchema = z.object({
  dataset: z.string().optional(),
  dataset_name: z.string().optional(),
  recursive: z.boolean().default(false),
  force: z.boolean().default(false)
}).transform((input, ctx) => {
  const dataset = input.dataset || input.dataset_name;
  if (!dataset) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Missing required fields: dataset', path: ['dataset'] });
    return z.NEVER;
  }
  return { dataset, recursive: input.recursive, force: input.force };
});

export type DeleteDatasetInput = z.output<typeof DeleteDatasetInputSchema>;

export const UpdateDatasetInputSchema = z.object({
  dataset: z.string().min(1, 'dataset is required'),
  properties: z.record(z.string(), z.unknown())
});

export type UpdateDatasetInput = z.infer<typeof UpdateDatasetInputSchema>;

export const SetQuotaInputSchema = z.object({
  dataset_id: z.string().min(1, 'dataset_id is required'),
  quota: z.union([z.string().min(1), z.number().nonnegative()]),
  hard: z.boolean().default(true)
});

export type SetQuotaInput = z.infer<typeof SetQuotaInputSchema>;

// ============================================
// Snapshot Tools
// ============================================

export const ListSnapshotsInputSchema = z.object({
  ...PaginationShape,
  dataset: z.string().optional()
});

export type ListSnapshotsInput = z.infer<typeof ListSnapshotsInputSchema>;

export const CreateSnapshotInputSchema = z.object({
  dataset: z.string().min(1, 'dataset is required'),
  name: z.string()
    .min(1, 'name is required')
    .regex(/^[A-Za-z0-9_.:-]+$/, 'name may only contain letters, digits and _ . : -'),
  recursive: z.boolean().default(false)
});

export type CreateSnapshotInput = z.infer<typeof CreateSnapshotInputSchema>;

export const SnapshotRefInputSchema = z.object({
  snapshot: z.string().regex(/^[^@\s]+@[^@\s]+$/, 'snapshot must look like dataset@name'),
  force: z.boolean().default(false)
});

export type SnapshotRefInput = z.infer<typeof SnapshotRefInputSchema>;

// ============================================
// User Tools
// ============================================

export const ListUsersInputSchema = z.object({
  ...PaginationShape,
  include_builtin: z.boolean().default(false)
});

export type ListUsersInput = z.infer<typeof ListUsersInputSchema>;

export const UsernameInputSchema = z.object({
  username: z.string().min(1, 'username is required')
});

export type UsernameInput = z.infer<typeof UsernameInputSchema>;

export const CreateUserInputSchema = z.object({
  username: z.string().regex(/^[a-z_][a-z0-9_-]*$/, 'username must be lower-case POSIX'),
  full_name: z.string().min(1, 'full_name is required'),
  password: z.string().optional(),
  email: z.string().email().optional(),
  shell: z.string().default('/usr/bin/bash'),
  group_create: z.boolean().default(true),
  sudo: z.boolean().default(false)
});

export type CreateUserInput = z.infer<typeof CreateUserInputSchema>;

export const DeleteUserInputSchema = z.object({
  username: z.string().min(1, 'username is required'),
  delete_group: z.boolean().default(true)
});

export type DeleteUserInput = z.infer<typeof DeleteUserInputSchema>;

// ============================================
// Sharing Tools
// ============================================

export const ListSharesInputSchema = z.object({ ...PaginationShape });

export type ListSharesInput = z.infer<typeof ListSharesInputSchema>;

export const CreateSmbShareInputSchema = z.object({
  path: z.string().startsWith('/mnt/', 'path must live under /mnt/'),
  name: z.string().min(1, 'name is required'),
  comment: z.string().default(''),
  read_only: z.boolean().default(false)
});

export type CreateSmbShareInput = z.infer<typeof CreateSmbShareInputSchema>;

export const CreateNfsExportInputSchema = z.object({
  path: z.string().startsWith('/mnt/', 'path must live under /mnt/'),
  networks: z.array(z.string()).default([]),
  read_only: z.boolean().default(false),
  comment: z.string().default('')
});

export type CreateNfsExportInput = z.infer<typeof CreateNfsExportInputSchema>;

// ============================================
// System Tools
// ============================================

export const ListAlertsInputSchema = z.object({
  ...PaginationShape,
  include_dismissed: z.boolean().default(false)
});

export type ListAlertsInput = z.infer<typeof ListAlertsInputSchema>;

// ============================================
// Appliance Payloads
// ============================================

const VdevSchema = z.object({
  name: z.string().optional(),
  status: z.string().optional(),
  children: z.array(z.object({
    name: z.string().optional(),
    status: z.string().optional(),
    read: z.number().optional(),
    write: z.number().optional(),
    checksum: z.number().optional()
  }).passthrough()).default([])
}).passthrough();

export const PoolPayloadSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  name: z.string(),
  guid: z.string().optional(),
  status: z.string().optional(),
  healthy: z.boolean().default(false),
  encrypt: z.number().default(0),
  size: z.number().default(0),
  allocated: z.number().default(0),
  free: z.number().default(0),
  fragmentation: z.unknown().optional(),
  autotrim: PropertySchema.optional(),
  scan: z.object({ state: z.string().nullable().optional() }).passthrough().nullable().optional(),
  topology: z.object({
    data: z.array(VdevSchema).default([]),
    cache: z.array(VdevSchema).default([]),
    log: z.array(VdevSchema).default([]),
    spare: z.array(VdevSchema).default([])
  }).nullable().optional()
}).passthrough();

export type PoolPayload = z.infer<typeof PoolPayloadSchema>;

export const DatasetPayloadSchema = z.object({
  id: z.string(),
  name: z.string(),
  pool: z.string().optional(),
  type: z.string().optional(),
  mountpoint: z.string().nullable().optional(),
  encrypted: z.boolean().optional(),
  encryption_root: z.string().nullable().optional(),
  key_loaded: z.boolean().nullable().optional(),
  locked: z.boolean().optional(),
  children: z.array(z.unknown()).default([])
}).passthrough();

export type DatasetPayload = z.infer<typeof DatasetPayloadSchema>;

export const SnapshotPayloadSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  dataset: z.string().optional(),
  snapshot_name: z.string().optional(),
  properties: z.record(z.string(), PropertySchema).default({}),
  holds: z.unknown().optional()
}).passthrough();

export type SnapshotPayload = z.infer<typeof SnapshotPayloadSchema>;

export const UserPayloadSchema = z.object({
  id: z.number(),
  uid: z.number().optional(),
  username: z.string(),
  full_name: z.string().optional(),
  email: z.string().nullable().optional(),
  shell: z.string().optional(),
  home: z.string().optional(),
  builtin: z.boolean().default(false),
  locked: z.boolean().default(false),
  sudo_commands: z.array(z.string()).default([]),
  group: z.object({ bsdgrp_group: z.string().optional() }).passthrough().nullable().optional()
}).passthrough();

export type UserPayload = z.infer<typeof UserPayloadSchema>;

export const SmbSharePayloadSchema = z.object({
  id: z.number(),
  name: z.string(),
  path: z.string(),
  comment: z.string().default(''),
  ro: z.boolean().default(false),
  enabled: z.boolean().default(true)
}).passthrough();

export type SmbSharePayload = z.infer<typeof SmbSharePayloadSchema>;

export const NfsExportPayloadSchema = z.object({
  id: z.number(),
  path: z.string(),
  comment: z.string().default(''),
  networks: z.array(z.string()).default([]),
  ro: z.boolean().default(false),
  enabled: z.boolean().default(true)
}).passthrough();

export type NfsExportPayload = z.infer<typeof NfsExportPayloadSchema>;

export const SystemInfoPayloadSchema = z.object({
  version: z.string().optional(),
  hostname: z.string().optional(),
  uptime_seconds: z.number().optional(),
  physmem: z.number().optional(),
  cores: z.number().optional(),
  model: z.string().optional(),
  loadavg: z.array(z.number()).optional()
}).passthrough();

export type SystemInfoPayload = z.infer<typeof SystemInfoPayloadSchema>;

export const AlertPayloadSchema = z.object({
  uuid: z.string(),
  level: z.string(),
  formatted: z.string().nullable().optional(),
  klass: z.string().optional(),
  dismissed: z.boolean().default(false),
  datetime: PropertySchema.optional()
}).passthrough();

export type AlertPayload = z.infer<typeof AlertPayloadSchema>;
