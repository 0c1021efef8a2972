/**
 * SMB share and NFS export tools.
 */

import { z } from 'zod';
import {
  CreateNfsExportInputSchema,
  CreateSmbShareInputSchema,
  ListSharesInputSchema,
  NfsExportPayloadSchema,
  SmbSharePayloadSchema
} from '../schemas/tools.js';
import type { ToolDefinition } from '../types.js';
import { BaseToolGroup, PAGINATION_PARAMETERS } from './base.js';
import { applyPagination } from './format.js';

const SHARE_PATH_PARAMETER = {
  type: 'string',
  required: true,
  description: 'Absolute path under /mnt/ (e.g., "/mnt/tank/media")'
};

export class SharingTools extends BaseToolGroup {
  readonly groupName = 'sharing';

  getToolDefinitions(): ToolDefinition[] {
    return [
      this.define('list_smb_shares', args => this.listSmbShares(args), 'List SMB shares', {
        ...PAGINATION_PARAMETERS
      }),
      this.define('create_smb_share', args => this.createSmbShare(args), 'Create an SMB share', {
        path: SHARE_PATH_PARAMETER,
        name: { type: 'string', required: true, description: 'Share name' },
        comment: { type: 'string', required: false },
        read_only: { type: 'boolean', required: false }
      }),
      this.define('list_nfs_exports', args => this.listNfsExports(args), 'List NFS exports', {
        ...PAGINATION_PARAMETERS
      }),
      this.define('create_nfs_export', args => this.createNfsExport(args), 'Create an NFS export', {
        path: SHARE_PATH_PARAMETER,
        networks: {
          type: 'array',
          required: false,
          items: { type: 'string' },
          description: 'Allowed networks in CIDR form; empty means everyone'
        },
        read_only: { type: 'boolean', required: false },
        comment: { type: 'string', required: false }
      })
    ];
  }

  async listSmbShares(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset } = this.parseArgs(ListSharesInputSchema, args);
    const shares = this.parsePayload(z.array(SmbSharePayloadSchema), await this.client.get('/sharing/smb'), '/sharing/smb');

    const page = applyPagination(
      shares.map(share => ({
        id: share.id,
        name: share.name,
        path: share.path,
        comment: share.comment,
        read_only: share.ro,
        enabled: share.enabled
      })),
      limit,
      offset
    );

    return {
      success: true,
      shares: page.items,
      pagination: page.pagination,
      metadata: { enabled_shares: shares.filter(share => share.enabled).length }
    };
  }

  async createSmbShare(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const input = this.parseArgs(CreateSmbShareInputSchema, args);
    const created = await this.client.post('/sharing/smb', {
      path: input.path,
      name: input.name,
      comment: input.comment,
      ro: input.read_only
    });
    const parsed = SmbSharePayloadSchema.safeParse(created);

    return {
      success: true,
      message: `SMB share '${input.name}' created successfully`,
      share_id: parsed.success ? parsed.data.id : null
    };
  }

  async listNfsExports(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset } = this.parseArgs(ListSharesInputSchema, args);
    const nfsExports = this.parsePayload(z.array(NfsExportPayloadSchema), await this.client.get('/sharing/nfs'), '/sharing/nfs');

    const page = applyPagination(
      nfsExports.map(entry => ({
        id: entry.id,
        path: entry.path,
        comment: entry.comment,
        networks: entry.networks,
        read_only: entry.ro,
        enabled: entry.enabled
      })),
      limit,
      offset
    );

    return {
      success: true,
      exports: page.items,
      pagination: page.pagination,
      metadata: { enabled_exports: nfsExports.filter(entry => entry.enabled).length }
    };
  }

  async createNfsExport(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const input = this.parseArgs(CreateNfsExportInputSchema, args);
    const created = await this.client.post('/sharing/nfs', {
      path: input.path,
      networks: input.networks,
      ro: input.read_only,
      comment: input.comment
    });
    const parsed = NfsExportPayloadSchema.safeParse(created);

    return {
      success: true,
      message: `NFS export for '${input.path}' created successfully`,
      export_id: parsed.success ? parsed.data.id : null
    };
  }
}
