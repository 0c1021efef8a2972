/**
 * Snapshot tools.
 */

import { z } from 'zod';
import {
  CreateSnapshotInputSchema,
  ListSnapshotsInputSchema,
  SnapshotPayloadSchema,
  SnapshotRefInputSchema
} from '../schemas/tools.js';
import type { ToolDefinition } from '../types.js';
import { BaseToolGroup, PAGINATION_PARAMETERS } from './base.js';
import { applyPagination, propTimestamp, propValue } from './format.js';

const SnapshotListSchema = z.array(SnapshotPayloadSchema);

interface SnapshotSummary {
  name: string;
  dataset: string;
  snapshot_name: string;
  created: number | null;
  created_human: string | null;
  used: unknown;
  referenced: unknown;
  holds: number;
}

function holdCount(holds: unknown): number {
  if (Array.isArray(holds)) return holds.length;
  if (typeof holds === 'object' && holds !== null) return Object.keys(holds).length;
  return 0;
}

export class SnapshotTools extends BaseToolGroup {
  readonly groupName = 'snapshot';

  getToolDefinitions(): ToolDefinition[] {
    return [
      this.define('list_snapshots', args => this.listSnapshots(args), 'List ZFS snapshots, newest first', {
        ...PAGINATION_PARAMETERS,
        dataset: { type: 'string', required: false, description: 'Only snapshots of this dataset' }
      }),
      this.define('create_snapshot', args => this.createSnapshot(args), 'Create a snapshot of a dataset', {
        dataset: { type: 'string', required: true, description: 'Dataset path (e.g., "tank/data")' },
        name: { type: 'string', required: true, description: 'Snapshot name' },
        recursive: { type: 'boolean', required: false, description: 'Snapshot child datasets too' }
      }),
      this.define('delete_snapshot', args => this.deleteSnapshot(args), 'Delete a snapshot (destructive)', {
        snapshot: { type: 'string', required: true, description: 'Full snapshot name (dataset@name)' }
      }),
      this.define('rollback_snapshot', args => this.rollbackSnapshot(args), 'Roll a dataset back to a snapshot (destructive)', {
        snapshot: { type: 'string', required: true, description: 'Full snapshot name (dataset@name)' },
        force: { type: 'boolean', required: false, description: 'Destroy newer snapshots if needed' }
      })
    ];
  }

  async listSnapshots(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset, dataset } = this.parseArgs(ListSnapshotsInputSchema, args);
    const payload = await this.client.get('/zfs/snapshot', dataset ? { dataset } : undefined);
    const snapshots = this.parsePayload(SnapshotListSchema, payload, '/zfs/snapshot');

    const summaries: SnapshotSummary[] = snapshots
      .map(snapshot => {
        const [datasetName, snapshotName] = snapshot.name.split('@', 2);
        const created = propTimestamp(snapshot.properties.creation) ?? null;
        return {
          name: snapshot.name,
          dataset: snapshot.dataset ?? datasetName,
          snapshot_name: snapshot.snapshot_name ?? snapshotName ?? '',
          created,
          created_human: created === null ? null : new Date(created * 1000).toISOString(),
          used: propValue(snapshot.properties.used),
          referenced: propValue(snapshot.properties.referenced),
          holds: holdCount(snapshot.holds)
        };
      })
      .filter(snapshot => !dataset || snapshot.dataset === dataset)
      .sort((a, b) => (b.created ?? 0) - (a.created ?? 0));

    const byDataset: Record<string, number> = {};
    for (const snapshot of summaries) {
      byDataset[snapshot.dataset] = (byDataset[snapshot.dataset] ?? 0) + 1;
    }
    const page = applyPagination(summaries, limit, offset);

    return {
      success: true,
      snapshots: page.items,
      pagination: page.pagination,
      metadata: {
        by_dataset: byDataset,
        held_snapshots: summaries.filter(snapshot => snapshot.holds > 0).length
      }
    };
  }

  async createSnapshot(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { dataset, name, recursive } = this.parseArgs(CreateSnapshotInputSchema, args);
    await this.client.post('/zfs/snapshot', { dataset, name, recursive });

    return {
      success: true,
      message: `Snapshot '${dataset}@${name}' created successfully`,
      snapshot: { name: `${dataset}@${name}`, dataset, recursive }
    };
  }

  async deleteSnapshot(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { snapshot } = this.parseArgs(SnapshotRefInputSchema, args);
    this.requireDestructive('delete_snapshot');

    await this.client.delete(`/zfs/snapshot/id/${encodeURIComponent(snapshot)}`);

    return { success: true, message: `Snapshot '${snapshot}' deleted successfully` };
  }

  async rollbackSnapshot(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { snapshot, force } = this.parseArgs(SnapshotRefInputSchema, args);
    this.requireDestructive('rollback_snapshot');

    await this.client.post('/zfs/snapshot/rollback', { id: snapshot, options: { force } });

    return {
      success: true,
      message: `Dataset rolled back to '${snapshot}'`,
      rollback: { snapshot, force }
    };
  }
}
