/**
 * Storage tools: pools, datasets and quotas.
 */

import { z } from 'zod';
import { GatewayError, ErrorCode } from '../errors/index.js';
import {
  CreateDatasetInputSchema,
  DatasetPayloadSchema,
  DeleteDatasetInputSchema,
  GetDatasetInputSchema,
  ListDatasetsInputSchema,
  ListPoolsInputSchema,
  PoolNameInputSchema,
  PoolPayloadSchema,
  SetQuotaInputSchema,
  UpdateDatasetInputSchema,
  type DatasetPayload,
  type PoolPayload
} from '../schemas/tools.js';
import type { ToolDefinition } from '../types.js';
import { BaseToolGroup, PAGINATION_PARAMETERS } from './base.js';
import { applyPagination, formatSize, parseSize, propNumber, propValue, roundPercent } from './format.js';

const VDEV_TYPES = ['data', 'cache', 'log', 'spare'] as const;

const DATASET_PROPERTIES = [
  'compression', 'deduplication', 'atime', 'sync', 'quota', 'refquota',
  'reservation', 'refreservation', 'recordsize', 'snapdir', 'copies',
  'readonly', 'exec', 'casesensitivity'
];

const SIZE_PROPERTIES = new Set(['quota', 'refquota', 'reservation', 'refreservation']);

const PoolListSchema = z.array(PoolPayloadSchema);
const DatasetListSchema = z.array(DatasetPayloadSchema);

function displaySize(property: unknown): string | null {
  const bytes = propNumber(property);
  if (bytes !== undefined) {
    return formatSize(bytes);
  }
  const value = propValue(property);
  return value === null ? null : String(value);
}

function vdevSummary(pool: PoolPayload): Record<string, number> {
  return {
    data_vdevs: pool.topology?.data.length ?? 0,
    cache_vdevs: pool.topology?.cache.length ?? 0,
    log_vdevs: pool.topology?.log.length ?? 0,
    spare_vdevs: pool.topology?.spare.length ?? 0
  };
}

export class StorageTools extends BaseToolGroup {
  readonly groupName = 'storage';

  getToolDefinitions(): ToolDefinition[] {
    return [
      this.define('list_pools', args => this.listPools(args), 'List all storage pools with status and capacity', {
        ...PAGINATION_PARAMETERS
      }),
      this.define('get_pool', args => this.getPool(args), 'Get summarized information for a specific pool', {
        pool_name: { type: 'string', required: true, description: 'Name of the pool' }
      }),
      this.define('get_pool_status', args => this.getPoolStatus(args), 'Get detailed status and vdev health of a pool', {
        pool_name: { type: 'string', required: true, description: 'Name of the pool' }
      }),
      this.define('list_datasets', args => this.listDatasets(args), 'List datasets, optionally for one pool', {
        ...PAGINATION_PARAMETERS,
        include_children: { type: 'boolean', required: false, description: 'Include child datasets (default: true)' },
        pool_name: { type: 'string', required: false, description: 'Only datasets of this pool' }
      }),
      this.define('get_dataset', args => this.getDataset(args), 'Get detailed information about a dataset', {
        dataset: { type: 'string', required: true, description: 'Dataset path (e.g., "tank/data")' },
        include_children: { type: 'boolean', required: false, description: 'Include child datasets (default: true)' }
      }),
      this.define('create_dataset', args => this.createDataset(args), 'Create a new dataset', {
        pool_name: { type: 'string', required: false, description: 'Pool to create the dataset in' },
        dataset_name: { type: 'string', required: false, description: 'Dataset name' },
        compression: { type: 'string', required: false, enum: ['lz4', 'gzip', 'zstd', 'off'] },
        quota: { type: 'string', required: false, description: 'Optional quota (e.g., "10G")' },
        recordsize: { type: 'string', required: false, description: 'Record size (e.g., "128K")' },
        sync: { type: 'string', required: false, enum: ['standard', 'always', 'disabled'] },
        atime: { type: 'boolean', required: false, description: 'Enable access time updates' }
      }),
      this.define('delete_dataset', args => this.deleteDataset(args), 'Delete a dataset (destructive)', {
        dataset: { type: 'string', required: true, description: 'Dataset path (e.g., "tank/data")' },
        recursive: { type: 'boolean', required: false, description: 'Delete child datasets' },
        force: { type: 'boolean', required: false, description: 'Force deletion even if shared' }
      }),
      this.define('update_dataset', args => this.updateDataset(args), 'Update dataset properties', {
        dataset: { type: 'string', required: true, description: 'Dataset path (e.g., "tank/data")' },
        properties: { type: 'object', required: true, description: 'Properties to update' }
      }),
      this.define('set_quota', args => this.setQuota(args), 'Set a quota on a dataset', {
        dataset_id: { type: 'string', required: true, description: 'Dataset id (e.g., "tank/data")' },
        quota: { type: 'string', required: true, description: 'Quota size (e.g., "50G")' },
        hard: { type: 'boolean', required: false, description: 'Hard quota (default: true)' }
      })
    ];
  }

  async listPools(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset } = this.parseArgs(ListPoolsInputSchema, args);
    const pools = this.parsePayload(PoolListSchema, await this.client.get('/pool'), '/pool');

    const poolList = pools.map(pool => ({
      name: pool.name,
      status: pool.status ?? null,
      healthy: pool.healthy,
      encrypted: pool.encrypt > 0,
      size: formatSize(pool.size),
      allocated: formatSize(pool.allocated),
      free: formatSize(pool.free),
      usage_percent: roundPercent(pool.allocated, pool.size),
      fragmentation: pool.fragmentation ?? null,
      scan: pool.scan?.state ?? null,
      topology: vdevSummary(pool)
    }));

    const totalSize = pools.reduce((sum, pool) => sum + pool.size, 0);
    const totalAllocated = pools.reduce((sum, pool) => sum + pool.allocated, 0);
    const totalFree = pools.reduce((sum, pool) => sum + pool.free, 0);
    const page = applyPagination(poolList, limit, offset);

    return {
      success: true,
      pools: page.items,
      pagination: page.pagination,
      metadata: {
        healthy_pools: poolList.filter(pool => pool.healthy).length,
        degraded_pools: poolList.filter(pool => !pool.healthy).length,
        total_capacity: formatSize(totalSize),
        total_allocated: formatSize(totalAllocated),
        total_free: formatSize(totalFree),
        overall_usage_percent: roundPercent(totalAllocated, totalSize)
      }
    };
  }

  async getPool(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { pool_name } = this.parseArgs(PoolNameInputSchema, args);
    const pool = await this.findPool(pool_name);
    if (!pool) {
      return { success: false, error: `Pool '${pool_name}' not found` };
    }

    return {
      success: true,
      name: pool.name,
      id: pool.id ?? null,
      status: pool.status ?? null,
      healthy: pool.healthy,
      encrypted: pool.encrypt > 0,
      size: formatSize(pool.size),
      allocated_display: formatSize(pool.allocated),
      free_display: formatSize(pool.free),
      usage_percent: roundPercent(pool.allocated, pool.size),
      topology: vdevSummary(pool)
    };
  }

  async getPoolStatus(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { pool_name } = this.parseArgs(PoolNameInputSchema, args);
    const pool = await this.findPool(pool_name);
    if (!pool) {
      return { success: false, error: `Pool '${pool_name}' not found` };
    }

    const vdevs = VDEV_TYPES.flatMap(type =>
      (pool.topology?.[type] ?? []).map(vdev => ({
        type,
        name: vdev.name ?? null,
        status: vdev.status ?? null,
        devices: vdev.children.map(device => ({
          name: device.name ?? null,
          status: device.status ?? null,
          read_errors: device.read ?? 0,
          write_errors: device.write ?? 0,
          checksum_errors: device.checksum ?? 0
        }))
      }))
    );

    return {
      success: true,
      pool: {
        name: pool.name,
        id: pool.id ?? null,
        guid: pool.guid ?? null,
        status: pool.status ?? null,
        healthy: pool.healthy,
        encrypted: pool.encrypt > 0,
        autotrim: propValue(pool.autotrim),
        capacity: {
          size: formatSize(pool.size),
          size_bytes: pool.size,
          allocated: formatSize(pool.allocated),
          allocated_bytes: pool.allocated,
          free: formatSize(pool.free),
          free_bytes: pool.free,
          usage_percent: roundPercent(pool.allocated, pool.size),
          fragmentation: pool.fragmentation ?? null
        },
        topology: { vdevs, summary: vdevSummary(pool) },
        scan: pool.scan ?? null
      }
    };
  }

  async listDatasets(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset, include_children, pool_name } = this.parseArgs(ListDatasetsInputSchema, args);
    const datasets = await this.fetchDatasets();

    const datasetList = datasets
      .filter(dataset => !pool_name || dataset.pool === pool_name)
      .map(dataset => ({
        name: dataset.name,
        pool: dataset.pool ?? null,
        type: dataset.type ?? null,
        mountpoint: dataset.mountpoint ?? null,
        compression: propValue(dataset.compression),
        deduplication: propValue(dataset.deduplication),
        encrypted: dataset.encrypted ?? false,
        used: displaySize(dataset.used),
        available: displaySize(dataset.available),
        quota: propValue(dataset.quota),
        ...(include_children && { children: dataset.children })
      }));

    const byPool: Record<string, number> = {};
    for (const dataset of datasetList) {
      const key = dataset.pool ?? 'unknown';
      byPool[key] = (byPool[key] ?? 0) + 1;
    }
    const page = applyPagination(datasetList, limit, offset);

    return {
      success: true,
      datasets: page.items,
      pagination: page.pagination,
      metadata: {
        by_pool: byPool,
        encrypted_datasets: datasetList.filter(dataset => dataset.encrypted).length,
        compressed_datasets: datasetList.filter(
          dataset => typeof dataset.compression === 'string' && dataset.compression.toLowerCase() !== 'off'
        ).length
      }
    };
  }

  async getDataset(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { dataset: name, include_children } = this.parseArgs(GetDatasetInputSchema, args);
    const dataset = (await this.fetchDatasets()).find(candidate => candidate.name === name);
    if (!dataset) {
      return { success: false, error: `Dataset '${name}' not found` };
    }

    const properties: Record<string, unknown> = {};
    for (const key of DATASET_PROPERTIES) {
      properties[key] = propValue(dataset[key]);
    }

    return {
      success: true,
      dataset: {
        name: dataset.name,
        id: dataset.id,
        pool: dataset.pool ?? null,
        type: dataset.type ?? null,
        mountpoint: dataset.mountpoint ?? null,
        encrypted: dataset.encrypted ?? false,
        encryption_root: dataset.encryption_root ?? null,
        key_loaded: dataset.key_loaded ?? null,
        locked: dataset.locked ?? false,
        usage: {
          used: propValue(dataset.used),
          available: propValue(dataset.available),
          referenced: propValue(dataset.referenced),
          usedbysnapshots: propValue(dataset.usedbysnapshots),
          usedbychildren: propValue(dataset.usedbychildren)
        },
        properties,
        origin: propValue(dataset.origin),
        ...(include_children && { children: dataset.children })
      }
    };
  }

  async createDataset(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const input = this.parseArgs(CreateDatasetInputSchema, args);
    const path = `${input.pool}/${input.name}`;

    const body: Record<string, unknown> = {
      name: path,
      type: 'FILESYSTEM',
      compression: input.compression.toUpperCase(),
      sync: input.sync.toUpperCase(),
      atime: input.atime ? 'ON' : 'OFF',
      recordsize: input.recordsize
    };
    if (input.quota !== undefined) {
      body.quota = parseSize(input.quota);
    }

    const created = await this.client.post('/pool/dataset', body);
    const parsed = DatasetPayloadSchema.safeParse(created);

    return {
      success: true,
      message: `Dataset '${path}' created successfully`,
      dataset: parsed.success ? { name: parsed.data.name, id: parsed.data.id } : { name: path }
    };
  }

  async deleteDataset(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { dataset: name, recursive, force } = this.parseArgs(DeleteDatasetInputSchema, args);
    this.requireDestructive('delete_dataset');

    const dataset = (await this.fetchDatasets()).find(candidate => candidate.name === name);
    if (!dataset) {
      return { success: false, error: `Dataset '${name}' not found` };
    }

    await this.client.delete(`/pool/dataset/id/${encodeURIComponent(dataset.id)}`, { recursive, force });

    return {
      success: true,
      message: `Dataset '${name}' deleted successfully`,
      deleted: {
        name,
        recursive,
        force,
        children_deleted: recursive ? dataset.children.length : 0
      }
    };
  }

  async updateDataset(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { dataset: name, properties } = this.parseArgs(UpdateDatasetInputSchema, args);
    const dataset = (await this.fetchDatasets()).find(candidate => candidate.name === name);
    if (!dataset) {
      return { success: false, error: `Dataset '${name}' not found` };
    }

    const body: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(properties)) {
      body[key] = SIZE_PROPERTIES.has(key) && typeof value === 'string' ? parseSize(value) : value;
    }

    await this.client.put(`/pool/dataset/id/${encodeURIComponent(dataset.id)}`, body);

    return {
      success: true,
      message: `Dataset '${name}' updated successfully`,
      updated_properties: Object.keys(properties),
      dataset: { name: dataset.name, id: dataset.id }
    };
  }

  async setQuota(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { dataset_id, quota, hard } = this.parseArgs(SetQuotaInputSchema, args);
    const quotaBytes = parseSize(quota);

    await this.client.put(`/pool/dataset/id/${encodeURIComponent(dataset_id)}`, {
      [hard ? 'quota' : 'refquota']: quotaBytes
    });

    return {
      success: true,
      dataset_id,
      hard,
      quota: formatSize(quotaBytes),
      quota_bytes: quotaBytes
    };
  }

  private async findPool(name: string): Promise<PoolPayload | undefined> {
    const path = `/pool/id/${encodeURIComponent(name)}`;
    try {
      return this.parsePayload(PoolPayloadSchema, await this.client.get(path), path);
    } catch (error) {
      if (!(error instanceof GatewayError) || error.code !== ErrorCode.APPLIANCE_NOT_FOUND) {
        throw error;
      }
    }

    // Pools are addressed by numeric id; fall back to a scan by name.
    const pools = this.parsePayload(PoolListSchema, await this.client.get('/pool'), '/pool');
    return pools.find(pool => pool.name === name);
  }

  private async fetchDatasets(): Promise<DatasetPayload[]> {
    return this.parsePayload(DatasetListSchema, await this.client.get('/pool/dataset'), '/pool/dataset');
  }
}
