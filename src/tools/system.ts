/**
 * Diagnostic tools. Registered only when debug tools are enabled.
 */

import { z } from 'zod';
import { AlertPayloadSchema, ListAlertsInputSchema, SystemInfoPayloadSchema } from '../schemas/tools.js';
import type { ToolDefinition } from '../types.js';
import { BaseToolGroup, PAGINATION_PARAMETERS } from './base.js';
import { applyPagination, formatSize, propTimestamp } from './format.js';

const ALERT_LEVEL_ORDER = ['CRITICAL', 'ERROR', 'WARNING', 'NOTICE', 'INFO'];

function levelRank(level: string): number {
  const rank = ALERT_LEVEL_ORDER.indexOf(level.toUpperCase());
  return rank === -1 ? ALERT_LEVEL_ORDER.length : rank;
}

export class SystemTools extends BaseToolGroup {
  readonly groupName = 'system';

  getToolDefinitions(): ToolDefinition[] {
    return [
      this.define('get_system_info', () => this.getSystemInfo(), 'Get appliance version, hardware and uptime'),
      this.define('get_alerts', args => this.getAlerts(args), 'List appliance alerts, most severe first', {
        ...PAGINATION_PARAMETERS,
        include_dismissed: { type: 'boolean', required: false, description: 'Include dismissed alerts' }
      })
    ];
  }

  async getSystemInfo(): Promise<Record<string, unknown>> {
    const info = this.parsePayload(SystemInfoPayloadSchema, await this.client.get('/system/info'), '/system/info');

    return {
      success: true,
      system: {
        version: info.version ?? null,
        hostname: info.hostname ?? null,
        model: info.model ?? null,
        cores: info.cores ?? null,
        memory: info.physmem === undefined ? null : formatSize(info.physmem),
        uptime_seconds: info.uptime_seconds ?? null,
        load_average: info.loadavg ?? null
      }
    };
  }

  async getAlerts(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { limit, offset, include_dismissed } = this.parseArgs(ListAlertsInputSchema, args);
    const alerts = this.parsePayload(z.array(AlertPayloadSchema), await this.client.get('/alert/list'), '/alert/list');

    const visible = alerts
      .filter(alert => include_dismissed || !alert.dismissed)
      .sort((a, b) => levelRank(a.level) - levelRank(b.level));

    const byLevel: Record<string, number> = {};
    for (const alert of visible) {
      byLevel[alert.level] = (byLevel[alert.level] ?? 0) + 1;
    }

    const page = applyPagination(
      visible.map(alert => {
        const raised = propTimestamp(alert.datetime);
        return {
          id: alert.uuid,
          level: alert.level,
          source: alert.klass ?? null,
          message: alert.formatted ?? '',
          dismissed: alert.dismissed,
          raised_at: raised === undefined ? null : new Date(raised * 1000).toISOString()
        };
      }),
      limit,
      offset
    );

    return {
      success: true,
      alerts: page.items,
      pagination: page.pagination,
      metadata: { by_level: byLevel }
    };
  }
}
