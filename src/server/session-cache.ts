/**
 * Per-session cache of the tool set last returned by `tools/list`.
 *
 * Entries are replaced whole on every listing (last write wins) and never
 * evicted.
 */

import { metrics, MetricNames } from '../utils/metrics.js';
import type { ToolMap } from '../types.js';

export class SessionToolCache {
  private readonly sessions: Map<string, ToolMap> = new Map();

  /**
   * Replace the visible set for a session with a copy of `tools`.
   */
  set(sessionId: string, tools: ToolMap): void {
    this.sessions.set(sessionId, new Map(tools));
    metrics.gauge(MetricNames.CACHED_SESSIONS, this.sessions.size);
  }

  get(sessionId: string): ToolMap | undefined {
    return this.sessions.get(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
