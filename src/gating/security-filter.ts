import { logger } from '../utils/logger.js';
import type { FilterContext, ToolMap } from '../types.js';
import type { ToolFilter } from './tool-filter.js';

/**
 * Removes blocklisted tool names; order is otherwise preserved.
 */
export class SecurityFilter implements ToolFilter {
  readonly name = 'SecurityFilter' as const;
  private readonly blocklist: ReadonlySet<string>;

  constructor(blocklist: Iterable<string>) {
    this.blocklist = new Set(blocklist);
  }

  apply(tools: ToolMap, context: FilterContext): ToolMap {
    const filtered: ToolMap = new Map();
    const blocked: string[] = [];

    for (const [name, tool] of tools) {
      if (this.blocklist.has(name)) {
        blocked.push(name);
      } else {
        filtered.set(name, tool);
      }
    }

    if (blocked.length === 0) {
      return tools;
    }

    logger.debug('SecurityFilter blocked tools', { request_id: context.requestId, blocked });
    return filtered;
  }
}
