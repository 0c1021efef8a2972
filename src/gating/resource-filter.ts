import { logger } from '../utils/logger.js';
import type { FilterContext, Tool, ToolMap } from '../types.js';
import type { ToolFilter } from './tool-filter.js';

/**
 * Deterministic truncation order: priority descending, then name ascending.
 */
export function compareToolsForTruncation(a: Tool, b: Tool): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Caps the tool set at `maxTools` entries.
 */
export class ResourceFilter implements ToolFilter {
  readonly name = 'ResourceFilter' as const;

  constructor(readonly maxTools: number) {}

  apply(tools: ToolMap, context: FilterContext): ToolMap {
    if (tools.size <= this.maxTools) {
      return tools;
    }

    const kept = [...tools.values()].sort(compareToolsForTruncation).slice(0, this.maxTools);
    logger.debug('ResourceFilter truncated tool list', {
      request_id: context.requestId,
      max_tools: this.maxTools,
      dropped: tools.size - kept.length
    });

    return new Map(kept.map(tool => [tool.name, tool]));
  }
}
