/**
 * Introspection tools over the gateway's own catalog.
 */

import { z } from 'zod';
import type { ToolDefinition, ToolGroup, ToolMap } from '../types.js';

export interface CatalogSource {
  getAllTools(): ToolMap;
}

const CatalogInputSchema = z.object({
  task_type: z.string().optional()
});

export class MetaTools implements ToolGroup {
  readonly groupName = 'meta';

  constructor(private readonly catalog: CatalogSource) {}

  getToolDefinitions(): ToolDefinition[] {
    return [
      [
        'list_tool_catalog',
        args => this.listToolCatalog(args),
        'List every tool the gateway can expose, with its task types',
        {
          task_type: { type: 'string', required: false, description: 'Only tools tagged with this task type' }
        }
      ]
    ];
  }

  async listToolCatalog(args: Record<string, unknown>): Promise<Record<string, unknown>> {
    const parsed = CatalogInputSchema.safeParse(args);
    const taskType = parsed.success ? parsed.data.task_type : undefined;

    const tools = [...this.catalog.getAllTools().values()]
      .filter(tool => !taskType || tool.taskTypes.includes(taskType))
      .map(tool => ({ name: tool.name, description: tool.description, task_types: tool.taskTypes }));

    const byTaskType: Record<string, number> = {};
    for (const tool of tools) {
      for (const label of tool.task_types) {
        byTaskType[label] = (byTaskType[label] ?? 0) + 1;
      }
    }

    return { success: true, tools, total: tools.length, by_task_type: byTaskType };
  }
}
