/**
 * Tool registry.
 *
 * Builds immutable `Tool` descriptors from tool groups and keeps the handler
 * for each tool name.
 */

import { FALLBACK_TASK_TYPE } from '../constants.js';
import { Errors } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import type { JsonSchema, ParameterSpec, Tool, ToolDefinition, ToolGroup, ToolHandler, ToolMap } from '../types.js';

/**
 * Task types assigned to every tool of a group.
 */
export const TASK_TYPE_MAP: Readonly<Record<string, readonly string[]>> = Object.freeze({
  user: ['user-ops'],
  storage: ['storage-ops'],
  sharing: ['sharing-ops'],
  snapshot: ['snapshot-ops'],
  apps: ['apps-ops'],
  instance: ['instance-ops'],
  vm: ['vm-ops'],
  system: ['debug-ops'],
  debug: ['debug-ops'],
  meta: ['meta-ops'],
});

const SCHEMA_EXTRA_KEYS = ['enum', 'items', 'format', 'default', 'minimum', 'maximum'] as const;

/**
 * Compile a parameter map to a JSON-Schema object.
 */
export function buildInputSchema(parameters: Record<string, ParameterSpec>): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];

  for (const [name, param] of Object.entries(parameters)) {
    const property: JsonSchema = { type: param.type || 'string' };
    if (param.description !== undefined) {
      property.description = param.description;
    }
    for (const key of SCHEMA_EXTRA_KEYS) {
      if (param[key] !== undefined) {
        property[key] = param[key];
      }
    }
    properties[name] = property;
    if (param.required) {
      required.push(name);
    }
  }

  return { type: 'object', properties, required };
}

export class ToolRegistry {
  private readonly tools: ToolMap = new Map();
  private readonly handlers: Map<string, ToolHandler> = new Map();

  constructor(groups: ToolGroup[] = []) {
    for (const group of groups) {
      this.register(group);
    }
  }

  /**
   * Add every tool of a group. A duplicate name is a configuration error.
   */
  register(group: ToolGroup): void {
    const taskTypes = TASK_TYPE_MAP[group.groupName] ?? [FALLBACK_TASK_TYPE];

    let definitions: ToolDefinition[];
    try {
      definitions = group.getToolDefinitions();
    } catch (error) {
      logger.error('Failed to read tool definitions', {
        group: group.groupName,
        error: error instanceof Error ? error.message : String(error)
      });
      return;
    }

    for (const [name, handler, description, parameters] of definitions) {
      if (this.tools.has(name)) {
        throw Errors.duplicateTool(name);
      }

      this.tools.set(name, Object.freeze({
        name,
        description,
        method: 'rpc',
        path: `/tools/${name}`,
        requestSchema: buildInputSchema(parameters),
        responseSchema: { type: 'object' },
        taskTypes,
        priority: 0,
        requiredScopes: taskTypes
      }));
      this.handlers.set(name, handler);
    }

    logger.debug('Registered tool group', { group: group.groupName, task_types: taskTypes, tools: definitions.length });
  }

  /**
   * Copy of the catalog, in registration order.
   */
  getAllTools(): ToolMap {
    return new Map(this.tools);
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.handlers.get(name);
  }

  get size(): number {
    return this.tools.size;
  }
}
