/**
 * Base class for appliance tool groups.
 */

import type { z } from 'zod';
import type { ApplianceTransport } from '../client/appliance-client.js';
import { Errors } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import type { ParameterSpec, ToolDefinition, ToolGroup, ToolHandler } from '../types.js';
import { PAGINATION } from '../constants.js';

export interface ToolGroupOptions {
  allowDestructive: boolean;
}

export const PAGINATION_PARAMETERS: Record<string, ParameterSpec> = {
  limit: {
    type: 'integer',
    required: false,
    minimum: 1,
    maximum: PAGINATION.MAX_LIMIT,
    description: `Max items to return (default: ${PAGINATION.DEFAULT_LIMIT}, max: ${PAGINATION.MAX_LIMIT})`
  },
  offset: {
    type: 'integer',
    required: false,
    minimum: 0,
    description: 'Items to skip for pagination'
  }
};

export abstract class BaseToolGroup implements ToolGroup {
  abstract readonly groupName: string;

  constructor(
    protected readonly client: ApplianceTransport,
    protected readonly options: ToolGroupOptions
  ) {}

  abstract getToolDefinitions(): ToolDefinition[];

  protected define(
    name: string,
    handler: ToolHandler,
    description: string,
    parameters: Record<string, ParameterSpec> = {}
  ): ToolDefinition {
    return [name, handler, description, parameters];
  }

  /**
   * Parse handler arguments; the first issue becomes an invalid-input error.
   */
  protected parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw Errors.invalidInput(issue.path.join('.') || 'arguments', issue.message);
    }
    return parsed.data;
  }

  /**
   * Parse an appliance payload.
   */
  protected parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, path: string): z.output<S> {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw Errors.unexpectedResponse(path, `${issue.path.join('.') || 'body'}: ${issue.message}`);
    }
    return parsed.data;
  }

  protected requireDestructive(operation: string): void {
    if (!this.options.allowDestructive) {
      logger.warn('Destructive operation refused', { group: this.groupName, operation });
      throw Errors.operationDisabled(operation);
    }
  }
}
