/**
 * MCP protocol handler.
 *
 * Orchestrates `tools/list` (classification, gating, scope enforcement,
 * session caching and context sizing) and `tools/call` (visibility, scope,
 * argument validation and dispatch), plus `initialize` and the prompts.
 */

import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ADMIN_SCOPE, PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION } from '../constants.js';
import type { GatewaySettings } from '../config/settings.js';
import type { ToolGateController } from '../gating/gate-controller.js';
import type { IntentClassifier } from '../intent/classifier.js';
import { JsonRpcError, JsonRpcErrorCode } from '../rpc/jsonrpc.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { FilterContext, JsonSchema, Tool, ToolMap } from '../types.js';
import { logger } from '../utils/logger.js';
import { metrics, MetricNames } from '../utils/metrics.js';
import { SessionToolCache } from './session-cache.js';

const Ajv = AjvModule.default;

export const INTENT_PROMPT_NAME = 'intent-query-help';

const EMPTY_INPUT_SCHEMA: JsonSchema = { type: 'object', properties: {}, required: [] };

const ToolsListParamsSchema = z.object({
  task_type: z.string().nullable().optional(),
  query: z.string().nullable().optional()
}).passthrough();

export type RpcParams = Record<string, unknown> | null | undefined;

export type ClassificationMethod = 'intent' | 'explicit' | 'none';

/**
 * Per-request values resolved by the transport.
 */
export interface RequestContext {
  requestId: string;
  sessionId: string;
  scopes: ReadonlySet<string>;
  taskTypeHeader?: string;
}

export interface ToolSummary {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

export interface ToolsListResult {
  tools: ToolSummary[];
  _metadata: {
    context_size: number;
    estimator: string;
    filters_applied: string[];
    classification_method: ClassificationMethod;
    query: string | null;
    detected_task_types: string[] | null;
  };
}

export type HandlerSettings = Pick<GatewaySettings, 'intentClassificationEnabled' | 'intentPrecedence'>;

/**
 * Scopes that grant access to a tool: its required scopes, else its task types.
 */
export function requiredScopesOf(tool: Tool): readonly string[] {
  return tool.requiredScopes && tool.requiredScopes.length > 0 ? tool.requiredScopes : tool.taskTypes;
}

/**
 * True when the caller's scopes do not restrict visibility.
 */
function isUnrestricted(scopes: ReadonlySet<string>): boolean {
  return scopes.size === 0 || scopes.has(ADMIN_SCOPE);
}

function hasScope(tool: Tool, scopes: ReadonlySet<string>): boolean {
  return isUnrestricted(scopes) || requiredScopesOf(tool).some(scope => scopes.has(scope));
}

/**
 * JSON-pointer instance path as path segments; array indices become numbers.
 */
export function errorPath(error: ErrorObject): Array<string | number> {
  if (!error.instancePath) {
    return [];
  }
  return error.instancePath
    .split('/')
    .slice(1)
    .map(segment => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
    .map(segment => (/^\d+$/.test(segment) ? Number(segment) : segment));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class GatewayProtocolHandler {
  private readonly ajv = new Ajv({ strict: false, allErrors: false });
  private readonly requestValidators: Map<string, ValidateFunction> = new Map();
  private readonly responseValidators: Map<string, ValidateFunction> = new Map();

  constructor(
    private readonly registry: ToolRegistry,
    private readonly gate: ToolGateController,
    private readonly classifier: IntentClassifier | undefined,
    private readonly settings: HandlerSettings,
    readonly sessions: SessionToolCache = new SessionToolCache()
  ) {}

  /**
   * Route one JSON-RPC method. Protocol failures are thrown as JsonRpcError.
   */
  async dispatch(method: string, params: RpcParams, context: RequestContext): Promise<unknown> {
    switch (method) {
      case 'initialize':
        return this.initialize(context);
      case 'tools/list':
        return this.toolsList(params, context);
      case 'tools/call':
        return this.toolsCall(params, context);
      case 'prompts/list':
        return this.promptsList(context);
      case 'prompts/get':
        return this.promptsGet(params, context);
      default:
        logger.warn('Unknown JSON-RPC method', { method, request_id: context.requestId });
        throw new JsonRpcError(JsonRpcErrorCode.METHOD_NOT_FOUND, `Method '${method}' not found`);
    }
  }

  initialize(context: RequestContext): Record<string, unknown> {
    logger.info('initialize called', { request_id: context.requestId, session_id: context.sessionId });
    return {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {
        tools: {
          gating: true,
          context_size_enforcement: true,
          task_type_filtering: true
        },
        prompts: { listChanged: false }
      },
      serverInfo: { name: SERVER_NAME, version: SERVER_VERSION }
    };
  }

  toolsList(params: RpcParams, context: RequestContext): ToolsListResult {
    const parsed = ToolsListParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new JsonRpcError(JsonRpcErrorCode.INVALID_PARAMS, `Invalid parameters: ${issue.message}`, {
        path: issue.path
      });
    }

    let taskType = context.taskTypeHeader || parsed.data.task_type || undefined;
    const query = parsed.data.query || undefined;
    let detectedTaskTypes: string[] | undefined;
    let classificationMethod: ClassificationMethod = 'none';

    metrics.increment(MetricNames.TOOLS_LIST_TOTAL);

    if (query && this.classifier && this.settings.intentClassificationEnabled) {
      detectedTaskTypes = this.classifier.classifyIntent(query);
      classificationMethod = 'intent';
      if (this.settings.intentPrecedence === 'intent') {
        taskType = undefined;
      }
      logger.info('Intent classifier result', {
        request_id: context.requestId,
        session_id: context.sessionId,
        detected_task_types: detectedTaskTypes
      });
    } else if (taskType) {
      classificationMethod = 'explicit';
    }

    const filterContext: FilterContext = {
      taskType,
      sessionId: context.sessionId,
      requestId: context.requestId,
      query,
      detectedTaskTypes
    };

    const decision = this.gate.getAvailableTools(filterContext);
    let tools: ToolMap = decision.tools;
    const filtersApplied: string[] = [...decision.filtersApplied];

    if (!isUnrestricted(context.scopes)) {
      const scoped: ToolMap = new Map();
      for (const [name, tool] of tools) {
        if (hasScope(tool, context.scopes)) {
          scoped.set(name, tool);
        }
      }
      tools = scoped;
      filtersApplied.push('ScopeFilter');
    }

    // Sized before caching so a listing rejected by the budget leaves the
    // previous session entry in place.
    const contextSize = this.gate.getContextSize(tools);
    this.sessions.set(context.sessionId, tools);

    metrics.histogram(MetricNames.LISTED_TOOLS, tools.size);
    metrics.histogram(MetricNames.CONTEXT_SIZE_TOKENS, contextSize);
    logger.toolsListed(tools.size, filtersApplied, contextSize, {
      request_id: context.requestId,
      session_id: context.sessionId
    });

    return {
      tools: [...tools.values()].map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.requestSchema ?? EMPTY_INPUT_SCHEMA
      })),
      _metadata: {
        context_size: contextSize,
        estimator: this.gate.estimatorMode,
        filters_applied: filtersApplied,
        classification_method: classificationMethod,
        query: query ?? null,
        detected_task_types: detectedTaskTypes ?? null
      }
    };
  }

  async toolsCall(params: RpcParams, context: RequestContext): Promise<CallToolResult> {
    const toolName = params?.name;
    if (typeof toolName !== 'string' || !toolName) {
      throw new JsonRpcError(JsonRpcErrorCode.INVALID_PARAMS, "Missing 'name' parameter");
    }

    const rawArguments = params?.arguments ?? {};
    if (!isPlainObject(rawArguments)) {
      throw new JsonRpcError(JsonRpcErrorCode.INVALID_PARAMS, 'Invalid parameters: arguments must be an object', {
        path: []
      });
    }

    const visible = this.sessions.get(context.sessionId) ?? this.registry.getAllTools();
    const tool = visible.get(toolName);
    if (!tool) {
      metrics.increment(MetricNames.TOOL_CALLS_DENIED);
      throw new JsonRpcError(
        JsonRpcErrorCode.METHOD_NOT_FOUND,
        `Tool '${toolName}' not available or blocked by gating`
      );
    }

    if (!hasScope(tool, context.scopes)) {
      metrics.increment(MetricNames.TOOL_CALLS_DENIED);
      logger.warn('Tool call denied by scope', {
        request_id: context.requestId,
        session_id: context.sessionId,
        tool: toolName
      });
      throw new JsonRpcError(
        JsonRpcErrorCode.METHOD_NOT_FOUND,
        `Insufficient permissions. Required scopes: ${requiredScopesOf(tool).join(', ')}`
      );
    }

    if (tool.requestSchema) {
      const validate = this.validator(this.requestValidators, tool.name, tool.requestSchema);
      if (!validate(rawArguments)) {
        const error = validate.errors?.[0];
        throw new JsonRpcError(
          JsonRpcErrorCode.INVALID_PARAMS,
          `Invalid parameters: ${error?.message ?? 'validation failed'}`,
          { path: error ? errorPath(error) : [] }
        );
      }
    }

    const handler = this.registry.getHandler(toolName);
    if (!handler) {
      throw new JsonRpcError(JsonRpcErrorCode.METHOD_NOT_FOUND, `Handler for '${toolName}' not found`);
    }

    const logContext = { request_id: context.requestId, session_id: context.sessionId };
    const traceId = logger.startToolCall(toolName, rawArguments, logContext);
    const timer = metrics.startTimer(MetricNames.TOOL_DURATION_MS);
    metrics.increment(MetricNames.TOOL_CALLS_TOTAL);

    let result: unknown;
    try {
      result = await handler(rawArguments);
    } catch (error) {
      timer.stop();
      metrics.increment(MetricNames.TOOL_CALLS_FAILED);
      logger.toolError(traceId, error, logContext);
      throw new JsonRpcError(
        JsonRpcErrorCode.INTERNAL_ERROR,
        `Tool execution failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    timer.stop();
    metrics.increment(MetricNames.TOOL_CALLS_SUCCESS);
    logger.endToolCall(traceId, true);

    const validateResponse = this.validator(this.responseValidators, tool.name, tool.responseSchema);
    if (!validateResponse(result)) {
      logger.warn(`Response validation failed for ${toolName}`, {
        ...logContext,
        error: this.ajv.errorsText(validateResponse.errors)
      });
    }

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) ?? 'null' }]
    };
  }

  promptsList(context: RequestContext): Record<string, unknown> {
    logger.info('prompts/list called', { request_id: context.requestId, session_id: context.sessionId });
    return {
      prompts: [
        {
          name: INTENT_PROMPT_NAME,
          description: 'How to use natural language queries for task routing'
        }
      ]
    };
  }

  promptsGet(params: RpcParams, context: RequestContext): Record<string, unknown> {
    const name = params?.name;
    if (name !== INTENT_PROMPT_NAME) {
      throw new JsonRpcError(JsonRpcErrorCode.INVALID_PARAMS, `Unknown prompt name: ${String(name)}`);
    }

    logger.info('prompts/get called', { request_id: context.requestId, session_id: context.sessionId, name });
    return {
      description: 'Guide to using natural language queries',
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text:
              'You can supply a natural language query in tools/list params ' +
              '(for example {"query": "show me my zfs pools"}). ' +
              'The server will classify it into task types and list only the matching tools. ' +
              'Send an X-Task-Type header or a task_type param to choose a task type explicitly.'
          }
        }
      ]
    };
  }

  private validator(cache: Map<string, ValidateFunction>, name: string, schema: JsonSchema): ValidateFunction {
    let validate = cache.get(name);
    if (!validate) {
      validate = this.ajv.compile(schema);
      cache.set(name, validate);
    }
    return validate;
  }
}
