/**
 * Storage MCP Gateway Type Definitions
 *
 * Tool descriptors, per-request filter context and the gating configuration
 * shared by the filters, the gate controller and the protocol handler.
 */

/**
 * JSON-Schema-like structure describing tool arguments or results
 */
export type JsonSchema = Record<string, unknown>;

/**
 * Immutable tool descriptor built once from the registry
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly method: string;
  readonly path: string;
  readonly requestSchema?: JsonSchema;
  readonly responseSchema: JsonSchema;
  readonly taskTypes: readonly string[];
  readonly priority: number;
  readonly requiredScopes?: readonly string[];
}

/**
 * Ordered tool set keyed by tool name
 */
export type ToolMap = Map<string, Tool>;

/**
 * Per-request filtering context.
 *
 * `detectedTaskTypes` is `undefined` when the classifier did not run and an
 * empty array when it ran and matched nothing.
 */
export interface FilterContext {
  taskType?: string;
  clientId?: string;
  sessionId?: string;
  requestId: string;
  query?: string;
  detectedTaskTypes?: string[];
  intentConfidence?: Record<string, number>;
}

/**
 * Process-wide gating configuration
 */
export interface FilterConfig {
  taskTypeAllowlists: Record<string, string[]>;
  maxTools: number;
  blocklist: string[];
}

/**
 * Which label source wins when both an explicit task type and detected
 * intents are present
 */
export type IntentPrecedence = 'intent' | 'explicit';

/**
 * Active context-size estimator
 */
export type EstimatorMode = 'tiktoken' | 'approx';

/**
 * Uniform tool handler signature; each handler destructures its own arguments
 */
export type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

/**
 * Declared parameter of a tool, compiled into a JSON Schema property
 */
export interface ParameterSpec {
  type: string;
  description?: string;
  required?: boolean;
  enum?: unknown[];
  items?: JsonSchema;
  format?: string;
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

/**
 * `(name, handler, description, parameters)` entry exposed by a tool group
 */
export type ToolDefinition = readonly [
  name: string,
  handler: ToolHandler,
  description: string,
  parameters: Record<string, ParameterSpec>
];

/**
 * A group of related tool handlers (storage, snapshots, users, ...)
 */
export interface ToolGroup {
  readonly groupName: string;
  getToolDefinitions(): ToolDefinition[];
}
