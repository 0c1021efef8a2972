import { buildDefaultAllowlists } from '../../src/config/filter-config.js';
import { ToolGateController, type GateSettings } from '../../src/gating/gate-controller.js';
import { KeywordIntentClassifier } from '../../src/intent/classifier.js';
import { GatewayProtocolHandler, type HandlerSettings, type RequestContext } from '../../src/server/protocol-handler.js';
import { MetaTools } from '../../src/tools/meta.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import type { FilterConfig, ToolDefinition, ToolGroup } from '../../src/types.js';

export function group(groupName: string, definitions: ToolDefinition[]): ToolGroup {
  return { groupName, getToolDefinitions: () => definitions };
}

/**
 * Registry with storage, user, debug and meta tools backed by canned handlers.
 */
export function buildRegistry(extraGroups: ToolGroup[] = []): ToolRegistry {
  const registry = new ToolRegistry([
    group('storage', [
      [
        'list_pools',
        async args => ({ pools: ['tank'], limit: args.limit ?? null }),
        'List pools',
        { limit: { type: 'integer', required: false, minimum: 1, maximum: 500 } }
      ],
      ['get_pool', async args => ({ name: args.pool_name }), 'Get a pool', {
        pool_name: { type: 'string', required: true }
      }]
    ]),
    group('user', [
      ['create_user', async args => ({ created: args.username }), 'Create a user', {
        username: { type: 'string', required: true }
      }]
    ]),
    group('debug', [
      ['failing_tool', async () => {
        throw new Error('appliance unreachable');
      }, 'Always fails', {}]
    ]),
    ...extraGroups
  ]);
  registry.register(new MetaTools(registry));
  return registry;
}

export const HANDLER_SETTINGS: HandlerSettings = {
  intentClassificationEnabled: true,
  intentPrecedence: 'intent'
};

export const GATE_SETTINGS: GateSettings = {
  intentPrecedence: 'intent',
  intentFallbackToAll: true,
  strictContextLimit: false,
  defaultMaxTools: 10
};

export interface HandlerFixture {
  registry: ToolRegistry;
  gate: ToolGateController;
  handler: GatewayProtocolHandler;
}

export function buildHandler(
  options: {
    registry?: ToolRegistry;
    config?: Partial<FilterConfig>;
    gateSettings?: Partial<GateSettings>;
    handlerSettings?: Partial<HandlerSettings>;
  } = {}
): HandlerFixture {
  const registry = options.registry ?? buildRegistry();
  const tools = registry.getAllTools();
  const config: FilterConfig = {
    taskTypeAllowlists: buildDefaultAllowlists(tools),
    maxTools: 10,
    blocklist: [],
    ...options.config
  };
  const gate = new ToolGateController(tools, config, { ...GATE_SETTINGS, ...options.gateSettings }, {
    estimator: 'approx'
  });
  const handler = new GatewayProtocolHandler(registry, gate, new KeywordIntentClassifier(), {
    ...HANDLER_SETTINGS,
    ...options.handlerSettings
  });
  return { registry, gate, handler };
}

export function requestContext(overrides: Partial<RequestContext> = {}): RequestContext {
  return { requestId: 'req-test', sessionId: 'session-a', scopes: new Set<string>(), ...overrides };
}
