import { expect } from 'chai';
import type { ApplianceTransport, QueryParams } from '../src/client/appliance-client.js';
import type { GatingPolicy } from '../src/gating/tool-filter.js';
import type { FilterContext, Tool, ToolMap } from '../src/types.js';

export const DEFAULT_POLICY: GatingPolicy = {
  intentPrecedence: 'intent',
  intentFallbackToAll: true,
  strictContextLimit: false
};

export function makeTool(name: string, taskTypes: string[], overrides: Partial<Tool> = {}): Tool {
  return {
    name,
    description: `${name} tool`,
    method: 'rpc',
    path: `/tools/${name}`,
    responseSchema: { type: 'object' },
    taskTypes,
    priority: 0,
    requiredScopes: taskTypes,
    ...overrides
  };
}

export function toolMap(...tools: Tool[]): ToolMap {
  return new Map(tools.map(tool => [tool.name, tool]));
}

export function context(overrides: Partial<FilterContext> = {}): FilterContext {
  return { requestId: 'req-test', ...overrides };
}

/**
 * Await a promise that must reject and return the rejection.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  expect.fail('expected the promise to reject');
}

export interface RecordedCall {
  method: 'GET' | 'POST' | 'PUT' | 'DELETE';
  path: string;
  payload?: unknown;
}

export type Responder = (call: RecordedCall) => unknown;

/**
 * In-process appliance stand-in. Responders are keyed by `METHOD path` and
 * may throw to simulate an appliance error; unknown keys answer null.
 */
export class FakeAppliance implements ApplianceTransport {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly responses: Record<string, Responder> = {}) {}

  get(path: string, params?: QueryParams): Promise<unknown> {
    return this.respond({ method: 'GET', path, payload: params });
  }

  post(path: string, body?: unknown): Promise<unknown> {
    return this.respond({ method: 'POST', path, payload: body });
  }

  put(path: string, body?: unknown): Promise<unknown> {
    return this.respond({ method: 'PUT', path, payload: body });
  }

  delete(path: string, body?: unknown): Promise<unknown> {
    return this.respond({ method: 'DELETE', path, payload: body });
  }

  private async respond(call: RecordedCall): Promise<unknown> {
    this.calls.push(call);
    const responder = this.responses[`${call.method} ${call.path}`];
    return responder ? responder(call) : null;
  }
}
