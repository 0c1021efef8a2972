import { afterEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import { ConfigError, ErrorCode } from '../../src/errors/index.js';
import { ToolRegistry, buildInputSchema, createToolGroups, createToolRegistry } from '../../src/tools/index.js';
import { logger } from '../../src/utils/logger.js';
import type { ToolDefinition, ToolGroup } from '../../src/types.js';
import { FakeAppliance } from '../helpers.js';

const noop = async () => null;

function group(groupName: string, names: string[]): ToolGroup {
  return {
    groupName,
    getToolDefinitions: () => names.map((name): ToolDefinition => [name, noop, `${name} tool`, {}])
  };
}

const FLAGS = { enableDebugTools: false, enableDestructiveOperations: false };

describe('tools/registry', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('compiles parameter specs into a JSON schema', () => {
    expect(buildInputSchema({
      pool_name: { type: 'string', required: true, description: 'Name of the pool' },
      limit: { type: 'integer', minimum: 1, maximum: 500 },
      compression: { type: 'string', enum: ['lz4', 'off'] },
      networks: { type: 'array', items: { type: 'string' } }
    })).to.deep.equal({
      type: 'object',
      properties: {
        pool_name: { type: 'string', description: 'Name of the pool' },
        limit: { type: 'integer', minimum: 1, maximum: 500 },
        compression: { type: 'string', enum: ['lz4', 'off'] },
        networks: { type: 'array', items: { type: 'string' } }
      },
      required: ['pool_name']
    });
  });

  it('tags tools with the task types of their group', () => {
    const registry = new ToolRegistry([group('storage', ['list_pools']), group('snapshot', ['list_snapshots'])]);
    expect(registry.getTool('list_pools')).to.deep.include({
      taskTypes: ['storage-ops'],
      requiredScopes: ['storage-ops'],
      method: 'rpc',
      path: '/tools/list_pools',
      priority: 0,
      responseSchema: { type: 'object' }
    });
    expect(registry.getTool('list_snapshots')?.taskTypes).to.deep.equal(['snapshot-ops']);
  });

  it('tags tools of unmapped groups with the fallback task type', () => {
    const registry = new ToolRegistry([group('replication', ['list_tasks'])]);
    expect(registry.getTool('list_tasks')?.taskTypes).to.deep.equal(['appliance-ops']);
  });

  it('freezes descriptors and hands out catalog copies', () => {
    const registry = new ToolRegistry([group('storage', ['list_pools'])]);
    expect(Object.isFrozen(registry.getTool('list_pools'))).to.equal(true);

    registry.getAllTools().clear();
    expect(registry.size).to.equal(1);
    expect(registry.getHandler('list_pools')).to.equal(noop);
  });

  it('rejects duplicate tool names', () => {
    expect(() => new ToolRegistry([group('storage', ['list_pools']), group('user', ['list_pools'])]))
      .to.throw(ConfigError, 'Duplicate tool name: list_pools')
      .with.property('code', ErrorCode.DUPLICATE_TOOL);
  });

  it('skips a group whose definitions cannot be read', () => {
    const errorStub = sinon.stub(logger, 'error');
    const broken: ToolGroup = {
      groupName: 'user',
      getToolDefinitions: () => {
        throw new Error('not ready');
      }
    };

    const registry = new ToolRegistry([broken, group('storage', ['list_pools'])]);

    expect([...registry.getAllTools().keys()]).to.deep.equal(['list_pools']);
    expect(errorStub.calledOnce).to.equal(true);
  });

  describe('createToolRegistry', () => {
    it('registers the appliance groups and the catalog tool', () => {
      const registry = createToolRegistry(new FakeAppliance(), FLAGS);
      const names = [...registry.getAllTools().keys()];

      expect(names).to.include.members(['list_pools', 'list_snapshots', 'list_users', 'list_smb_shares']);
      expect(names[names.length - 1]).to.equal('list_tool_catalog');
      expect(registry.getTool('list_tool_catalog')?.taskTypes).to.deep.equal(['meta-ops']);
      expect(names).to.not.include('get_system_info');
    });

    it('adds the diagnostic group when debug tools are enabled', () => {
      const groups = createToolGroups(new FakeAppliance(), { ...FLAGS, enableDebugTools: true });
      expect(groups.map(toolGroup => toolGroup.groupName)).to.deep.equal(['storage', 'snapshot', 'user', 'sharing', 'system']);

      const registry = createToolRegistry(new FakeAppliance(), { ...FLAGS, enableDebugTools: true });
      expect(registry.getTool('get_alerts')?.taskTypes).to.deep.equal(['debug-ops']);
    });
  });
});
