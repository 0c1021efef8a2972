import { afterEach, beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import { serializableTool } from '../../src/gating/context-budget.js';
import { ToolGateController, type GateSettings } from '../../src/gating/gate-controller.js';
import { ContextBudgetExceededError } from '../../src/errors/index.js';
import { approxTokenCounter } from '../../src/utils/tokenizer.js';
import { logger } from '../../src/utils/logger.js';
import { metrics, MetricNames } from '../../src/utils/metrics.js';
import type { FilterConfig, Tool } from '../../src/types.js';
import { DEFAULT_POLICY, context, makeTool, toolMap } from '../helpers.js';

const SETTINGS: GateSettings = { ...DEFAULT_POLICY, defaultMaxTools: 12 };

const CATALOG = toolMap(
  makeTool('list_pools', ['storage-ops']),
  makeTool('get_pool', ['storage-ops']),
  makeTool('create_user', ['user-ops']),
  makeTool('list_tool_catalog', ['meta-ops'])
);

const CONFIG: FilterConfig = {
  taskTypeAllowlists: {
    'storage-ops': ['list_pools', 'get_pool'],
    'user-ops': ['create_user'],
    'meta-ops': ['list_tool_catalog'],
    'apps-ops': []
  },
  maxTools: 10,
  blocklist: []
};

function approxSize(tool: Tool): number {
  return approxTokenCounter.count(JSON.stringify(serializableTool(tool)));
}

describe('gating/gate-controller', () => {
  beforeEach(() => {
    metrics.reset();
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('getAvailableTools', () => {
    it('reports the task-type stage when it narrows the set', () => {
      const gate = new ToolGateController(CATALOG, CONFIG, SETTINGS, { estimator: 'approx' });
      const decision = gate.getAvailableTools(context({ taskType: 'storage-ops' }));
      expect([...decision.tools.keys()]).to.deep.equal(['list_pools', 'get_pool']);
      expect(decision.filtersApplied).to.deep.equal(['TaskTypeFilter']);
    });

    it('reports every stage that changed the set, in pipeline order', () => {
      const gate = new ToolGateController(
        CATALOG,
        { ...CONFIG, maxTools: 2, blocklist: ['get_pool'] },
        SETTINGS,
        { estimator: 'approx' }
      );
      const decision = gate.getAvailableTools(context());
      expect([...decision.tools.keys()]).to.deep.equal(['create_user']);
      expect(decision.filtersApplied).to.deep.equal(['TaskTypeFilter', 'ResourceFilter', 'SecurityFilter']);
    });

    it('reports no stages when nothing was removed', () => {
      const gate = new ToolGateController(CATALOG, CONFIG, SETTINGS, { estimator: 'approx' });
      const decision = gate.getAvailableTools(context({ taskType: 'apps-ops' }));
      expect(decision.tools.size).to.equal(4);
      expect(decision.filtersApplied).to.deep.equal([]);
    });

    it('falls back to the default max tools when the config cap is zero', () => {
      const gate = new ToolGateController(CATALOG, { ...CONFIG, maxTools: 0 }, { ...SETTINGS, defaultMaxTools: 1 }, {
        estimator: 'approx'
      });
      const decision = gate.getAvailableTools(context({ taskType: 'storage-ops' }));
      expect([...decision.tools.keys()]).to.deep.equal(['get_pool']);
    });

    it('leaves the catalog untouched between requests', () => {
      const gate = new ToolGateController(CATALOG, CONFIG, SETTINGS, { estimator: 'approx' });
      gate.getAvailableTools(context({ taskType: 'user-ops' }));
      expect(gate.listActiveTools()).to.deep.equal(['list_pools', 'get_pool', 'create_user', 'list_tool_catalog']);
    });
  });

  describe('getContextSize', () => {
    it('sums the precomputed per-tool sizes', () => {
      const gate = new ToolGateController(CATALOG, CONFIG, SETTINGS, { estimator: 'approx' });
      const subset = toolMap(makeTool('list_pools', ['storage-ops']), makeTool('get_pool', ['storage-ops']));
      const expected = approxSize(makeTool('list_pools', ['storage-ops'])) + approxSize(makeTool('get_pool', ['storage-ops']));

      expect(gate.estimatorMode).to.equal('approx');
      expect(gate.getContextSize(subset)).to.equal(expected);
      expect(gate.getContextSize(new Map())).to.equal(0);
    });

    it('estimates tools outside the catalog from their serialized form', () => {
      const gate = new ToolGateController(CATALOG, CONFIG, SETTINGS, { estimator: 'approx' });
      const stranger = makeTool('not_in_catalog', ['storage-ops']);
      const expected = approxTokenCounter.count(JSON.stringify([serializableTool(stranger)]));
      expect(gate.getContextSize(toolMap(stranger))).to.equal(expected);
    });

    it('warns above the advisory threshold without raising', () => {
      const errorStub = sinon.stub(logger, 'error');
      const warnStub = sinon.stub(logger, 'warn');
      const mid = makeTool('mid_tool', ['storage-ops'], { description: 'x'.repeat(24000) });
      const gate = new ToolGateController(toolMap(mid), CONFIG, SETTINGS, { estimator: 'approx' });

      const size = gate.getContextSize(toolMap(mid));

      expect(size).to.equal(approxSize(mid));
      expect(size).to.be.above(5000).and.below(7600);
      expect(errorStub.called).to.equal(false);
      expect(warnStub.calledWith('Context size exceeds recommended threshold')).to.equal(true);
    });

    it('logs and returns the count above the hard limit when enforcement is off', () => {
      const errorStub = sinon.stub(logger, 'error');
      sinon.stub(logger, 'warn');
      const huge = makeTool('huge_tool', ['storage-ops'], { description: 'x'.repeat(40000) });
      const gate = new ToolGateController(toolMap(huge), CONFIG, SETTINGS, { estimator: 'approx' });

      const size = gate.getContextSize(toolMap(huge), false);

      expect(size).to.equal(approxSize(huge));
      expect(size).to.be.above(7600);
      expect(errorStub.calledOnce).to.equal(true);
      expect(metrics.getCounter(MetricNames.CONTEXT_LIMIT_EXCEEDED)).to.equal(1);
    });

    it('raises above the hard limit when enforcement is on', () => {
      const errorStub = sinon.stub(logger, 'error');
      const huge = makeTool('huge_tool', ['storage-ops'], { description: 'x'.repeat(40000) });
      const gate = new ToolGateController(toolMap(huge), CONFIG, SETTINGS, { estimator: 'approx' });

      expect(() => gate.getContextSize(toolMap(huge), true)).to.throw(ContextBudgetExceededError, /exceeds hard limit of 7600 tokens/);
      expect(errorStub.calledOnce).to.equal(true);
    });

    it('reads enforcement from the strict context limit setting by default', () => {
      sinon.stub(logger, 'error');
      const huge = makeTool('huge_tool', ['storage-ops'], { description: 'x'.repeat(40000) });
      const gate = new ToolGateController(toolMap(huge), CONFIG, { ...SETTINGS, strictContextLimit: true }, {
        estimator: 'approx'
      });

      expect(() => gate.getContextSize(toolMap(huge))).to.throw(ContextBudgetExceededError);
    });
  });
});
