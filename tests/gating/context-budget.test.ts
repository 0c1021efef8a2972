import { afterEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import { ContextBudgetEstimator, serializableTool } from '../../src/gating/context-budget.js';
import { ToolGateController, type GateSettings } from '../../src/gating/gate-controller.js';
import { approxTokenCounter, type TokenCounter } from '../../src/utils/tokenizer.js';
import { logger } from '../../src/utils/logger.js';
import type { Tool } from '../../src/types.js';
import { DEFAULT_POLICY, makeTool, toolMap } from '../helpers.js';

const CATALOG = toolMap(
  makeTool('list_pools', ['storage-ops']),
  makeTool('get_pool', ['storage-ops']),
  makeTool('create_user', ['user-ops'])
);

const SETTINGS: GateSettings = { ...DEFAULT_POLICY, defaultMaxTools: 12 };

function approxSize(tool: Tool): number {
  return approxTokenCounter.count(JSON.stringify(serializableTool(tool)));
}

const brokenCounter: TokenCounter = {
  mode: 'tiktoken',
  count: () => {
    throw new Error('encoder unavailable');
  }
};

describe('gating/context-budget', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('counts with tiktoken by default', () => {
    sinon.stub(logger, 'info');
    const gate = new ToolGateController(CATALOG, { taskTypeAllowlists: {}, maxTools: 10, blocklist: [] }, SETTINGS);

    expect(gate.estimatorMode).to.equal('tiktoken');
    expect(gate.getContextSize(CATALOG)).to.be.greaterThan(0);
  });

  it('uses the approximation when asked to', () => {
    const estimator = new ContextBudgetEstimator(CATALOG, 'approx', () => brokenCounter);

    expect(estimator.mode).to.equal('approx');
  });

  it('uses the approximation when tiktoken cannot be loaded', () => {
    const estimator = new ContextBudgetEstimator(CATALOG, 'auto', () => null);

    expect(estimator.mode).to.equal('approx');
  });

  it('falls back to the approximation when the tokenizer fails during precompute', () => {
    const warn = sinon.stub(logger, 'warn');

    const estimator = new ContextBudgetEstimator(CATALOG, 'auto', () => brokenCounter);

    const expected = [...CATALOG.values()].reduce((sum, tool) => sum + approxSize(tool), 0);
    expect(estimator.mode).to.equal('approx');
    expect(estimator.catalogSize).to.equal(expected);
    expect(estimator.estimate(CATALOG)).to.equal(expected);
    expect(warn.calledOnceWith('Tokenizer failed during precompute; falling back to approximation', {
      error: 'encoder unavailable'
    })).to.equal(true);
  });

  it('counts an unknown tool set from its serialized form', () => {
    const estimator = new ContextBudgetEstimator(CATALOG, 'approx');
    const extra = makeTool('list_shares', ['sharing-ops']);
    const tools = toolMap(extra);

    expect(estimator.estimate(tools)).to.equal(
      approxTokenCounter.count(JSON.stringify([serializableTool(extra)]))
    );
  });
});
