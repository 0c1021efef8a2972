import { afterEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import type { LogEntry } from '../../src/utils/logger.js';
import { buildHandler, buildRegistry, group, requestContext } from './fixtures.js';

function accountRegistry() {
  return buildRegistry([
    group('account', [
      ['set_password', async args => ({ updated: args.username }), 'Set an account password', {
        username: { type: 'string', required: true },
        password: { type: 'string', required: true },
        api_key: { type: 'string', required: false }
      }]
    ])
  ]);
}

describe('server/tool call logging', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('masks credential arguments in the tool call trace', async () => {
    const { handler } = buildHandler({ registry: accountRegistry() });
    const stderr = sinon.stub(console, 'error');

    await handler.toolsCall(
      { name: 'set_password', arguments: { username: 'alice', password: 'test-secret', api_key: 'test-key' } },
      requestContext()
    );

    const lines = stderr.getCalls().map(call => String(call.args[0]));
    expect(lines.some(line => line.includes('test-secret'))).to.equal(false);
    expect(lines.some(line => line.includes('test-key'))).to.equal(false);

    const entries: LogEntry[] = lines.map(line => JSON.parse(line));
    const started = entries.find(entry => entry.message === 'Tool call started: set_password');
    expect(started?.context?.params).to.deep.equal({
      username: 'alice',
      password: '[REDACTED]',
      api_key: '[REDACTED]'
    });
  });
});
