import { afterEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import { ErrorCode, GatewayError } from '../../src/errors/index.js';
import { SnapshotTools } from '../../src/tools/snapshots.js';
import { logger } from '../../src/utils/logger.js';
import { FakeAppliance, rejectionOf } from '../helpers.js';

const SNAPSHOTS = [
  {
    name: 'tank/data@daily-1',
    properties: { creation: { parsed: { $date: 1700000000000 } }, used: { value: '12K' } },
    holds: {}
  },
  {
    name: 'tank/home@weekly',
    properties: { creation: { rawvalue: '1699990000' } }
  },
  {
    name: 'tank/data@daily-2',
    properties: { creation: { parsed: { $date: 1700003600000 } } },
    holds: { replication: 1 }
  }
];

function tools(allowDestructive = false) {
  const client = new FakeAppliance({ 'GET /zfs/snapshot': () => SNAPSHOTS });
  return { client, snapshots: new SnapshotTools(client, { allowDestructive }) };
}

async function gatewayError(promise: Promise<unknown>): Promise<GatewayError> {
  const error = await rejectionOf(promise);
  if (!(error instanceof GatewayError)) {
    expect.fail(`expected a GatewayError, got ${String(error)}`);
  }
  return error;
}

describe('tools/snapshots', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('lists snapshots newest first with per-dataset counts', async () => {
    const { snapshots } = tools();

    const result = await snapshots.listSnapshots({});

    expect(result.snapshots).to.deep.equal([
      {
        name: 'tank/data@daily-2',
        dataset: 'tank/data',
        snapshot_name: 'daily-2',
        created: 1700003600,
        created_human: '2023-11-14T23:13:20.000Z',
        used: null,
        referenced: null,
        holds: 1
      },
      {
        name: 'tank/data@daily-1',
        dataset: 'tank/data',
        snapshot_name: 'daily-1',
        created: 1700000000,
        created_human: '2023-11-14T22:13:20.000Z',
        used: '12K',
        referenced: null,
        holds: 0
      },
      {
        name: 'tank/home@weekly',
        dataset: 'tank/home',
        snapshot_name: 'weekly',
        created: 1699990000,
        created_human: '2023-11-14T19:26:40.000Z',
        used: null,
        referenced: null,
        holds: 0
      }
    ]);
    expect(result.metadata).to.deep.equal({ by_dataset: { 'tank/data': 2, 'tank/home': 1 }, held_snapshots: 1 });
  });

  it('passes the dataset filter to the appliance and applies it locally', async () => {
    const { client, snapshots } = tools();

    const result = await snapshots.listSnapshots({ dataset: 'tank/home' });

    expect(client.calls[0].payload).to.deep.equal({ dataset: 'tank/home' });
    expect(result.pagination).to.deep.equal({ total: 1, limit: 100, offset: 0, returned: 1, has_more: false });
  });

  it('creates a snapshot', async () => {
    const { client, snapshots } = tools();

    const result = await snapshots.createSnapshot({ dataset: 'tank/data', name: 'before-upgrade' });

    expect(client.calls).to.deep.equal([{
      method: 'POST',
      path: '/zfs/snapshot',
      payload: { dataset: 'tank/data', name: 'before-upgrade', recursive: false }
    }]);
    expect(result.message).to.equal("Snapshot 'tank/data@before-upgrade' created successfully");
  });

  it('rejects snapshot names with spaces', async () => {
    const { client, snapshots } = tools();

    const error = await gatewayError(snapshots.createSnapshot({ dataset: 'tank/data', name: 'before upgrade' }));

    expect(error.message).to.equal('Invalid input for name: name may only contain letters, digits and _ . : -');
    expect(client.calls).to.deep.equal([]);
  });

  it('rolls back when destructive operations are enabled', async () => {
    const { client, snapshots } = tools(true);

    await snapshots.rollbackSnapshot({ snapshot: 'tank/data@daily-1', force: true });

    expect(client.calls).to.deep.equal([{
      method: 'POST',
      path: '/zfs/snapshot/rollback',
      payload: { id: 'tank/data@daily-1', options: { force: true } }
    }]);
  });

  it('refuses deletion when destructive operations are disabled', async () => {
    const warn = sinon.stub(logger, 'warn');
    const { client, snapshots } = tools();

    const error = await gatewayError(snapshots.deleteSnapshot({ snapshot: 'tank/data@daily-1' }));

    expect(error.code).to.equal(ErrorCode.OPERATION_DISABLED);
    expect(error.message).to.equal(
      'Destructive operation "delete_snapshot" is disabled. Set ENABLE_DESTRUCTIVE_OPERATIONS=true to allow it.'
    );
    expect(warn.calledOnce).to.equal(true);
    expect(client.calls).to.deep.equal([]);
  });

  it('deletes by the encoded snapshot id', async () => {
    const { client, snapshots } = tools(true);

    await snapshots.deleteSnapshot({ snapshot: 'tank/data@daily-1' });

    expect(client.calls[0]).to.deep.equal({
      method: 'DELETE',
      path: '/zfs/snapshot/id/tank%2Fdata%40daily-1',
      payload: undefined
    });
  });

  it('validates snapshot references before anything else', async () => {
    const { snapshots } = tools();

    const error = await gatewayError(snapshots.rollbackSnapshot({ snapshot: 'tank/data' }));

    expect(error.code).to.equal(ErrorCode.INVALID_INPUT);
    expect(error.message).to.equal('Invalid input for snapshot: snapshot must look like dataset@name');
  });
});
