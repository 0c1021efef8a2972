import { afterEach, beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import { ApplianceHttpClient } from '../../src/client/appliance-client.js';
import { ErrorCode, GatewayError } from '../../src/errors/index.js';
import { logger } from '../../src/utils/logger.js';
import { rejectionOf } from '../helpers.js';

const SETTINGS = {
  url: 'http://nas.test/',
  apiKey: 'test-secret',
  timeoutMs: 1000,
  maxRetries: 3,
  retryBackoffMs: 0
};

interface FetchCall {
  url: string;
  init?: RequestInit;
}

function fakeFetch(...steps: Array<Response | Error>): { fetchImpl: typeof fetch; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    const step = steps.shift();
    if (step === undefined) {
      throw new Error('unexpected request');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  };
  return { fetchImpl, calls };
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

async function gatewayError(promise: Promise<unknown>): Promise<GatewayError> {
  const error = await rejectionOf(promise);
  expect(error).to.be.instanceOf(GatewayError);
  if (!(error instanceof GatewayError)) {
    throw error;
  }
  return error;
}

describe('client/appliance-client', () => {
  beforeEach(() => {
    sinon.stub(logger, 'warn');
    sinon.stub(logger, 'error');
  });

  afterEach(() => {
    sinon.restore();
  });

  it('builds the API url with query parameters and sends the API key', async () => {
    const { fetchImpl, calls } = fakeFetch(json(200, [{ name: 'tank' }]));
    const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

    const result = await client.get('/pool', { limit: 5, offset: undefined });

    expect(result).to.deep.equal([{ name: 'tank' }]);
    expect(calls).to.have.length(1);
    expect(calls[0].url).to.equal('http://nas.test/api/v2.0/pool?limit=5');
    expect(calls[0].init?.method).to.equal('GET');
    expect(calls[0].init?.body).to.equal(undefined);
    expect(calls[0].init?.headers).to.deep.include({ Authorization: 'Bearer test-secret' });
  });

  it('serializes request bodies', async () => {
    const { fetchImpl, calls } = fakeFetch(json(200, 7));
    const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

    expect(await client.post('/user', { username: 'alice' })).to.equal(7);
    expect(calls[0].init?.method).to.equal('POST');
    expect(calls[0].init?.body).to.equal('{"username":"alice"}');
  });

  it('returns null for empty responses', async () => {
    const { fetchImpl } = fakeFetch(new Response(null, { status: 204 }));
    const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

    expect(await client.delete('/zfs/snapshot/id/tank%40daily')).to.equal(null);
  });

  it('retries server errors and returns the eventual success', async () => {
    const { fetchImpl, calls } = fakeFetch(new Response('busy', { status: 500 }), json(200, { ok: true }));
    const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

    expect(await client.get('/system/info')).to.deep.equal({ ok: true });
    expect(calls).to.have.length(2);
    expect(client.getStats()).to.deep.equal({ requests: 2, errors: 1 });
  });

  it('gives up after the configured number of attempts', async () => {
    const { fetchImpl, calls } = fakeFetch(
      new Response('down', { status: 503 }),
      new Response('down', { status: 503 }),
      new Response('still down', { status: 503 })
    );
    const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

    const error = await gatewayError(client.get('/pool'));

    expect(error.code).to.equal(ErrorCode.APPLIANCE_API);
    expect(error.message).to.equal('Appliance API error (503): still down');
    expect(calls).to.have.length(3);
  });

  it('reports connection failures', async () => {
    const { fetchImpl, calls } = fakeFetch(
      new TypeError('fetch failed'),
      new TypeError('fetch failed'),
      new TypeError('fetch failed')
    );
    const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

    const error = await gatewayError(client.get('/pool'));

    expect(error.code).to.equal(ErrorCode.APPLIANCE_CONNECTION);
    expect(error.message).to.equal('Connection failed after 3 attempts');
    expect(calls).to.have.length(3);
  });

  it('reports timeouts', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const { fetchImpl } = fakeFetch(timeout);
    const client = new ApplianceHttpClient({ ...SETTINGS, maxRetries: 1 }, { fetchImpl });

    const error = await gatewayError(client.get('/pool'));
    expect(error.code).to.equal(ErrorCode.APPLIANCE_TIMEOUT);
  });

  const clientErrors: Array<[number, ErrorCode]> = [
    [401, ErrorCode.APPLIANCE_AUTH],
    [403, ErrorCode.APPLIANCE_AUTH],
    [404, ErrorCode.APPLIANCE_NOT_FOUND],
    [429, ErrorCode.APPLIANCE_RATE_LIMITED],
    [422, ErrorCode.APPLIANCE_API]
  ];

  for (const [status, code] of clientErrors) {
    it(`maps HTTP ${status} without retrying`, async () => {
      const { fetchImpl, calls } = fakeFetch(new Response('nope', { status }));
      const client = new ApplianceHttpClient(SETTINGS, { fetchImpl });

      const error = await gatewayError(client.get('/pool/id/tank'));

      expect(error.code).to.equal(code);
      expect(calls).to.have.length(1);
    });
  }
});
