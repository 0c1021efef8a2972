import { afterEach, beforeEach, describe, it } from 'mocha';
import { expect } from 'chai';
import sinon from 'sinon';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildDefaultAllowlists, loadFilterConfig } from '../../src/config/filter-config.js';
import { ConfigError, ErrorCode } from '../../src/errors/index.js';
import { logger } from '../../src/utils/logger.js';
import { makeTool, toolMap } from '../helpers.js';

const TOOLS = toolMap(
  makeTool('list_pools', ['storage-ops']),
  makeTool('list_snapshots', ['snapshot-ops', 'storage-ops']),
  makeTool('list_users', ['user-ops'])
);

describe('config/filter-config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-filter-config-'));
  });

  afterEach(() => {
    sinon.restore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const file = path.join(tmpDir, 'filter-config.json');
    fs.writeFileSync(file, contents);
    return file;
  }

  function load(filterConfigPath: string) {
    return loadFilterConfig({ filterConfigPath, defaultMaxTools: 12 }, TOOLS);
  }

  it('builds one allowlist per task type from the tool tags', () => {
    expect(buildDefaultAllowlists(TOOLS)).to.deep.equal({
      'storage-ops': ['list_pools', 'list_snapshots'],
      'snapshot-ops': ['list_snapshots'],
      'user-ops': ['list_users']
    });
  });

  it('uses the defaults when the file does not exist', () => {
    const warn = sinon.stub(logger, 'warn');
    const loaded = load(path.join(tmpDir, 'absent.json'));

    expect(loaded.config).to.deep.equal({
      taskTypeAllowlists: buildDefaultAllowlists(TOOLS),
      maxTools: 12,
      blocklist: []
    });
    expect(loaded.intentKeywords).to.equal(undefined);
    expect(warn.calledOnce).to.equal(true);
  });

  it('reads allowlists, cap, blocklist and keyword overrides', () => {
    const file = writeConfig(JSON.stringify({
      task_type_allowlists: { 'storage-ops': ['list_pools'] },
      max_tools: 4,
      blocklist: ['list_users'],
      intent_keywords: { 'storage-ops': ['tank'] }
    }));

    const loaded = load(file);

    expect(loaded.config).to.deep.equal({
      taskTypeAllowlists: { 'storage-ops': ['list_pools'] },
      maxTools: 4,
      blocklist: ['list_users']
    });
    expect(loaded.intentKeywords).to.deep.equal({ 'storage-ops': ['tank'] });
  });

  it('falls back per field on empty or null values', () => {
    const file = writeConfig(JSON.stringify({
      task_type_allowlists: {},
      max_tools: 0,
      blocklist: null,
      intent_keywords: {}
    }));

    const loaded = load(file);

    expect(loaded.config).to.deep.equal({
      taskTypeAllowlists: buildDefaultAllowlists(TOOLS),
      maxTools: 12,
      blocklist: []
    });
    expect(loaded.intentKeywords).to.equal(undefined);
  });

  it('treats invalid JSON as fatal', () => {
    const file = writeConfig('{"max_tools": 4,');
    expect(() => load(file))
      .to.throw(ConfigError)
      .with.property('code', ErrorCode.CONFIG_MALFORMED_JSON);
  });

  it('treats a wrongly shaped file as fatal', () => {
    const file = writeConfig(JSON.stringify({ max_tools: 'ten' }));
    expect(() => load(file))
      .to.throw(ConfigError, `Invalid configuration for ${file}: max_tools`)
      .with.property('code', ErrorCode.CONFIG_INVALID);
  });
});
