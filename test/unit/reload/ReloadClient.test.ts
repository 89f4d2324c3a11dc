/**
 * Unit tests for ReloadClient
 */

import { expect } from 'chai';
import { describe, it, afterEach } from 'mocha';
import sinon from 'sinon';
import { ReloadClient, RELOAD_SERVICES, FetchFunction } from '../../../src/reload/ReloadClient.js';
import { buildSyncConfig } from '../../../src/config/syncConfig.js';
import { ConfigError } from '../../../src/errors/syncErrors.js';

const BASE_URL = 'http://ha.test:8123';

function okFetch(): sinon.SinonStub<Parameters<FetchFunction>, ReturnType<FetchFunction>> {
  return sinon.stub<Parameters<FetchFunction>, ReturnType<FetchFunction>>()
    .callsFake(async () => new Response('[]', { status: 200 }));
}

describe('ReloadClient', () => {
  afterEach(() => {
    sinon.restore();
  });

  it('should POST every reload service in order with the bearer token', async () => {
    const fetchFn = okFetch();
    const client = new ReloadClient({ baseUrl: `${BASE_URL}/`, token: 'test-token', fetchFn });

    const report = await client.reloadAll();

    expect(report.success).to.be.true;
    expect(fetchFn.callCount).to.equal(4);
    expect(fetchFn.getCalls().map(call => call.args[0])).to.deep.equal([
      `${BASE_URL}/api/services/homeassistant/reload_core_config`,
      `${BASE_URL}/api/services/automation/reload`,
      `${BASE_URL}/api/services/script/reload`,
      `${BASE_URL}/api/services/scene/reload`
    ]);

    const init = fetchFn.firstCall.args[1];
    expect(init.method).to.equal('POST');
    expect(init.headers).to.deep.equal({
      'Authorization': 'Bearer test-token',
      'Content-Type': 'application/json'
    });
    expect(report.results.map(r => r.name)).to.deep.equal(RELOAD_SERVICES.map(s => s.name));
  });

  it('should report an HTTP failure and keep going', async () => {
    const fetchFn = okFetch();
    fetchFn.onSecondCall().callsFake(async () => new Response('Invalid config for automation', { status: 500 }));
    const client = new ReloadClient({ baseUrl: BASE_URL, token: 'test-token', fetchFn });

    const report = await client.reloadAll();

    expect(report.success).to.be.false;
    expect(fetchFn.callCount).to.equal(4);
    expect(report.results[1]).to.deep.equal({
      name: 'automations',
      service: 'automation/reload',
      success: false,
      status: 500,
      failure: 'http',
      message: 'HTTP 500: Invalid config for automation'
    });
    expect(report.results.filter(r => r.success)).to.have.length(3);
  });

  it('should omit an empty response body from the message', async () => {
    const fetchFn = sinon.stub<Parameters<FetchFunction>, ReturnType<FetchFunction>>()
      .callsFake(async () => new Response('', { status: 401 }));
    const client = new ReloadClient({ baseUrl: BASE_URL, token: 'test-token', fetchFn });

    const result = await client.reload(RELOAD_SERVICES[0]);

    expect(result.failure).to.equal('http');
    expect(result.message).to.equal('HTTP 401');
  });

  it('should report a connection failure', async () => {
    const fetchFn = sinon.stub<Parameters<FetchFunction>, ReturnType<FetchFunction>>()
      .rejects(new TypeError('fetch failed'));
    const client = new ReloadClient({ baseUrl: BASE_URL, token: 'test-token', fetchFn });

    const result = await client.reload(RELOAD_SERVICES[2]);

    expect(result).to.deep.equal({
      name: 'scripts',
      service: 'script/reload',
      success: false,
      failure: 'connection',
      message: `Cannot reach ${BASE_URL}: fetch failed`
    });
  });

  it('should give up on a service after the timeout', async () => {
    const hanging: FetchFunction = (_url, init) => new Promise((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
    const client = new ReloadClient({ baseUrl: BASE_URL, token: 'test-token', timeoutMs: 20, fetchFn: hanging });

    const result = await client.reload(RELOAD_SERVICES[0]);

    expect(result.success).to.be.false;
    expect(result.failure).to.equal('timeout');
    expect(result.message).to.equal('No response within 20ms (a configuration error may be preventing the reload)');
  });

  describe('fromConfig', () => {
    it('should take URL, token and timeout from configuration', async () => {
      const config = buildSyncConfig({
        HA_URL: BASE_URL,
        HA_TOKEN: 'test-token',
        SYNC_RELOAD_TIMEOUT_MS: '5000'
      }, '/work');
      const fetchFn = okFetch();

      await ReloadClient.fromConfig(config, fetchFn).reload(RELOAD_SERVICES[3]);

      expect(fetchFn.firstCall.args[0]).to.equal(`${BASE_URL}/api/services/scene/reload`);
    });

    it('should fail before any request when no token is configured', () => {
      const config = buildSyncConfig({}, '/work');
      expect(() => ReloadClient.fromConfig(config)).to.throw(ConfigError, 'HA_TOKEN not found');
    });
  });
});
