import { describe, it, expect, vi, beforeEach } from 'vitest';

const hoisted = vi.hoisted(() => ({
  getMock: vi.fn(),
}));
vi.mock('../src/lib/http', () => ({ http: { get: hoisted.getMock } }));

import { createDashboardClient, DASHBOARD_PATHS } from '../src/clients/dashboard';

describe('dashboard client', () => {
  beforeEach(() => {
    hoisted.getMock.mockReset();
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  it('GETs base url + path with accept and bearer headers', async () => {
    hoisted.getMock.mockImplementationOnce(() => ({ json: async () => ({ symbol: 'ETH' }) }));
    const client = createDashboardClient({ baseUrl: 'https://dash.test/', apiKey: 'test-key' });

    const res = await client.fetch(DASHBOARD_PATHS.market);

    expect(res).toEqual({ ok: true, data: { symbol: 'ETH' } });
    expect(hoisted.getMock).toHaveBeenCalledWith('https://dash.test/api/market', {
      headers: { Accept: 'application/json', Authorization: 'Bearer test-key' },
    });
  });

  it('omits Authorization when no api key is configured', async () => {
    hoisted.getMock.mockImplementationOnce(() => ({ json: async () => [] }));
    const client = createDashboardClient({ baseUrl: 'https://dash.test' });

    await client.fetch(DASHBOARD_PATHS.whale_transfers);

    const [url, opts] = hoisted.getMock.mock.calls[0];
    expect(url).toBe('https://dash.test/api/whale_transfers');
    expect(opts.headers).toEqual({ Accept: 'application/json' });
  });

  it('fails without calling upstream when base url is missing', async () => {
    const client = createDashboardClient({});

    const res = await client.fetch(DASHBOARD_PATHS.stablecoin);

    expect(res).toEqual({ ok: false, reason: 'DASHBOARD_API_URL not configured' });
    expect(hoisted.getMock).not.toHaveBeenCalled();
  });

  it('turns request errors into a failure result and logs at debug level', async () => {
    hoisted.getMock.mockImplementationOnce(() => ({
      json: async () => {
        throw new Error('Response code 503 (Service Unavailable)');
      },
    }));
    const client = createDashboardClient({ baseUrl: 'https://dash.test' });

    const res = await client.fetch(DASHBOARD_PATHS.exchange_flows);

    expect(res).toEqual({ ok: false, reason: 'Response code 503 (Service Unavailable)' });
    expect(console.debug).toHaveBeenCalledWith(
      'GET https://dash.test/api/exchange_flows failed: Response code 503 (Service Unavailable)'
    );
  });

  it('treats an empty 2xx body as a failure', async () => {
    hoisted.getMock.mockImplementationOnce(() => ({ json: async () => '' }));
    const client = createDashboardClient({ baseUrl: 'https://dash.test' });

    const res = await client.fetch(DASHBOARD_PATHS.market);

    expect(res).toEqual({ ok: false, reason: 'empty response body' });
    expect(console.debug).toHaveBeenCalledWith('GET https://dash.test/api/market failed: empty response body');
  });
});
