import { http } from '../lib/http';
import type { FetchResult, SectionKey } from '../types/snapshot';

export const DASHBOARD_PATHS: Record<SectionKey, string> = {
  market: '/api/market',
  exchange_flows: '/api/exchange_flows',
  stablecoin: '/api/stablecoin',
  whale_transfers: '/api/whale_transfers',
};

export interface DashboardConfig {
  baseUrl?: string;
  apiKey?: string;
}

export interface DashboardClient {
  fetch(path: string): Promise<FetchResult>;
}

export function createDashboardClient(config: DashboardConfig): DashboardClient {
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (config.apiKey) {
    headers['Authorization'] = `Bearer ${config.apiKey}`;
  }

  return {
    async fetch(path: string): Promise<FetchResult> {
      if (!config.baseUrl) {
        const reason = 'DASHBOARD_API_URL not configured';
        console.debug(`GET ${path} skipped: ${reason}`);
        return { ok: false, reason };
      }
      const url = config.baseUrl.replace(/\/+$/, '') + path;
      try {
        // got rejects on non-2xx (HTTPError), timeouts and unparseable bodies (ParseError)
        const data = await http.get(url, { headers }).json<unknown>();
        // an empty 2xx body parses to '' rather than raising ParseError
        if (data === '' || data === undefined) {
          const reason = 'empty response body';
          console.debug(`GET ${url} failed: ${reason}`);
          return { ok: false, reason };
        }
        return { ok: true, data };
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        console.debug(`GET ${url} failed: ${reason}`);
        return { ok: false, reason };
      }
    },
  };
}
