import got from 'got';

// One attempt per request: a failed fetch falls back for this cycle and the
// next scheduled cycle is the retry.
export const REQUEST_TIMEOUT_MS = 8000;

export const http = got.extend({
  responseType: 'json',
  timeout: { request: REQUEST_TIMEOUT_MS },
  retry: { limit: 0 },
});
