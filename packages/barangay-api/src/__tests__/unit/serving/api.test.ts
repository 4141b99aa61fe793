/**
 * Barangay API - HTTP Layer Tests
 *
 * Exercises routing, validation, error envelopes and headers through
 * handleRequest with mocked req/res objects (no real HTTP server).
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IncomingMessage, IncomingHttpHeaders, ServerResponse } from 'node:http';
import { Readable } from 'node:stream';
import { BarangayAPI, RateLimiter } from '../../../serving/api.js';
import { HierarchyLookupService } from '../../../serving/lookup-service.js';
import { BarangaySearchService } from '../../../serving/search-service.js';
import { HealthMonitor } from '../../../serving/health.js';
import { FuzzyBarangayMatcher } from '../../../matching/fuzzy-matcher.js';
import type { APIConfig, APIErrorResponse } from '../../../serving/types.js';
import type { Dataset } from '../../../data/dataset.js';
import {
  CALABARZON,
  CENTRAL_VISAYAS,
  NCR,
  loadSampleDataset,
} from '../../utils/fixtures.js';

type HeaderValue = string | number | readonly string[];

interface MockResponse {
  readonly status: number;
  readonly headers: Record<string, HeaderValue>;
  readonly text: string;
  readonly body: unknown;
}

/**
 * Mock HTTP request/response objects
 */
function createMockRequest(
  url: string,
  method = 'GET',
  headers: IncomingHttpHeaders = {},
  body?: string | Buffer
): IncomingMessage {
  const fields = {
    url,
    method,
    headers: { host: 'localhost:48573', ...headers },
    socket: { remoteAddress: '127.0.0.1' },
  };
  if (body === undefined) {
    return fields as unknown as IncomingMessage;
  }
  const payload = typeof body === 'string' ? Buffer.from(body) : body;
  return Object.assign(Readable.from([payload]), fields) as unknown as IncomingMessage;
}

function createMockResponse(): { res: ServerResponse; read: () => MockResponse } {
  let statusCode = 200;
  const headers: Record<string, HeaderValue> = {};
  let text = '';

  const res = {
    headersSent: false,
    writeHead: vi.fn((status: number, hdrs?: Record<string, HeaderValue>) => {
      statusCode = status;
      if (hdrs) {
        Object.entries(hdrs).forEach(([key, value]) => {
          headers[key.toLowerCase()] = value;
        });
      }
    }),
    setHeader: vi.fn((key: string, value: HeaderValue) => {
      headers[key.toLowerCase()] = value;
    }),
    end: vi.fn((data?: string) => {
      if (data) text = data;
    }),
  } as unknown as ServerResponse;

  return {
    res,
    read: () => ({
      status: statusCode,
      headers,
      text,
      body: text && headers['content-type'] === 'application/json' ? JSON.parse(text) : null,
    }),
  };
}

async function request(
  api: BarangayAPI,
  url: string,
  method = 'GET',
  headers: IncomingHttpHeaders = {},
  body?: string | Buffer
): Promise<MockResponse> {
  const req = createMockRequest(url, method, headers, body);
  const { res, read } = createMockResponse();
  await api.handleRequest(req, res);
  return read();
}

function post(api: BarangayAPI, body: unknown, headers: IncomingHttpHeaders = {}): Promise<MockResponse> {
  return request(api, '/search_barangay', 'POST', headers, JSON.stringify(body));
}

function path(...segments: string[]): string {
  return '/' + segments.map((segment) => encodeURIComponent(segment)).join('/');
}

function errorBody(response: MockResponse): APIErrorResponse['error'] {
  const body = response.body as APIErrorResponse;
  expect(body.success).toBe(false);
  return body.error;
}

describe('BarangayAPI', () => {
  let dataset: Dataset;
  let healthMonitor: HealthMonitor;
  let api: BarangayAPI;

  function createAPI(config: Partial<APIConfig> = {}, searchService?: BarangaySearchService): BarangayAPI {
    const stats = dataset.getStats();
    healthMonitor = new HealthMonitor({
      regions: stats.regions,
      areas: stats.areas,
      barangays: stats.barangays,
      source: dataset.meta.source,
    });
    return new BarangayAPI(
      new HierarchyLookupService(dataset),
      searchService ?? new BarangaySearchService(new FuzzyBarangayMatcher(dataset)),
      healthMonitor,
      config
    );
  }

  beforeEach(() => {
    dataset = loadSampleDataset();
    api = createAPI();
  });

  describe('Hierarchy lookups', () => {
    it('GET /regions lists regions', async () => {
      const response = await request(api, '/regions');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([NCR, CALABARZON, CENTRAL_VISAYAS]);
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.headers['cache-control']).toBe('public, max-age=3600');
      expect(response.headers['x-response-time']).toMatch(/^\d+\.\d{2}ms$/);
    });

    it('GET /{region}/provinces_and_highly_urbanized_cities', async () => {
      const response = await request(api, path(NCR, 'provinces_and_highly_urbanized_cities'));

      expect(response.status).toBe(200);
      expect(response.body).toEqual(['Quezon City', 'City of Makati', 'Pateros']);
    });

    it('GET /{region}/{province}/municipalities_and_cities', async () => {
      const response = await request(api, path(CALABARZON, 'Laguna', 'municipalities_and_cities'));

      expect(response.status).toBe(200);
      expect(response.body).toEqual(['City of Calamba', 'Los Baños']);
    });

    it('GET /{region}/{huc}/municipalities_and_cities returns the HUC itself', async () => {
      const response = await request(api, path(CENTRAL_VISAYAS, 'Cebu City', 'municipalities_and_cities'));

      expect(response.body).toEqual(['Cebu City']);
    });

    it('GET /{region}/{province}/{municipality}/barangays', async () => {
      const response = await request(api, path(CALABARZON, 'Laguna', 'Los Baños', 'barangays'));

      expect(response.status).toBe(200);
      expect(response.body).toEqual(['Batong Malake', 'Anos']);
    });

    it('GET /id/{id} returns the record', async () => {
      const response = await request(api, '/id/072217001');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        name: 'Lahug',
        psgc_id: '072217001',
        level: 'barangay',
        parent_psgc_id: '072217000',
        barangay: 'Lahug',
        province_or_huc: 'Cebu City',
      });
    });

    it('GET /name/{name} returns every exact match', async () => {
      const response = await request(api, '/name/Poblacion');

      expect(response.status).toBe(200);
      expect(Array.isArray(response.body)).toBe(true);
      const ids = (response.body as { psgc_id: string }[]).map((area) => area.psgc_id);
      expect(ids).toEqual(['137602002', '137606002']);
    });

    it('GET /name/{name} returns an empty list when nothing matches', async () => {
      const response = await request(api, '/name/Atlantis');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([]);
    });
  });

  describe('Lookup errors', () => {
    it('unknown region is a 404 with the endpoint to query', async () => {
      const response = await request(api, '/BadRegion/provinces_and_highly_urbanized_cities');

      expect(response.status).toBe(404);
      expect(response.headers['cache-control']).toBe('no-store');
      expect(errorBody(response)).toEqual({
        code: 'REGION_NOT_FOUND',
        message: "No such region: 'BadRegion'. Try `/regions`?",
        details: { level: 'region', value: 'BadRegion', suggestion: '/regions' },
      });
    });

    it('unknown municipality names the level that failed', async () => {
      const response = await request(api, path(CENTRAL_VISAYAS, 'Bohol', 'Atlantis', 'barangays'));

      expect(response.status).toBe(404);
      const error = errorBody(response);
      expect(error.code).toBe('MUNICIPALITY_OR_CITY_NOT_FOUND');
      expect(error.details).toEqual({
        level: 'municipality_or_city',
        value: 'Atlantis',
        suggestion: `/${CENTRAL_VISAYAS}/Bohol/municipalities_and_cities`,
      });
    });

    it('unknown id is a 404', async () => {
      const response = await request(api, '/id/000000000');

      expect(response.status).toBe(404);
      expect(errorBody(response).code).toBe('AREA_NOT_FOUND');
    });

    it('unknown route is a 404', async () => {
      const response = await request(api, '/a/b/c/d/e');

      expect(response.status).toBe(404);
      expect(errorBody(response)).toEqual({
        code: 'NOT_FOUND',
        message: 'Endpoint not found: /a/b/c/d/e',
      });
    });

    it('malformed percent-encoding is a 400', async () => {
      const response = await request(api, '/%E0%A4%A/provinces_and_highly_urbanized_cities');

      expect(response.status).toBe(400);
      expect(errorBody(response).code).toBe('INVALID_PARAMETERS');
    });

    it('rejects other methods on lookup routes', async () => {
      const response = await request(api, '/regions', 'DELETE');

      expect(response.status).toBe(405);
      expect(response.headers.allow).toBe('GET, OPTIONS');
      expect(errorBody(response).code).toBe('METHOD_NOT_ALLOWED');
    });
  });

  describe('POST /search_barangay', () => {
    it('returns the best match with default parameters', async () => {
      const response = await post(api, { search_string: 'lahug cebu' });

      expect(response.status).toBe(200);
      expect(response.headers['cache-control']).toBe('no-store');
      const body = response.body as { results: unknown[]; elapsed_seconds: number };
      expect(body.results).toEqual([
        {
          barangay: 'Lahug',
          province_or_huc: 'Cebu City',
          municipality_or_city: null,
          psgc_id: '072217001',
        },
      ]);
      expect(body.elapsed_seconds).toBeGreaterThanOrEqual(0);
    });

    it('honours match_hooks and len_results', async () => {
      const response = await post(api, {
        search_string: 'Poblacion',
        match_hooks: ['barangay'],
        len_results: 2,
      });

      expect(response.status).toBe(200);
      const body = response.body as { results: { psgc_id: string }[] };
      expect(body.results.map((result) => result.psgc_id)).toEqual(['137602002', '137606002']);
    });

    it('accepts null for optional fields', async () => {
      const response = await post(api, {
        search_string: 'lahug cebu',
        match_hooks: null,
        threshold: null,
        len_results: null,
      });

      expect(response.status).toBe(200);
    });

    it('returns no results when nothing clears the threshold', async () => {
      const response = await post(api, { search_string: 'zzzz' });

      expect(response.status).toBe(200);
      expect((response.body as { results: unknown[] }).results).toEqual([]);
    });

    it('rejects match_hooks without barangay', async () => {
      const response = await post(api, { search_string: 'lahug', match_hooks: ['municipality'] });

      expect(response.status).toBe(400);
      const error = errorBody(response);
      expect(error.code).toBe('INVALID_REQUEST');
      expect(error.details).toEqual({
        field: 'match_hooks',
        suggestion: "For example ['barangay', 'municipality']",
      });
    });

    it('rejects an unknown match hook', async () => {
      const response = await post(api, { search_string: 'lahug', match_hooks: ['barangay', 'street'] });

      expect(response.status).toBe(400);
      expect(errorBody(response).code).toBe('INVALID_PARAMETERS');
    });

    it('rejects a missing search_string', async () => {
      const response = await post(api, { threshold: 50 });

      expect(response.status).toBe(400);
      const error = errorBody(response);
      expect(error.code).toBe('INVALID_PARAMETERS');
      expect(error.details).toMatchObject({
        fieldErrors: { search_string: ['search_string is required'] },
      });
    });

    it('rejects an out-of-range threshold', async () => {
      const response = await post(api, { search_string: 'lahug', threshold: 150 });

      expect(response.status).toBe(400);
      expect(errorBody(response).details).toMatchObject({
        fieldErrors: { threshold: ['threshold must be <= 100'] },
      });
    });

    it('rejects len_results below 1', async () => {
      const response = await post(api, { search_string: 'lahug', len_results: 0 });

      expect(response.status).toBe(400);
      expect(errorBody(response).code).toBe('INVALID_PARAMETERS');
    });

    it('rejects a body that is not JSON', async () => {
      const response = await request(api, '/search_barangay', 'POST', {}, 'not json');

      expect(response.status).toBe(400);
      expect(errorBody(response)).toEqual({
        code: 'INVALID_JSON',
        message: 'Request body must be a JSON object',
      });
    });

    it('rejects an oversized body', async () => {
      const response = await request(
        api,
        '/search_barangay',
        'POST',
        {},
        Buffer.alloc(1024 * 1024 + 1, 'a')
      );

      expect(response.status).toBe(413);
      expect(errorBody(response).code).toBe('PAYLOAD_TOO_LARGE');
    });

    it('rejects GET', async () => {
      const response = await request(api, '/search_barangay');

      expect(response.status).toBe(405);
      expect(response.headers.allow).toBe('POST, OPTIONS');
    });

    it('rate limits per client', async () => {
      api = createAPI({ rateLimitPerMinute: 2 });

      const first = await post(api, { search_string: 'lahug' });
      const second = await post(api, { search_string: 'lahug' });
      const third = await post(api, { search_string: 'lahug' });
      const otherClient = await post(api, { search_string: 'lahug' }, { 'x-forwarded-for': '10.0.0.7' });

      expect(first.status).toBe(200);
      expect(first.headers['x-ratelimit-limit']).toBe(2);
      expect(first.headers['x-ratelimit-remaining']).toBe(1);
      expect(second.headers['x-ratelimit-remaining']).toBe(0);
      expect(third.status).toBe(429);
      expect(errorBody(third).code).toBe('RATE_LIMIT_EXCEEDED');
      expect(otherClient.status).toBe(200);
    });

    it('hides unexpected failures behind a 500 and records them', async () => {
      const failing = new BarangaySearchService({
        search: () => {
          throw new Error('matcher exploded');
        },
      });
      api = createAPI({}, failing);

      const response = await post(api, { search_string: 'lahug' });

      expect(response.status).toBe(500);
      expect(errorBody(response)).toEqual({
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
      const metrics = healthMonitor.getMetrics();
      expect(metrics.errors.last5m).toBe(1);
      expect(metrics.errors.recentErrors[0]).toMatchObject({
        error: 'matcher exploded',
        path: '/search_barangay',
      });
    });
  });

  describe('Headers', () => {
    it('answers preflight requests with 204', async () => {
      const response = await request(api, '/search_barangay', 'OPTIONS');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    });

    it('sets security headers and a request id', async () => {
      const response = await request(api, '/regions');

      expect(response.headers['x-content-type-options']).toBe('nosniff');
      expect(response.headers['x-frame-options']).toBe('DENY');
      expect(response.headers['x-request-id']).toMatch(/^req_[0-9a-f]{32}$/);
    });

    it('echoes the request id in error envelopes', async () => {
      const response = await request(api, '/id/000000000');
      const body = response.body as APIErrorResponse;

      expect(body.meta.requestId).toBe(response.headers['x-request-id']);
      expect(body.meta.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('echoes an allowed origin', async () => {
      api = createAPI({ corsOrigins: ['https://app.example.org', 'https://example.org'] });

      const response = await request(api, '/regions', 'GET', { origin: 'https://example.org' });

      expect(response.headers['access-control-allow-origin']).toBe('https://example.org');
      expect(response.headers.vary).toBe('Origin');
    });

    it('falls back to the first configured origin', async () => {
      api = createAPI({ corsOrigins: ['https://app.example.org'] });

      const response = await request(api, '/regions', 'GET', { origin: 'https://evil.example.com' });

      expect(response.headers['access-control-allow-origin']).toBe('https://app.example.org');
    });
  });

  describe('Health and metrics', () => {
    it('GET /health reports dataset size and status', async () => {
      const response = await request(api, '/health');

      expect(response.status).toBe(200);
      expect(response.headers['cache-control']).toBe('no-store');
      expect(response.body).toMatchObject({
        status: 'healthy',
        dataset: { regions: 3, areas: 39, barangays: 23 },
      });
    });

    it('counts lookups and failures', async () => {
      await request(api, '/regions');
      await request(api, '/id/000000000');

      const { queries } = healthMonitor.getMetrics();
      expect(queries.total).toBe(2);
      expect(queries.successful).toBe(1);
      expect(queries.failed).toBe(1);
    });

    it('GET /metrics exports Prometheus text', async () => {
      const response = await request(api, '/metrics');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/plain; version=0.0.4');
      expect(response.text.split('\n')).toContain('barangay_api_dataset_areas 39');
      expect(response.text.split('\n')).toContain('barangay_api_health 1');
    });
  });
});

describe('RateLimiter', () => {
  it('allows up to maxRequests per window', () => {
    const limiter = new RateLimiter(2, 60000);

    expect(limiter.check('a')).toMatchObject({ allowed: true, remaining: 1 });
    expect(limiter.check('a')).toMatchObject({ allowed: true, remaining: 0 });
    expect(limiter.check('a')).toMatchObject({ allowed: false, remaining: 0 });
  });

  it('tracks clients separately', () => {
    const limiter = new RateLimiter(1);

    expect(limiter.check('a').allowed).toBe(true);
    expect(limiter.check('b').allowed).toBe(true);
    expect(limiter.check('a').allowed).toBe(false);
  });

  it('frees slots once the window slides past them', () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(new Date('2024-07-01T00:00:00Z'));
      const limiter = new RateLimiter(1, 1000);

      expect(limiter.check('a').allowed).toBe(true);
      expect(limiter.check('a').allowed).toBe(false);

      vi.setSystemTime(new Date('2024-07-01T00:00:01Z'));
      expect(limiter.check('a').allowed).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it('forgets clients once their requests leave the window', () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(new Date('2024-07-01T00:00:00Z'));
      const limiter = new RateLimiter(5, 1000);
      limiter.check('10.0.0.1');
      limiter.check('10.0.0.2');
      limiter.check('10.0.0.3');
      expect(limiter.trackedClients).toBe(3);

      vi.setSystemTime(new Date('2024-07-01T00:00:00.500Z'));
      limiter.check('10.0.0.1');
      expect(limiter.trackedClients).toBe(3);

      vi.setSystemTime(new Date('2024-07-01T00:00:01.200Z'));
      limiter.check('10.0.0.4');
      expect(limiter.trackedClients).toBe(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it('reset clears a client', () => {
    const limiter = new RateLimiter(1);
    limiter.check('a');
    limiter.reset('a');

    expect(limiter.check('a').allowed).toBe(true);
  });
});
