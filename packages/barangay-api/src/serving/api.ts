/**
 * Barangay API HTTP Server
 *
 * Thin request/response layer over the hierarchy lookup service and the
 * barangay search service.
 *
 * Features:
 * - Zod request validation for the search body
 * - Standardized error envelope with request id and latency
 * - Security and CORS headers
 * - Sliding-window rate limiting on the search endpoint
 * - Health and Prometheus metrics endpoints
 *
 * Routes:
 * - POST /search_barangay
 * - GET  /regions
 * - GET  /{region}/provinces_and_highly_urbanized_cities
 * - GET  /{region}/{provinceOrHuc}/municipalities_and_cities
 * - GET  /{region}/{provinceOrHuc}/{municipalityOrCity}/barangays
 * - GET  /id/{id}
 * - GET  /name/{name}
 * - GET  /health, GET /metrics
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { HierarchyLookupService } from './lookup-service.js';
import { BarangaySearchService } from './search-service.js';
import { HealthMonitor } from './health.js';
import type { APIConfig, APIErrorResponse, ErrorCode } from './types.js';
import { InvalidRequestError, NotFoundError } from '../core/errors.js';
import { DEFAULT_LEN_RESULTS, DEFAULT_MATCH_HOOKS, DEFAULT_THRESHOLD, MATCH_HOOKS } from '../core/types.js';
import type { AppConfig } from '../core/config.js';
import { loadDataset } from '../data/loaders/dataset-loader.js';
import { FuzzyBarangayMatcher } from '../matching/fuzzy-matcher.js';
import { logger } from '../core/utils/logger.js';

const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Request validation schema for POST /search_barangay
 */
const searchBarangaySchema = z.object({
  search_string: z.string({ required_error: 'search_string is required' }),
  match_hooks: z
    .array(z.enum(MATCH_HOOKS))
    .nullish()
    .describe(`Dimensions to score against; defaults to ${JSON.stringify(DEFAULT_MATCH_HOOKS)}`),
  threshold: z
    .number()
    .min(0, 'threshold must be >= 0')
    .max(100, 'threshold must be <= 100')
    .nullish()
    .describe(`Minimum score (0-100); defaults to ${DEFAULT_THRESHOLD}`),
  len_results: z
    .number()
    .int('len_results must be an integer')
    .min(1, 'len_results must be >= 1')
    .nullish()
    .describe(`Maximum number of results; defaults to ${DEFAULT_LEN_RESULTS}`),
});

/**
 * Body could not be read as a JSON document
 */
class RequestBodyError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'RequestBodyError';
  }
}

interface RequestContext {
  readonly requestId: string;
  readonly startTime: number;
  readonly path: string;
}

/**
 * Rate limiter with sliding window
 */
export class RateLimiter {
  private readonly requests: Map<string, number[]> = new Map();
  private lastSweep = Date.now();

  constructor(
    readonly maxRequests: number,
    private readonly windowMs = 60000
  ) {}

  check(clientId: string): {
    allowed: boolean;
    remaining: number;
    resetAt: number;
  } {
    const now = Date.now();
    if (now - this.lastSweep >= this.windowMs) {
      this.sweep(now);
    }

    const requests = this.requests.get(clientId) ?? [];

    // Remove old requests outside window
    const recentRequests = requests.filter((timestamp) => now - timestamp < this.windowMs);

    const allowed = recentRequests.length < this.maxRequests;
    const resetAt = now + this.windowMs;

    if (allowed) {
      recentRequests.push(now);
    }
    if (recentRequests.length > 0) {
      this.requests.set(clientId, recentRequests);
    } else {
      this.requests.delete(clientId);
    }

    return {
      allowed,
      remaining: Math.max(0, this.maxRequests - recentRequests.length),
      resetAt,
    };
  }

  reset(clientId: string): void {
    this.requests.delete(clientId);
  }

  /** Clients with a request still inside the window */
  get trackedClients(): number {
    return this.requests.size;
  }

  /**
   * Drop clients whose newest request has left the window
   */
  private sweep(now: number): void {
    for (const [clientId, timestamps] of this.requests) {
      const newest = timestamps[timestamps.length - 1];
      if (newest === undefined || now - newest >= this.windowMs) {
        this.requests.delete(clientId);
      }
    }
    this.lastSweep = now;
  }
}

export class BarangayAPI {
  private readonly server: Server;
  private readonly rateLimiter: RateLimiter;
  private readonly config: APIConfig;

  constructor(
    private readonly lookupService: HierarchyLookupService,
    private readonly searchService: BarangaySearchService,
    private readonly healthMonitor: HealthMonitor,
    config: Partial<APIConfig> = {}
  ) {
    this.config = {
      port: config.port ?? 48573,
      host: config.host ?? '0.0.0.0',
      corsOrigins: config.corsOrigins ?? ['*'],
      rateLimitPerMinute: config.rateLimitPerMinute ?? 60,
    };
    this.rateLimiter = new RateLimiter(this.config.rateLimitPerMinute);

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.error('Unhandled request failure', {
          error: error instanceof Error ? error.message : String(error),
        });
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });
  }

  /**
   * Start HTTP server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        logger.info('Barangay API server started', {
          host: this.config.host,
          port: this.config.port,
          url: `http://${this.config.host}:${this.config.port}`,
        });
        resolve();
      });
    });
  }

  /**
   * Stop HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('API server stopped');
        resolve();
      });
    });
  }

  /**
   * Node request listener: route, dispatch, and always answer
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const ctx: RequestContext = {
      requestId: this.generateRequestId(),
      startTime: performance.now(),
      path: url.pathname,
    };

    this.setSecurityHeaders(req, res, ctx.requestId);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (url.pathname === '/search_barangay') {
        if (req.method !== 'POST') {
          this.sendMethodNotAllowed(res, ctx, 'POST, OPTIONS');
          return;
        }
        await this.handleSearch(req, res, ctx);
        return;
      }

      if (req.method !== 'GET') {
        this.sendMethodNotAllowed(res, ctx, 'GET, OPTIONS');
        return;
      }

      const segments = this.splitPath(url.pathname);
      if (!segments) {
        this.sendErrorResponse(res, 400, 'INVALID_PARAMETERS', 'Malformed percent-encoding in path', ctx);
        return;
      }

      this.routeGet(segments, res, ctx);
    } catch (error) {
      this.handleError(error, res, ctx);
    }
  }

  private routeGet(segments: readonly string[], res: ServerResponse, ctx: RequestContext): void {
    const [first, second, third, fourth] = segments;

    switch (segments.length) {
      case 1:
        if (first === 'regions') {
          this.sendLookupResponse(res, this.lookupService.listRegions(), ctx);
          return;
        }
        if (first === 'health') {
          this.sendJsonResponse(res, 200, this.healthMonitor.getMetrics(), ctx, 'no-store');
          return;
        }
        if (first === 'metrics') {
          res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
          res.end(this.healthMonitor.exportPrometheus());
          return;
        }
        break;
      case 2:
        if (second === 'provinces_and_highly_urbanized_cities') {
          this.sendLookupResponse(res, this.lookupService.listProvincesOrHUCs(first), ctx);
          return;
        }
        if (first === 'id') {
          this.sendLookupResponse(res, this.lookupService.getById(second), ctx);
          return;
        }
        if (first === 'name') {
          this.sendLookupResponse(res, this.lookupService.getByName(second), ctx);
          return;
        }
        break;
      case 3:
        if (third === 'municipalities_and_cities') {
          this.sendLookupResponse(
            res,
            this.lookupService.listMunicipalitiesOrCities(first, second),
            ctx
          );
          return;
        }
        break;
      case 4:
        if (fourth === 'barangays') {
          this.sendLookupResponse(
            res,
            this.lookupService.listBarangays(first, second, third),
            ctx
          );
          return;
        }
        break;
    }

    this.sendErrorResponse(res, 404, 'NOT_FOUND', `Endpoint not found: ${ctx.path}`, ctx);
  }

  /**
   * Handle POST /search_barangay
   */
  private async handleSearch(
    req: IncomingMessage,
    res: ServerResponse,
    ctx: RequestContext
  ): Promise<void> {
    const clientId = this.getClientId(req);
    const rateLimitResult = this.rateLimiter.check(clientId);

    res.setHeader('X-RateLimit-Limit', this.rateLimiter.maxRequests);
    res.setHeader('X-RateLimit-Remaining', rateLimitResult.remaining);
    res.setHeader('X-RateLimit-Reset', Math.floor(rateLimitResult.resetAt / 1000));

    if (!rateLimitResult.allowed) {
      this.sendErrorResponse(
        res,
        429,
        'RATE_LIMIT_EXCEEDED',
        'Rate limit exceeded. Please try again later.',
        ctx,
        {
          limit: this.rateLimiter.maxRequests,
          resetAt: new Date(rateLimitResult.resetAt).toISOString(),
        }
      );
      return;
    }

    const body = await this.readJsonBody(req);
    const validation = searchBarangaySchema.safeParse(body);

    if (!validation.success) {
      this.sendErrorResponse(
        res,
        400,
        'INVALID_PARAMETERS',
        'Invalid request parameters',
        ctx,
        validation.error.flatten()
      );
      return;
    }

    const result = this.searchService.searchBarangay({
      searchString: validation.data.search_string,
      matchHooks: validation.data.match_hooks,
      threshold: validation.data.threshold,
      lenResults: validation.data.len_results,
    });

    this.sendJsonResponse(res, 200, result, ctx, 'no-store');
  }

  private handleError(error: unknown, res: ServerResponse, ctx: RequestContext): void {
    if (error instanceof NotFoundError) {
      this.sendErrorResponse(res, 404, error.code, error.message, ctx, {
        level: error.level,
        value: error.value,
        suggestion: error.suggestion,
      });
      return;
    }

    if (error instanceof InvalidRequestError) {
      this.sendErrorResponse(res, 400, 'INVALID_REQUEST', error.message, ctx, {
        field: error.field,
        suggestion: error.suggestion,
      });
      return;
    }

    if (error instanceof RequestBodyError) {
      this.sendErrorResponse(res, error.status, error.code, error.message, ctx);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error('API request error', {
      requestId: ctx.requestId,
      path: ctx.path,
      error: message,
      stack: error instanceof Error ? error.stack : undefined,
    });
    this.healthMonitor.recordError(message, ctx.path);
    this.sendErrorResponse(res, 500, 'INTERNAL_ERROR', 'Internal server error', ctx, undefined, false);
  }

  private async readJsonBody(req: IncomingMessage): Promise<unknown> {
    const chunks: Buffer[] = [];
    let size = 0;

    for await (const chunk of req) {
      const buffer: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        throw new RequestBodyError(
          `Request body exceeds ${MAX_BODY_BYTES} bytes`,
          413,
          'PAYLOAD_TOO_LARGE'
        );
      }
      chunks.push(buffer);
    }

    try {
      return JSON.parse(Buffer.concat(chunks).toString('utf-8'));
    } catch {
      throw new RequestBodyError('Request body must be a JSON object', 400, 'INVALID_JSON');
    }
  }

  /**
   * Path segments, percent-decoded; null when decoding fails
   */
  private splitPath(pathname: string): string[] | null {
    try {
      return pathname
        .split('/')
        .filter((segment) => segment.length > 0)
        .map((segment) => decodeURIComponent(segment));
    } catch {
      return null;
    }
  }

  private setSecurityHeaders(req: IncomingMessage, res: ServerResponse, requestId: string): void {
    // CORS headers
    const requestOrigin = req.headers.origin;
    const origin = this.config.corsOrigins.includes('*')
      ? '*'
      : requestOrigin !== undefined && this.config.corsOrigins.includes(requestOrigin)
        ? requestOrigin
        : this.config.corsOrigins[0];
    if (origin) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      if (origin !== '*') {
        res.setHeader('Vary', 'Origin');
      }
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader(
      'Access-Control-Expose-Headers',
      'X-Request-ID, X-RateLimit-Limit, X-RateLimit-Remaining, X-RateLimit-Reset'
    );

    // Security headers
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none';");
    res.setHeader('Referrer-Policy', 'no-referrer');

    res.setHeader('X-Request-ID', requestId);
  }

  /**
   * Lookup results never change for the lifetime of the process
   */
  private sendLookupResponse(res: ServerResponse, data: unknown, ctx: RequestContext): void {
    this.sendJsonResponse(res, 200, data, ctx, 'public, max-age=3600');
  }

  private sendJsonResponse(
    res: ServerResponse,
    status: number,
    data: unknown,
    ctx: RequestContext,
    cacheControl: string
  ): void {
    const latencyMs = performance.now() - ctx.startTime;
    this.healthMonitor.recordQuery(latencyMs);

    res.setHeader('Cache-Control', cacheControl);
    res.setHeader('X-Response-Time', `${(Math.round(latencyMs * 100) / 100).toFixed(2)}ms`);
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data, null, 2));
  }

  /**
   * Send error response (standardized)
   */
  private sendErrorResponse(
    res: ServerResponse,
    status: number,
    code: ErrorCode,
    message: string,
    ctx: RequestContext,
    details?: unknown,
    recordFailure = true
  ): void {
    const latencyMs = performance.now() - ctx.startTime;
    if (recordFailure) {
      this.healthMonitor.recordFailure(latencyMs);
    }

    const response: APIErrorResponse = {
      success: false,
      error: {
        code,
        message,
        details,
      },
      meta: {
        requestId: ctx.requestId,
        latencyMs: Math.round(latencyMs * 100) / 100,
      },
    };

    res.setHeader('Cache-Control', 'no-store');
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, null, 2));
  }

  private sendMethodNotAllowed(res: ServerResponse, ctx: RequestContext, allow: string): void {
    res.setHeader('Allow', allow);
    this.sendErrorResponse(
      res,
      405,
      'METHOD_NOT_ALLOWED',
      `Method not allowed on ${ctx.path}`,
      ctx
    );
  }

  /**
   * Get client ID for rate limiting
   */
  private getClientId(req: IncomingMessage): string {
    // Use X-Forwarded-For if behind proxy, otherwise socket address
    const forwarded = req.headers['x-forwarded-for'];
    if (typeof forwarded === 'string' && forwarded.length > 0) {
      return forwarded.split(',')[0].trim();
    }
    return req.socket.remoteAddress ?? 'unknown';
  }

  private generateRequestId(): string {
    return `req_${randomBytes(16).toString('hex')}`;
  }
}

/**
 * Load the dataset and wire services into an API server (not yet listening)
 */
export async function createBarangayAPI(config: AppConfig): Promise<BarangayAPI> {
  const dataset = await loadDataset(config.dataset.path, {
    strictIntegrity: config.dataset.strictIntegrity,
  });
  const stats = dataset.getStats();

  const lookupService = new HierarchyLookupService(dataset, {
    strictLeafValidation: config.lookup.strictLeafValidation,
  });
  const searchService = new BarangaySearchService(new FuzzyBarangayMatcher(dataset));
  const healthMonitor = new HealthMonitor({
    regions: stats.regions,
    areas: stats.areas,
    barangays: stats.barangays,
    source: dataset.meta.source,
  });

  return new BarangayAPI(lookupService, searchService, healthMonitor, config.server);
}
