/**
 * Barangay API Serving Layer - Type Definitions
 *
 * Wire shapes of the HTTP API. Field names are snake_case as clients see them.
 */

import type { MatchHook } from '../core/types.js';

export type { AdministrativeArea, MatchHook } from '../core/types.js';

/**
 * Search parameters after request validation
 */
export interface SearchBarangayRequest {
  readonly searchString: string;
  readonly matchHooks?: readonly MatchHook[] | null;
  readonly threshold?: number | null;
  readonly lenResults?: number | null;
}

/**
 * One search hit
 */
export interface Barangay {
  readonly barangay: string;
  readonly province_or_huc: string | null;
  readonly municipality_or_city: string | null;
  readonly psgc_id: string;
}

export interface SearchBarangayResult {
  readonly results: readonly Barangay[];
  readonly elapsed_seconds: number;
}

/**
 * Standardized error body
 */
export interface APIErrorResponse {
  readonly success: false;
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: {
    readonly requestId: string;
    readonly latencyMs: number;
  };
}

export type ErrorCode =
  | 'REGION_NOT_FOUND'
  | 'PROVINCE_OR_HUC_NOT_FOUND'
  | 'MUNICIPALITY_OR_CITY_NOT_FOUND'
  | 'AREA_NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'INVALID_PARAMETERS'
  | 'INVALID_JSON'
  | 'PAYLOAD_TOO_LARGE'
  | 'RATE_LIMIT_EXCEEDED'
  | 'METHOD_NOT_ALLOWED'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

/**
 * Health check metrics
 */
export interface HealthMetrics {
  readonly status: 'healthy' | 'degraded';
  readonly uptime: number;
  readonly queries: QueryMetrics;
  readonly errors: ErrorMetrics;
  readonly dataset: DatasetMetrics;
  readonly timestamp: number;
}

export interface QueryMetrics {
  readonly total: number;
  readonly successful: number;
  readonly failed: number;
  readonly latencyP50: number;
  readonly latencyP95: number;
  readonly latencyP99: number;
  readonly throughput: number;
}

export interface ErrorMetrics {
  readonly last5m: number;
  readonly last1h: number;
  readonly last24h: number;
  readonly recentErrors: readonly ErrorSample[];
}

export interface ErrorSample {
  readonly timestamp: number;
  readonly error: string;
  readonly path?: string;
}

export interface DatasetMetrics {
  readonly regions: number;
  readonly areas: number;
  readonly barangays: number;
  readonly source?: string;
}

/**
 * Configuration for the HTTP server
 */
export interface APIConfig {
  readonly port: number;
  readonly host: string;
  readonly corsOrigins: readonly string[];
  readonly rateLimitPerMinute: number;
}
