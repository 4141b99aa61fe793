/**
 * Barangay API Serving Layer
 *
 * @example
 * ```typescript
 * import { createBarangayAPI, loadConfig } from 'barangay-api';
 *
 * const api = await createBarangayAPI(loadConfig({ overrides: { port: 8080 } }));
 * await api.start();
 * ```
 */

// Core services
export { HierarchyLookupService } from './lookup-service.js';
export type { LookupServiceOptions } from './lookup-service.js';
export { BarangaySearchService } from './search-service.js';
export type { SearchServiceOptions } from './search-service.js';
export { HealthMonitor } from './health.js';
export { BarangayAPI, RateLimiter, createBarangayAPI } from './api.js';

// Types
export type {
  SearchBarangayRequest,
  Barangay,
  SearchBarangayResult,
  APIErrorResponse,
  ErrorCode,
  HealthMetrics,
  QueryMetrics,
  ErrorMetrics,
  ErrorSample,
  DatasetMetrics,
  APIConfig,
} from './types.js';
