/**
 * Offline query commands
 *
 * Answer the same questions as the HTTP API straight from a dataset bundle,
 * without starting a server.
 */

import { z } from 'zod';
import type { Dataset, DatasetStats } from '../../../data/dataset.js';
import { loadDataset } from '../../../data/loaders/dataset-loader.js';
import { HierarchyLookupService } from '../../../serving/lookup-service.js';
import { BarangaySearchService } from '../../../serving/search-service.js';
import { FuzzyBarangayMatcher } from '../../../matching/fuzzy-matcher.js';
import type { AppConfig } from '../../../core/config.js';
import { DatasetIntegrityError, InvalidRequestError, type DatasetIssue } from '../../../core/errors.js';
import { MATCH_HOOKS, type MatchHook } from '../../../core/types.js';
import type { SearchBarangayRequest } from '../../../serving/types.js';

export type QueryCommand =
  | { readonly kind: 'regions' }
  | { readonly kind: 'provinces'; readonly region: string }
  | { readonly kind: 'municipalities'; readonly region: string; readonly provinceOrHuc: string }
  | {
      readonly kind: 'barangays';
      readonly region: string;
      readonly provinceOrHuc: string;
      readonly municipalityOrCity: string;
    }
  | { readonly kind: 'id'; readonly psgcId: string }
  | { readonly kind: 'name'; readonly name: string }
  | { readonly kind: 'search'; readonly request: SearchBarangayRequest };

export interface QueryContext {
  readonly dataset: Dataset;
  readonly lookup: HierarchyLookupService;
  readonly search: BarangaySearchService;
}

export function createQueryContext(dataset: Dataset, config: Pick<AppConfig, 'lookup'>): QueryContext {
  return {
    dataset,
    lookup: new HierarchyLookupService(dataset, {
      strictLeafValidation: config.lookup.strictLeafValidation,
    }),
    search: new BarangaySearchService(new FuzzyBarangayMatcher(dataset)),
  };
}

export async function openQueryContext(config: AppConfig): Promise<QueryContext> {
  const dataset = await loadDataset(config.dataset.path, {
    strictIntegrity: config.dataset.strictIntegrity,
  });
  return createQueryContext(dataset, config);
}

/**
 * Run one query; errors propagate (NotFoundError, InvalidRequestError)
 */
export function runQuery(ctx: QueryContext, command: QueryCommand): unknown {
  switch (command.kind) {
    case 'regions':
      return ctx.lookup.listRegions();
    case 'provinces':
      return ctx.lookup.listProvincesOrHUCs(command.region);
    case 'municipalities':
      return ctx.lookup.listMunicipalitiesOrCities(command.region, command.provinceOrHuc);
    case 'barangays':
      return ctx.lookup.listBarangays(
        command.region,
        command.provinceOrHuc,
        command.municipalityOrCity
      );
    case 'id':
      return ctx.lookup.getById(command.psgcId);
    case 'name':
      return ctx.lookup.getByName(command.name);
    case 'search':
      return ctx.search.searchBarangay(command.request);
  }
}

const matchHooksSchema = z.array(z.enum(MATCH_HOOKS));

/**
 * Parse a comma-separated --hooks value
 */
export function parseMatchHooks(value: string): MatchHook[] {
  const hooks = value
    .split(',')
    .map((hook) => hook.trim())
    .filter((hook) => hook.length > 0);
  const parsed = matchHooksSchema.safeParse(hooks);
  if (!parsed.success) {
    throw new InvalidRequestError(
      `unknown match hook in '${value}'`,
      'match_hooks',
      `Valid hooks: ${MATCH_HOOKS.join(', ')}`
    );
  }
  return parsed.data;
}

export interface ValidationReport {
  readonly valid: boolean;
  readonly path: string;
  readonly stats: DatasetStats;
  readonly issues: readonly DatasetIssue[];
}

function toReport(dataset: Dataset, path: string): ValidationReport {
  return {
    valid: dataset.issues.length === 0,
    path,
    stats: dataset.getStats(),
    issues: dataset.issues,
  };
}

/**
 * Check a dataset bundle against its invariants without refusing to load it
 */
export async function validateCommand(path: string): Promise<ValidationReport> {
  try {
    return toReport(await loadDataset(path, { strictIntegrity: false }), path);
  } catch (error) {
    if (error instanceof DatasetIntegrityError) {
      throw error;
    }
    throw new DatasetIntegrityError(
      `Cannot read dataset bundle ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
