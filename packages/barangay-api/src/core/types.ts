/**
 * Barangay API - Core Type Definitions
 *
 * Wire records keep the snake_case field names of the PSGC dataset bundle;
 * in-memory structures (hierarchy, indexes) are camelCase.
 */

// ============================================================================
// Administrative areas
// ============================================================================

export const ADMINISTRATIVE_LEVELS = [
  'region',
  'province',
  'huc',
  'municipality',
  'city',
  'barangay',
] as const;

/**
 * Level of an administrative area. `huc` is a highly urbanized city, which is
 * administratively independent of its geographic province.
 */
export type AdministrativeLevel = (typeof ADMINISTRATIVE_LEVELS)[number];

/**
 * One record of the flat PSGC index
 */
export interface AdministrativeArea {
  readonly name: string;
  /** Philippine Standard Geographic Code (9 or 10 digits) */
  readonly psgc_id: string;
  readonly level: AdministrativeLevel;
  readonly parent_psgc_id: string | null;
  readonly barangay?: string;
  readonly province_or_huc?: string;
  readonly municipality_or_city?: string;
}

// ============================================================================
// Hierarchy
// ============================================================================

/**
 * Province or HUC slot of the hierarchy.
 *
 * Most provinces hold municipalities/cities; an HUC (and the odd independent
 * municipality such as Pateros) sits in the province slot and holds its
 * barangays directly.
 */
export type ProvinceNode =
  | {
      readonly kind: 'children';
      readonly municipalities: ReadonlyMap<string, readonly string[]>;
    }
  | {
      readonly kind: 'barangays';
      readonly barangays: readonly string[];
    };

/** province/HUC name → node */
export type RegionNode = ReadonlyMap<string, ProvinceNode>;

/** region name → provinces/HUCs */
export type Hierarchy = ReadonlyMap<string, RegionNode>;

// ============================================================================
// Search
// ============================================================================

export const MATCH_HOOKS = ['barangay', 'municipality', 'province'] as const;

/**
 * Dimension the fuzzy matcher is allowed to score against
 */
export type MatchHook = (typeof MATCH_HOOKS)[number];

export const DEFAULT_MATCH_HOOKS: readonly MatchHook[] = ['barangay', 'municipality'];
export const DEFAULT_THRESHOLD = 60;
export const DEFAULT_LEN_RESULTS = 1;

/**
 * Matcher output: a barangay record and its score (0-100)
 */
export interface BarangayCandidate {
  readonly barangay: string;
  readonly province_or_huc: string | null;
  readonly municipality_or_city: string | null;
  readonly psgc_id: string;
  readonly score: number;
}

/**
 * External fuzzy-matching capability
 */
export interface BarangayMatcher {
  search(
    query: string,
    matchHooks: readonly MatchHook[],
    threshold: number,
    n: number
  ): readonly BarangayCandidate[];
}
