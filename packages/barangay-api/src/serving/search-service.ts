/**
 * Barangay Search Service
 *
 * Applies defaults, enforces that "barangay" is always a match hook, hands the
 * query to the matcher and normalises its output. Ranking is entirely the
 * matcher's business.
 */

import { InvalidRequestError } from '../core/errors.js';
import {
  DEFAULT_LEN_RESULTS,
  DEFAULT_MATCH_HOOKS,
  DEFAULT_THRESHOLD,
  type BarangayMatcher,
} from '../core/types.js';
import type { Barangay, SearchBarangayRequest, SearchBarangayResult } from './types.js';

export interface SearchServiceOptions {
  /** Millisecond clock used for `elapsed_seconds` */
  readonly now?: () => number;
}

export class BarangaySearchService {
  private readonly now: () => number;

  constructor(
    private readonly matcher: BarangayMatcher,
    options: SearchServiceOptions = {}
  ) {
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * @throws InvalidRequestError when `matchHooks` is given without "barangay",
   *   `threshold` lies outside [0, 100] or `lenResults` is not a positive integer
   */
  searchBarangay(request: SearchBarangayRequest): SearchBarangayResult {
    const startTime = this.now();

    // Defaults only replace absent values; an explicit [] is rejected below.
    const matchHooks = request.matchHooks ?? DEFAULT_MATCH_HOOKS;
    const threshold = request.threshold ?? DEFAULT_THRESHOLD;
    const n = request.lenResults ?? DEFAULT_LEN_RESULTS;

    if (!matchHooks.includes('barangay')) {
      throw new InvalidRequestError(
        "`match_hooks` needs at least 'barangay'",
        'match_hooks',
        "For example ['barangay', 'municipality']"
      );
    }
    if (!(threshold >= 0 && threshold <= 100)) {
      throw new InvalidRequestError(
        `\`threshold\` must be between 0 and 100, got ${threshold}`,
        'threshold',
        `Omit it to use ${DEFAULT_THRESHOLD}`
      );
    }
    if (!Number.isInteger(n) || n < 1) {
      throw new InvalidRequestError(
        `\`len_results\` must be a positive integer, got ${n}`,
        'len_results',
        `Omit it to use ${DEFAULT_LEN_RESULTS}`
      );
    }

    const results: Barangay[] = this.matcher
      .search(request.searchString, matchHooks, threshold, n)
      .map((candidate) => ({
        barangay: candidate.barangay,
        province_or_huc: candidate.province_or_huc,
        municipality_or_city: candidate.municipality_or_city,
        psgc_id: candidate.psgc_id,
      }));

    return {
      results,
      elapsed_seconds: (this.now() - startTime) / 1000,
    };
  }
}
