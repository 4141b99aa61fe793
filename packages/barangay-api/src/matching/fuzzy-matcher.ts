/**
 * Fuzzy barangay matcher
 *
 * Scores every barangay record against a free-text query with fuzzball's
 * token-sort ratio (0-100). The match hooks select which of the record's
 * province / municipality / barangay names make up the text being scored.
 */

import * as fuzz from 'fuzzball';
import type { Dataset } from '../data/dataset.js';
import type {
  AdministrativeArea,
  BarangayCandidate,
  BarangayMatcher,
  MatchHook,
} from '../core/types.js';

/**
 * Phrases that carry no signal for matching ("City of Makati" vs "Makati")
 */
const IGNORED_PHRASES = ['city of', 'municipality of', '(pob.)'] as const;

/**
 * Lower-case, drop ignored phrases, keep only letters and digits
 */
export function normalizeSearchText(text: string): string {
  let normalized = text.toLowerCase();
  for (const phrase of IGNORED_PHRASES) {
    normalized = normalized.split(phrase).join(' ');
  }
  return normalized
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

/**
 * Text scored for a record under the given hooks, in the order
 * province, municipality, barangay
 */
export function candidateText(area: AdministrativeArea, hooks: ReadonlySet<MatchHook>): string {
  const parts: string[] = [];
  const province = area.province_or_huc;
  // Barangays of an HUC have no municipality; the HUC stands in for it.
  const municipality = area.municipality_or_city ?? province;

  if (hooks.has('province') && province && !(hooks.has('municipality') && municipality === province)) {
    parts.push(province);
  }
  if (hooks.has('municipality') && municipality) {
    parts.push(municipality);
  }
  if (hooks.has('barangay')) {
    parts.push(area.barangay ?? area.name);
  }

  return normalizeSearchText(parts.join(' '));
}

export class FuzzyBarangayMatcher implements BarangayMatcher {
  private readonly candidates: readonly AdministrativeArea[];
  private readonly textCache = new Map<string, readonly string[]>();

  constructor(dataset: Dataset) {
    this.candidates = dataset.barangays;
  }

  search(
    query: string,
    matchHooks: readonly MatchHook[],
    threshold: number,
    n: number
  ): readonly BarangayCandidate[] {
    const normalizedQuery = normalizeSearchText(query);
    const texts = this.getCandidateTexts(matchHooks);

    const scored: { area: AdministrativeArea; score: number }[] = [];
    this.candidates.forEach((area, index) => {
      const score = fuzz.token_sort_ratio(normalizedQuery, texts[index]);
      if (score >= threshold) {
        scored.push({ area, score });
      }
    });

    // Array.prototype.sort is stable: equal scores keep dataset order
    scored.sort((a, b) => b.score - a.score);

    return scored.slice(0, n).map(({ area, score }) => ({
      barangay: area.barangay ?? area.name,
      province_or_huc: area.province_or_huc ?? null,
      municipality_or_city: area.municipality_or_city ?? null,
      psgc_id: area.psgc_id,
      score,
    }));
  }

  private getCandidateTexts(matchHooks: readonly MatchHook[]): readonly string[] {
    const hooks = new Set(matchHooks);
    const key = [...hooks].sort().join('+');

    let texts = this.textCache.get(key);
    if (!texts) {
      texts = this.candidates.map((area) => candidateText(area, hooks));
      this.textCache.set(key, texts);
    }
    return texts;
  }
}
