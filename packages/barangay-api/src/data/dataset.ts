/**
 * Immutable PSGC dataset context
 *
 * Holds the region → province/HUC → municipality/city → barangay hierarchy and
 * the flat record index, with O(1) lookups by PSGC id and by exact name.
 * Constructed once per process and injected into the lookup service and the
 * matcher.
 */

import type { DatasetIssue } from '../core/errors.js';
import type {
  AdministrativeArea,
  AdministrativeLevel,
  Hierarchy,
} from '../core/types.js';

export interface DatasetMeta {
  readonly source?: string;
  readonly generated?: string;
  readonly description?: string;
}

export interface DatasetStats {
  readonly regions: number;
  readonly areas: number;
  readonly barangays: number;
  readonly byLevel: Readonly<Record<AdministrativeLevel, number>>;
}

export class Dataset {
  private readonly byId: ReadonlyMap<string, AdministrativeArea>;
  private readonly byName: ReadonlyMap<string, readonly AdministrativeArea[]>;
  private readonly barangayAreas: readonly AdministrativeArea[];

  /**
   * Violations found while indexing (duplicate ids, hierarchy names without a
   * flat record). The loader decides whether they are fatal.
   */
  readonly issues: readonly DatasetIssue[];

  constructor(
    readonly hierarchy: Hierarchy,
    readonly areas: readonly AdministrativeArea[],
    readonly meta: DatasetMeta = {}
  ) {
    const byId = new Map<string, AdministrativeArea>();
    const byName = new Map<string, AdministrativeArea[]>();
    const issues: DatasetIssue[] = [];

    for (const area of areas) {
      if (byId.has(area.psgc_id)) {
        issues.push({
          kind: 'duplicate_psgc_id',
          value: area.psgc_id,
          message: `PSGC id ${area.psgc_id} is used by more than one record ('${area.name}')`,
        });
      } else {
        byId.set(area.psgc_id, area);
      }

      const sameName = byName.get(area.name);
      if (sameName) {
        sameName.push(area);
      } else {
        byName.set(area.name, [area]);
      }
    }

    for (const name of hierarchyNames(hierarchy)) {
      if (!byName.has(name)) {
        issues.push({
          kind: 'missing_flat_entry',
          value: name,
          message: `'${name}' appears in the hierarchy but has no flat record`,
        });
      }
    }

    this.byId = byId;
    this.byName = byName;
    this.barangayAreas = Object.freeze(areas.filter((area) => area.level === 'barangay'));
    this.issues = Object.freeze(issues);
    Object.freeze(this);
  }

  getArea(psgcId: string): AdministrativeArea | undefined {
    return this.byId.get(psgcId);
  }

  findByName(name: string): readonly AdministrativeArea[] {
    return this.byName.get(name) ?? [];
  }

  /** Barangay records in source order (search candidates) */
  get barangays(): readonly AdministrativeArea[] {
    return this.barangayAreas;
  }

  getStats(): DatasetStats {
    const byLevel: Record<AdministrativeLevel, number> = {
      region: 0,
      province: 0,
      huc: 0,
      municipality: 0,
      city: 0,
      barangay: 0,
    };
    for (const area of this.areas) {
      byLevel[area.level]++;
    }

    return {
      regions: this.hierarchy.size,
      areas: this.areas.length,
      barangays: this.barangayAreas.length,
      byLevel,
    };
  }
}

/**
 * Every distinct name mentioned anywhere in the hierarchy
 */
function hierarchyNames(hierarchy: Hierarchy): Set<string> {
  const names = new Set<string>();

  for (const [region, provinces] of hierarchy) {
    names.add(region);
    for (const [provinceOrHuc, node] of provinces) {
      names.add(provinceOrHuc);
      switch (node.kind) {
        case 'barangays':
          node.barangays.forEach((barangay) => names.add(barangay));
          break;
        case 'children':
          for (const [municipalityOrCity, barangays] of node.municipalities) {
            names.add(municipalityOrCity);
            barangays.forEach((barangay) => names.add(barangay));
          }
          break;
      }
    }
  }

  return names;
}
