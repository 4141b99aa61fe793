/**
 * Hierarchy Lookup Service
 *
 * Read-only traversal of the region → province/HUC → municipality/city →
 * barangay hierarchy. Each operation validates every step of the path before
 * descending and fails with {@link NotFoundError} at the first unknown name.
 */

import type { Dataset } from '../data/dataset.js';
import { NotFoundError } from '../core/errors.js';
import type { AdministrativeArea, ProvinceNode, RegionNode } from '../core/types.js';

export interface LookupServiceOptions {
  /**
   * When a province/HUC slot holds barangays directly, require the
   * municipality/city argument to repeat the province/HUC name. Off by
   * default: the argument is ignored for such nodes.
   */
  readonly strictLeafValidation?: boolean;
}

export class HierarchyLookupService {
  private readonly strictLeafValidation: boolean;

  constructor(
    private readonly dataset: Dataset,
    options: LookupServiceOptions = {}
  ) {
    this.strictLeafValidation = options.strictLeafValidation ?? false;
  }

  listRegions(): readonly string[] {
    return [...this.dataset.hierarchy.keys()];
  }

  listProvincesOrHUCs(region: string): readonly string[] {
    return [...this.getRegion(region).keys()];
  }

  /**
   * Municipalities and cities under a province. For an HUC the result is the
   * HUC name itself, which is then a valid municipality/city argument.
   */
  listMunicipalitiesOrCities(region: string, provinceOrHuc: string): readonly string[] {
    const node = this.getProvinceOrHuc(region, provinceOrHuc);

    switch (node.kind) {
      case 'barangays':
        return [provinceOrHuc];
      case 'children':
        return [...node.municipalities.keys()];
    }
  }

  listBarangays(
    region: string,
    provinceOrHuc: string,
    municipalityOrCity: string
  ): readonly string[] {
    const regionNode = this.getRegion(region);
    const node = this.getProvinceOrHuc(region, provinceOrHuc);

    if (node.kind === 'barangays') {
      if (this.strictLeafValidation && municipalityOrCity !== provinceOrHuc) {
        throw this.municipalityNotFound(region, provinceOrHuc, municipalityOrCity);
      }
      return node.barangays;
    }

    const barangays = node.municipalities.get(municipalityOrCity);
    if (barangays) {
      return barangays;
    }

    // Lenient fallback: an HUC addressed under its geographic province
    const sibling = regionNode.get(municipalityOrCity);
    if (sibling?.kind === 'barangays') {
      return sibling.barangays;
    }

    throw this.municipalityNotFound(region, provinceOrHuc, municipalityOrCity);
  }

  getById(psgcId: string): AdministrativeArea {
    const area = this.dataset.getArea(psgcId);
    if (!area) {
      throw new NotFoundError('id', psgcId, '/name/{name}');
    }
    return area;
  }

  /**
   * Exact-name matches across all levels, in dataset order
   */
  getByName(name: string): readonly AdministrativeArea[] {
    return this.dataset.findByName(name);
  }

  private getRegion(region: string): RegionNode {
    const node = this.dataset.hierarchy.get(region);
    if (!node) {
      throw new NotFoundError('region', region, '/regions');
    }
    return node;
  }

  private getProvinceOrHuc(region: string, provinceOrHuc: string): ProvinceNode {
    const node = this.getRegion(region).get(provinceOrHuc);
    if (!node) {
      throw new NotFoundError(
        'province_or_huc',
        provinceOrHuc,
        `/${region}/provinces_and_highly_urbanized_cities`
      );
    }
    return node;
  }

  private municipalityNotFound(
    region: string,
    provinceOrHuc: string,
    municipalityOrCity: string
  ): NotFoundError {
    return new NotFoundError(
      'municipality_or_city',
      municipalityOrCity,
      `/${region}/${provinceOrHuc}/municipalities_and_cities`
    );
  }
}
