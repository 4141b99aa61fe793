/**
 * Shared test fixtures
 *
 * The sample bundle shipped in data/sample-psgc.json:
 *
 * National Capital Region
 *   Quezon City (HUC)     → Alicia, Bagong Pag-asa, Bahay Toro
 *   City of Makati (HUC)  → Bel-Air, Poblacion, San Lorenzo
 *   Pateros               → Aguho, Poblacion
 * Region IV-A (CALABARZON)
 *   Batangas → City of Lipa (Antipolo del Norte, Marawoy), Nasugbu (Bucana, Wawa)
 *   Laguna   → City of Calamba (Real, Bagong Kalsada), Los Baños (Batong Malake, Anos)
 * Region VII (Central Visayas)
 *   Cebu City (HUC) → Lahug, Mabolo, Guadalupe
 *   Bohol → City of Tagbilaran (Cogon, Poblacion I), Panglao (Danao, Tawala)
 */

import { readFileSync } from 'node:fs';
import type { Dataset } from '../../data/dataset.js';
import { DEFAULT_DATASET_PATH, parseDatasetBundle } from '../../data/loaders/dataset-loader.js';

export const NCR = 'National Capital Region';
export const CALABARZON = 'Region IV-A (CALABARZON)';
export const CENTRAL_VISAYAS = 'Region VII (Central Visayas)';

export function readSampleBundle(): unknown {
  return JSON.parse(readFileSync(DEFAULT_DATASET_PATH, 'utf-8'));
}

export function loadSampleDataset(): Dataset {
  return parseDatasetBundle(readSampleBundle());
}

/**
 * Minimal well-formed bundle: one region, one HUC, one barangay
 */
export function createTinyBundle(): {
  hierarchy: Record<string, Record<string, string[] | Record<string, string[]>>>;
  areas: Record<string, string | null>[];
} {
  return {
    hierarchy: {
      'Test Region': {
        'Test City': ['Test Barangay'],
      },
    },
    areas: [
      { name: 'Test Region', psgc_id: '990000000', level: 'region', parent_psgc_id: null },
      { name: 'Test City', psgc_id: '990100000', level: 'huc', parent_psgc_id: '990000000' },
      {
        name: 'Test Barangay',
        psgc_id: '990100001',
        level: 'barangay',
        parent_psgc_id: '990100000',
        barangay: 'Test Barangay',
        province_or_huc: 'Test City',
      },
    ],
  };
}
