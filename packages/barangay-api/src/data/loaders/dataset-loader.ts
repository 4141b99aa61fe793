/**
 * PSGC Dataset Loader
 *
 * Reads a dataset bundle (JSON) and builds the immutable {@link Dataset}.
 *
 * BUNDLE FORMAT:
 * ```json
 * {
 *   "meta": { "source": "PSGC Q2 2024", "generated": "2024-07-01" },
 *   "hierarchy": {
 *     "National Capital Region": {
 *       "Quezon City": ["Alicia", "Bahay Toro"],
 *       "City of Manila": { "Ermita": ["Barangay 659"] }
 *     }
 *   },
 *   "areas": [{ "name": "Alicia", "psgc_id": "137404001", "level": "barangay", ... }]
 * }
 * ```
 *
 * A province/HUC value is either an object (municipality/city → barangays) or a
 * barangay array (HUC holding its barangays directly). This is the only place
 * where that shape is inspected; everything downstream switches on
 * {@link ProvinceNode.kind}.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Dataset } from '../dataset.js';
import { DatasetIntegrityError } from '../../core/errors.js';
import {
  ADMINISTRATIVE_LEVELS,
  type AdministrativeArea,
  type Hierarchy,
  type ProvinceNode,
  type RegionNode,
} from '../../core/types.js';
import { createLogger } from '../../core/utils/logger.js';

const log = createLogger({ module: 'dataset' });

/**
 * Sample bundle shipped with the package
 */
export const DEFAULT_DATASET_PATH = fileURLToPath(
  new URL('../../../data/sample-psgc.json', import.meta.url)
);

const barangayListSchema = z.array(z.string().min(1));

const provinceValueSchema = z.union([
  barangayListSchema,
  z.record(z.string(), barangayListSchema),
]);

const hierarchySchema = z.record(z.string(), z.record(z.string(), provinceValueSchema));

const areaSchema = z.object({
  name: z.string().min(1),
  psgc_id: z.string().regex(/^\d{9,10}$/, 'PSGC id must be 9 or 10 digits'),
  level: z.enum(ADMINISTRATIVE_LEVELS),
  parent_psgc_id: z.string().nullable(),
  barangay: z.string().optional(),
  province_or_huc: z.string().optional(),
  municipality_or_city: z.string().optional(),
});

const bundleSchema = z.object({
  meta: z
    .object({
      source: z.string().optional(),
      generated: z.string().optional(),
      description: z.string().optional(),
    })
    .default({}),
  hierarchy: hierarchySchema,
  areas: z.array(areaSchema),
});

type RawHierarchy = z.infer<typeof hierarchySchema>;

export interface LoadDatasetOptions {
  /**
   * Abort on invariant violations (default). When false they are logged as
   * warnings and the dataset is served as-is.
   */
  readonly strictIntegrity?: boolean;
}

/**
 * Build a dataset from an already-parsed bundle
 *
 * @throws DatasetIntegrityError when the bundle fails schema validation, or
 *   violates an invariant while `strictIntegrity` is on
 */
export function parseDatasetBundle(
  raw: unknown,
  options: LoadDatasetOptions = {}
): Dataset {
  const { strictIntegrity = true } = options;
  const parsed = bundleSchema.safeParse(raw);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DatasetIntegrityError(`Invalid dataset bundle: ${problems.join('; ')}`);
  }

  const areas: readonly AdministrativeArea[] = Object.freeze(
    parsed.data.areas.map((area) => Object.freeze(area))
  );
  const dataset = new Dataset(toHierarchy(parsed.data.hierarchy), areas, parsed.data.meta);

  if (dataset.issues.length > 0) {
    const error = new DatasetIntegrityError(
      `Dataset violates ${dataset.issues.length} integrity constraint(s)`,
      dataset.issues
    );
    if (strictIntegrity) {
      throw error;
    }
    log.warn('Serving dataset with integrity issues', {
      issueCount: dataset.issues.length,
      sample: dataset.issues.slice(0, 5).map((issue) => issue.message),
    });
  }

  return dataset;
}

/**
 * Read and build a dataset bundle from disk
 */
export async function loadDataset(
  path: string = DEFAULT_DATASET_PATH,
  options: LoadDatasetOptions = {}
): Promise<Dataset> {
  const startTime = performance.now();
  const content = await readFile(path, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DatasetIntegrityError(
      `Dataset bundle ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const dataset = parseDatasetBundle(raw, options);
  const stats = dataset.getStats();

  log.info('Dataset loaded', {
    path,
    source: dataset.meta.source,
    regions: stats.regions,
    areas: stats.areas,
    barangays: stats.barangays,
    loadMs: Math.round(performance.now() - startTime),
  });

  return dataset;
}

function toHierarchy(raw: RawHierarchy): Hierarchy {
  const regions = new Map<string, RegionNode>();

  for (const [region, provinces] of Object.entries(raw)) {
    const nodes = new Map<string, ProvinceNode>();

    for (const [provinceOrHuc, value] of Object.entries(provinces)) {
      if (Array.isArray(value)) {
        nodes.set(provinceOrHuc, {
          kind: 'barangays',
          barangays: Object.freeze([...value]),
        });
      } else {
        const municipalities = new Map<string, readonly string[]>();
        for (const [municipalityOrCity, barangays] of Object.entries(value)) {
          municipalities.set(municipalityOrCity, Object.freeze([...barangays]));
        }
        nodes.set(provinceOrHuc, { kind: 'children', municipalities });
      }
    }

    regions.set(region, nodes);
  }

  return regions;
}
