/**
 * Barangay API Error Types
 *
 * Lookup and search failures carry enough context (level, rejected value,
 * endpoint to query instead) for a caller to retry with a corrected name.
 */

/**
 * Hierarchy level or index a lookup failed at
 */
export type NotFoundLevel =
  | 'region'
  | 'province_or_huc'
  | 'municipality_or_city'
  | 'id';

const NOT_FOUND_LABELS: Record<NotFoundLevel, string> = {
  region: 'region',
  province_or_huc: 'province or highly urbanized city',
  municipality_or_city: 'municipality or city',
  id: 'id',
};

const NOT_FOUND_CODES = {
  region: 'REGION_NOT_FOUND',
  province_or_huc: 'PROVINCE_OR_HUC_NOT_FOUND',
  municipality_or_city: 'MUNICIPALITY_OR_CITY_NOT_FOUND',
  id: 'AREA_NOT_FOUND',
} as const satisfies Record<NotFoundLevel, string>;

export type NotFoundCode = (typeof NOT_FOUND_CODES)[NotFoundLevel];

/**
 * A name or id is absent from the dataset
 */
export class NotFoundError extends Error {
  /**
   * @param level - Hierarchy level (or index) that rejected the value
   * @param value - The rejected name or id
   * @param suggestion - Endpoint listing the valid options
   */
  constructor(
    public readonly level: NotFoundLevel,
    public readonly value: string,
    public readonly suggestion: string
  ) {
    super(`No such ${NOT_FOUND_LABELS[level]}: '${value}'. Try \`${suggestion}\`?`);
    this.name = 'NotFoundError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NotFoundError);
    }
  }

  get code(): NotFoundCode {
    return NOT_FOUND_CODES[this.level];
  }
}

/**
 * Search parameters violate a business rule
 */
export class InvalidRequestError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly suggestion: string
  ) {
    super(`Malformed request: ${message}. ${suggestion}`);
    this.name = 'InvalidRequestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidRequestError);
    }
  }
}

/**
 * One violated dataset invariant
 */
export interface DatasetIssue {
  readonly kind: 'duplicate_psgc_id' | 'missing_flat_entry';
  readonly value: string;
  readonly message: string;
}

/**
 * Dataset bundle is unreadable or violates an invariant
 *
 * RECOVERY:
 * - Regenerate the bundle from the PSGC publication
 * - Set dataset.strictIntegrity: false to load it with warnings instead
 */
export class DatasetIntegrityError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly DatasetIssue[] = []
  ) {
    super(message);
    this.name = 'DatasetIntegrityError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatasetIntegrityError);
    }
  }

  getSummary(): string {
    const lines = [this.message];
    for (const issue of this.issues.slice(0, 10)) {
      lines.push(`  - [${issue.kind}] ${issue.message}`);
    }
    if (this.issues.length > 10) {
      lines.push(`  ... and ${this.issues.length - 10} more issues`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration file or environment cannot be used
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}
