export const REPORT_MODES = ["all", "failed", "unproved"] as const;
export const ENTITY_SORT_ORDERS = ["name", "time", "max-time"] as const;

export type ReportMode = (typeof REPORT_MODES)[number];
export type EntitySortOrder = (typeof ENTITY_SORT_ORDERS)[number];

export interface AnalysisConfig {
  reportMode: ReportMode;
  sortBy: EntitySortOrder;
  cutOffSeconds: number;
  excludeDirectories: string[];
}

export interface AnalysisConfigInput {
  reportMode?: string;
  sortBy?: string;
  cutOffSeconds?: number;
  excludeDirectories?: string[];
}

export type AnalysisConfigCandidate = Required<AnalysisConfigInput>;

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  ok: boolean;
  errors: ValidationError[];
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  reportMode: "all",
  sortBy: "name",
  cutOffSeconds: 0,
  excludeDirectories: [".git", "node_modules"],
};

export function normalizeAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfigCandidate {
  const merged: AnalysisConfigCandidate = {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...stripUndefined(input),
  };

  return {
    reportMode: merged.reportMode.trim().toLowerCase(),
    sortBy: merged.sortBy.trim().toLowerCase(),
    cutOffSeconds: merged.cutOffSeconds,
    excludeDirectories: [...new Set(merged.excludeDirectories.map((entry) => entry.trim()).filter((entry) => entry.length > 0))].sort(
      (left, right) => left.localeCompare(right),
    ),
  };
}

export function validateAnalysisConfig(config: AnalysisConfigCandidate): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isReportMode(config.reportMode)) {
    errors.push({ path: "reportMode", message: `Must be one of: ${REPORT_MODES.join(", ")}.` });
  }
  if (!isEntitySortOrder(config.sortBy)) {
    errors.push({ path: "sortBy", message: `Must be one of: ${ENTITY_SORT_ORDERS.join(", ")}.` });
  }
  if (!Number.isFinite(config.cutOffSeconds) || config.cutOffSeconds < 0) {
    errors.push({ path: "cutOffSeconds", message: "Must be a finite number >= 0." });
  }

  return {
    ok: errors.length === 0,
    errors,
  };
}

export function assertValidAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  const candidate = normalizeAnalysisConfig(input);
  const result = validateAnalysisConfig(candidate);
  if (!isReportMode(candidate.reportMode) || !isEntitySortOrder(candidate.sortBy) || !result.ok) {
    const details = result.errors.map((error) => `${error.path}: ${error.message}`).join(" ");
    throw new Error(`Invalid analysis configuration. ${details}`);
  }

  return {
    reportMode: candidate.reportMode,
    sortBy: candidate.sortBy,
    cutOffSeconds: candidate.cutOffSeconds,
    excludeDirectories: candidate.excludeDirectories,
  };
}

export function isReportMode(value: string): value is ReportMode {
  return REPORT_MODES.some((mode) => mode === value);
}

export function isEntitySortOrder(value: string): value is EntitySortOrder {
  return ENTITY_SORT_ORDERS.some((order) => order === value);
}

function stripUndefined(input: AnalysisConfigInput): AnalysisConfigInput {
  const result: AnalysisConfigInput = {};
  if (input.reportMode !== undefined) {
    result.reportMode = input.reportMode;
  }
  if (input.sortBy !== undefined) {
    result.sortBy = input.sortBy;
  }
  if (input.cutOffSeconds !== undefined) {
    result.cutOffSeconds = input.cutOffSeconds;
  }
  if (input.excludeDirectories !== undefined) {
    result.excludeDirectories = input.excludeDirectories;
  }
  return result;
}
