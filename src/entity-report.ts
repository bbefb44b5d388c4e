import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from "./analysis-config.js";
import { isValidOutcome, listEntities, listProofAttempts, listProofItems, type ProofTree } from "./proof-tree.js";
import { normalizeProverSteps } from "./step-normalization.js";

export interface EntityProofSummary {
  name: string;
  sourceFile: string;
  line: number;
  proofItemCount: number;
  failedItemCount: number;
  unprovedItemCount: number;
  totalTime: number;
  maxTime: number;
  maxSuccessTime: number;
  maxSteps: number;
}

export type EntityReportOptions = Pick<AnalysisConfig, "reportMode" | "sortBy" | "cutOffSeconds">;

export function summarizeEntities(
  tree: ProofTree,
  options: EntityReportOptions = DEFAULT_ANALYSIS_CONFIG,
): EntityProofSummary[] {
  const summaries: EntityProofSummary[] = [];

  for (const entity of listEntities(tree)) {
    const summary: EntityProofSummary = {
      name: entity.name,
      sourceFile: entity.sourceFile,
      line: entity.line,
      proofItemCount: 0,
      failedItemCount: 0,
      unprovedItemCount: 0,
      totalTime: 0,
      maxTime: 0,
      maxSuccessTime: 0,
      maxSteps: 0,
    };

    for (const item of listProofItems(tree, entity)) {
      const attempts = listProofAttempts(tree, item);
      summary.proofItemCount += 1;
      if (attempts.some((attempt) => !isValidOutcome(attempt.outcome))) {
        summary.failedItemCount += 1;
      }
      if (!attempts.some((attempt) => isValidOutcome(attempt.outcome))) {
        summary.unprovedItemCount += 1;
      }

      for (const attempt of attempts) {
        summary.totalTime += attempt.timeSeconds;
        summary.maxTime = Math.max(summary.maxTime, attempt.timeSeconds);
        if (isValidOutcome(attempt.outcome)) {
          summary.maxSuccessTime = Math.max(summary.maxSuccessTime, attempt.timeSeconds);
          summary.maxSteps = Math.max(summary.maxSteps, normalizeProverSteps(attempt.prover, attempt.steps));
        }
      }
    }

    if (isReported(summary, options)) {
      summaries.push(summary);
    }
  }

  return summaries.sort((left, right) => compareSummaries(left, right, options.sortBy));
}

export function renderEntityReport(summaries: EntityProofSummary[]): string {
  if (summaries.length === 0) {
    return "No entities matched the report mode.";
  }

  const nameWidth = summaries.reduce((width, summary) => Math.max(width, summary.name.length), 0);
  const locationWidth = summaries.reduce((width, summary) => Math.max(width, formatLocation(summary).length), 0);

  return summaries
    .map((summary) =>
      [
        summary.name.padEnd(nameWidth),
        formatLocation(summary).padEnd(locationWidth),
        `items=${summary.proofItemCount}`,
        `failed=${summary.failedItemCount}`,
        `unproved=${summary.unprovedItemCount}`,
        `time=${summary.totalTime.toFixed(2)}s`,
        `max=${summary.maxTime.toFixed(2)}s`,
        `steps=${summary.maxSteps}`,
      ].join("  "),
    )
    .join("\n");
}

function isReported(summary: EntityProofSummary, options: EntityReportOptions): boolean {
  if (summary.maxTime < options.cutOffSeconds) {
    return false;
  }
  switch (options.reportMode) {
    case "all":
      return summary.proofItemCount > 0;
    case "failed":
      return summary.failedItemCount > 0;
    case "unproved":
      return summary.unprovedItemCount > 0;
  }
}

function compareSummaries(left: EntityProofSummary, right: EntityProofSummary, sortBy: EntityReportOptions["sortBy"]): number {
  if (sortBy === "time" && left.totalTime !== right.totalTime) {
    return right.totalTime - left.totalTime;
  }
  if (sortBy === "max-time" && left.maxTime !== right.maxTime) {
    return right.maxTime - left.maxTime;
  }
  if (left.name !== right.name) {
    return left.name.localeCompare(right.name);
  }
  return left.line - right.line;
}

function formatLocation(summary: EntityProofSummary): string {
  return summary.sourceFile ? `${summary.sourceFile}:${summary.line}` : "-";
}
