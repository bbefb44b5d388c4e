import type { AnalysisConfig } from "./analysis-config.js";
import type { OutputFormat } from "./cli-options.js";
import { renderEntityReport, summarizeEntities, type EntityProofSummary } from "./entity-report.js";
import { suggestProverOrder, type FileProverRanking } from "./prover-ranking.js";
import { renderProverRankingText, renderProverSuggestion } from "./prover-suggestion.js";
import { ingestSparkProject, type SparkIngestionWarning, type SparkReportStats } from "./spark-ingestion.js";

export interface ProofTimingAnalysisRequest {
  directory: string;
  config: AnalysisConfig;
  list: boolean;
  suggest: boolean;
  onReportLoaded?: (filePath: string, stats: SparkReportStats) => void;
}

export interface ProofTimingAnalysis {
  reportFiles: string[];
  warnings: SparkIngestionWarning[];
  entities?: EntityProofSummary[];
  rankings?: FileProverRanking[];
}

export async function runProofTimingAnalysis(request: ProofTimingAnalysisRequest): Promise<ProofTimingAnalysis> {
  const ingestion = await ingestSparkProject(request.directory, {
    excludeDirectories: request.config.excludeDirectories,
    onReportLoaded: request.onReportLoaded,
  });

  return {
    reportFiles: ingestion.reportFiles,
    warnings: ingestion.warnings,
    entities: request.list ? summarizeEntities(ingestion.tree, request.config) : undefined,
    rankings: request.suggest ? suggestProverOrder(ingestion.tree) : undefined,
  };
}

export function renderProofTimingAnalysis(analysis: ProofTimingAnalysis, format: OutputFormat): string {
  if (format === "json") {
    return JSON.stringify(analysis, null, 2);
  }

  const sections: string[] = [];
  if (analysis.entities) {
    sections.push(renderEntityReport(analysis.entities));
  }
  if (analysis.rankings) {
    sections.push(renderProverSuggestion(analysis.rankings), renderProverRankingText(analysis.rankings));
  }
  return sections.join("\n\n");
}
