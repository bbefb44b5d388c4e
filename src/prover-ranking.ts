import { createHash } from "node:crypto";
import { TRIVIAL_PROVER, type ProofTree } from "./proof-tree.js";
import { aggregateProverTimings, type ProverTimingAccumulator, type ProverTimingAggregate } from "./prover-timing.js";

export const PROVER_RANKING_SCHEMA_VERSION = "1.0.0";

export interface ProverTimingRecord extends ProverTimingAccumulator {
  prover: string;
}

export interface FileProverRanking {
  fileName: string;
  fileKey: string;
  provers: ProverTimingRecord[];
}

export function compareProverTimings(left: ProverTimingAccumulator, right: ProverTimingAccumulator): number {
  if (left.failedTime !== right.failedTime) {
    return left.failedTime < right.failedTime ? -1 : 1;
  }
  if (left.successTime !== right.successTime) {
    return left.successTime > right.successTime ? -1 : 1;
  }
  return 0;
}

export function compareFileRankings(left: FileProverRanking, right: FileProverRanking): number {
  const byName = compareCodeUnits(left.fileName, right.fileName);
  if (byName !== 0) {
    return byName;
  }
  return compareCodeUnits(left.fileKey, right.fileKey);
}

export function rankProverTimings(aggregate: ProverTimingAggregate): FileProverRanking[] {
  const rankings: FileProverRanking[] = [];

  for (const [fileKey, entry] of aggregate) {
    const provers: ProverTimingRecord[] = [];
    for (const [prover, accumulator] of entry.provers) {
      if (prover === TRIVIAL_PROVER) {
        continue;
      }
      provers.push({ prover, ...accumulator });
    }

    if (provers.length === 0) {
      continue;
    }

    provers.sort(compareProverTimings);
    rankings.push({ fileName: entry.representativeName, fileKey, provers });
  }

  return rankings.sort(compareFileRankings);
}

export function suggestProverOrder(tree: ProofTree): FileProverRanking[] {
  return rankProverTimings(aggregateProverTimings(tree));
}

export function renderProverRankingCanonical(rankings: FileProverRanking[]): string {
  const lines: string[] = [`schema=${PROVER_RANKING_SCHEMA_VERSION}`, `files=${rankings.length}`];

  for (const ranking of rankings) {
    lines.push(`file=${ranking.fileName}|key=${ranking.fileKey}|provers=${ranking.provers.length}`);
    for (const record of ranking.provers) {
      lines.push(
        [
          `prover=${record.prover}`,
          `success=${formatSeconds(record.successTime)}`,
          `failed=${formatSeconds(record.failedTime)}`,
          `max_success=${formatSeconds(record.maxSuccessTime)}`,
          `max_steps=${record.maxSteps}`,
        ].join("|"),
      );
    }
  }

  return lines.join("\n");
}

export function computeProverRankingHash(rankings: FileProverRanking[]): string {
  return createHash("sha256").update(renderProverRankingCanonical(rankings)).digest("hex");
}

function formatSeconds(value: number): string {
  return value.toFixed(6);
}

function compareCodeUnits(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
