import type { FileProverRanking } from "./prover-ranking.js";

const SUGGESTION_HEADER = [
  "-- Heuristic prover order derived from recorded proof attempts.",
  "-- Provers that never ran on a file are not considered.",
];

export interface ProofSwitches {
  fileName: string;
  provers: string[];
  steps?: number;
  timeoutSeconds: number;
}

export function buildProofSwitches(ranking: FileProverRanking): ProofSwitches {
  const provers = new Set<string>();
  for (const record of ranking.provers) {
    const switchName = toProverSwitchName(record.prover);
    if (switchName.length > 0) {
      provers.add(switchName);
    }
  }

  const maxSteps = ranking.provers.reduce((max, record) => Math.max(max, record.maxSteps), 0);
  const maxSuccessTime = ranking.provers.reduce((max, record) => Math.max(max, record.maxSuccessTime), 0);

  return {
    fileName: ranking.fileName,
    provers: [...provers],
    steps: maxSteps > 0 ? maxSteps : undefined,
    timeoutSeconds: Math.max(1, Math.ceil(maxSuccessTime)),
  };
}

export function renderProverSuggestion(rankings: FileProverRanking[]): string {
  const lines = [...SUGGESTION_HEADER, "package Prove is"];

  for (const ranking of rankings) {
    const switches = buildProofSwitches(ranking);
    const values = [`"--prover=${switches.provers.join(",")}"`];
    if (switches.steps !== undefined) {
      values.push(`"--steps=${switches.steps}"`);
    }
    values.push(`"--timeout=${switches.timeoutSeconds}"`);
    lines.push(`   for Proof_Switches ("${switches.fileName}") use (${values.join(", ")});`);
  }

  lines.push("end Prove;");
  return lines.join("\n");
}

export function renderProverRankingText(rankings: FileProverRanking[]): string {
  if (rankings.length === 0) {
    return "No prover timings recorded.";
  }

  return rankings
    .map((ranking) => {
      const proverWidth = ranking.provers.reduce((width, record) => Math.max(width, record.prover.length), 0);
      const rows = ranking.provers.map((record, index) =>
        [
          `  ${index + 1}. ${record.prover.padEnd(proverWidth)}`,
          `success=${record.successTime.toFixed(2)}s`,
          `failed=${record.failedTime.toFixed(2)}s`,
          `max_success=${record.maxSuccessTime.toFixed(2)}s`,
          `max_steps=${record.maxSteps}`,
        ].join("  "),
      );
      return [ranking.fileName, ...rows].join("\n");
    })
    .join("\n\n");
}

export function toProverSwitchName(prover: string): string {
  return prover.toLowerCase().replace(/[^a-z0-9_]/g, "");
}
