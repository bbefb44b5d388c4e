import { isValidOutcome, listEntities, listProofAttempts, listProofItems, type ProofTree } from "./proof-tree.js";
import { resolveSourceName } from "./source-name.js";
import { normalizeProverSteps } from "./step-normalization.js";

export interface ProverTimingAccumulator {
  successTime: number;
  failedTime: number;
  maxSuccessTime: number;
  maxSteps: number;
}

export interface FileTimingEntry {
  representativeName: string;
  provers: Map<string, ProverTimingAccumulator>;
}

export type ProverTimingAggregate = Map<string, FileTimingEntry>;

export function createProverTimingAccumulator(): ProverTimingAccumulator {
  return {
    successTime: 0,
    failedTime: 0,
    maxSuccessTime: 0,
    maxSteps: 0,
  };
}

export function aggregateProverTimings(tree: ProofTree): ProverTimingAggregate {
  const aggregate: ProverTimingAggregate = new Map();

  for (const entity of listEntities(tree)) {
    for (const item of listProofItems(tree, entity)) {
      const fileEntry = getOrInsertFileEntry(aggregate, item.fileKey);

      for (const attempt of listProofAttempts(tree, item)) {
        fileEntry.representativeName = resolveSourceName(fileEntry.representativeName, item.sourceFile);
        const accumulator = getOrInsertAccumulator(fileEntry, attempt.prover);
        if (isValidOutcome(attempt.outcome)) {
          accumulator.successTime += attempt.timeSeconds;
          accumulator.maxSuccessTime = Math.max(accumulator.maxSuccessTime, attempt.timeSeconds);
          accumulator.maxSteps = Math.max(accumulator.maxSteps, normalizeProverSteps(attempt.prover, attempt.steps));
        } else {
          accumulator.failedTime += attempt.timeSeconds;
        }
      }
    }
  }

  return aggregate;
}

function getOrInsertFileEntry(aggregate: ProverTimingAggregate, fileKey: string): FileTimingEntry {
  const existing = aggregate.get(fileKey);
  if (existing) {
    return existing;
  }
  const created: FileTimingEntry = { representativeName: "", provers: new Map() };
  aggregate.set(fileKey, created);
  return created;
}

function getOrInsertAccumulator(fileEntry: FileTimingEntry, prover: string): ProverTimingAccumulator {
  const existing = fileEntry.provers.get(prover);
  if (existing) {
    return existing;
  }
  const created = createProverTimingAccumulator();
  fileEntry.provers.set(prover, created);
  return created;
}
