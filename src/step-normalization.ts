interface StepScale {
  proverPrefix: string;
  offset: number;
  divisor: number;
}

const STEP_SCALES: StepScale[] = [
  { proverPrefix: "CVC4", offset: 15_000, divisor: 35 },
  { proverPrefix: "Z3", offset: 450_000, divisor: 800 },
];

export function normalizeProverSteps(prover: string, rawSteps: number): number {
  const scale = STEP_SCALES.find((entry) => prover.startsWith(entry.proverPrefix));
  if (!scale) {
    return rawSteps + 1;
  }
  return Math.trunc(Math.max(rawSteps - scale.offset, 0) / scale.divisor) + 1;
}
