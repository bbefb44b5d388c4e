import { describe, expect, test } from "vitest";
import { addEntity, addProofAttempt, addProofItem, createProofTree } from "../src/proof-tree.js";
import { aggregateProverTimings, createProverTimingAccumulator } from "../src/prover-timing.js";
import { suggestProverOrder } from "../src/prover-ranking.js";

describe("prover timing aggregation", () => {
  test("accumulates success and failure time per file and prover", () => {
    const tree = createProofTree();
    const increment = addEntity(tree, { name: "Pkg.Increment", sourceFile: "pkg.ads", line: 4 });
    const decrement = addEntity(tree, { name: "Pkg.Decrement", sourceFile: "pkg.ads", line: 9 });

    const overflow = addProofItem(tree, increment.index, { fileKey: "pkg", sourceFile: "pkg.adb" });
    addProofAttempt(tree, overflow.index, { prover: "CVC4", outcome: "Unknown", timeSeconds: 1.5, steps: 90_000 });
    addProofAttempt(tree, overflow.index, { prover: "Z3", outcome: "Valid", timeSeconds: 0.5, steps: 452_400 });

    const range = addProofItem(tree, decrement.index, { fileKey: "pkg", sourceFile: "pkg.adb" });
    addProofAttempt(tree, range.index, { prover: "CVC4", outcome: "Valid", timeSeconds: 0.25, steps: 15_350 });
    addProofAttempt(tree, range.index, { prover: "Z3", outcome: "Valid", timeSeconds: 1.75, steps: 450_000 });
    addProofAttempt(tree, range.index, { prover: "CVC4", outcome: "Valid", timeSeconds: 0.5, steps: 15_035 });

    const aggregate = aggregateProverTimings(tree);

    expect([...aggregate.keys()]).toEqual(["pkg"]);
    const entry = aggregate.get("pkg");
    expect(entry?.representativeName).toBe("pkg.adb");
    expect(entry?.provers.get("CVC4")).toEqual({ successTime: 0.75, failedTime: 1.5, maxSuccessTime: 0.5, maxSteps: 11 });
    expect(entry?.provers.get("Z3")).toEqual({ successTime: 2.25, failedTime: 0, maxSuccessTime: 1.75, maxSteps: 4 });
  });

  test("creates zeroed accumulators for provers that only failed", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Util.Divide", sourceFile: "util.ads" });
    const item = addProofItem(tree, entity.index, { fileKey: "util", sourceFile: "util.adb" });
    addProofAttempt(tree, item.index, { prover: "altergo", outcome: "Timeout", timeSeconds: 3, steps: 400 });

    const accumulator = aggregateProverTimings(tree).get("util")?.provers.get("altergo");
    expect(accumulator).toEqual({ ...createProverTimingAccumulator(), failedTime: 3 });
  });

  test("keeps separate files apart and resolves each representative name", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Pkg", sourceFile: "pkg.ads" });
    for (const [fileKey, sourceFile] of [
      ["pkg", "pkg-child.adb"],
      ["other", "other.adb"],
      ["pkg", "pkg.ads"],
      ["pkg", "pkg-child-grandchild.adb"],
    ]) {
      const item = addProofItem(tree, entity.index, { fileKey, sourceFile });
      addProofAttempt(tree, item.index, { prover: "Trivial", outcome: "Valid", timeSeconds: 0, steps: 0 });
    }

    const aggregate = aggregateProverTimings(tree);
    expect([...aggregate.keys()]).toEqual(["pkg", "other"]);
    expect(aggregate.get("pkg")?.representativeName).toBe("pkg.ads");
    expect(aggregate.get("other")?.representativeName).toBe("other.adb");
    expect(aggregate.get("pkg")?.provers.get("Trivial")).toEqual({ successTime: 0, failedTime: 0, maxSuccessTime: 0, maxSteps: 1 });
  });

  test("registers a file without a name when its proof items recorded no attempts", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Empty", sourceFile: "empty.ads" });
    addProofItem(tree, entity.index, { fileKey: "empty", sourceFile: "empty.adb" });

    const entry = aggregateProverTimings(tree).get("empty");
    expect(entry?.representativeName).toBe("");
    expect(entry?.provers.size).toBe(0);
  });

  test("ignores the source file of proof items without attempts when naming a file", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Pkg.Child", sourceFile: "pkg.ads" });
    const proved = addProofItem(tree, entity.index, { fileKey: "pkg", sourceFile: "pkg-child.adb" });
    addProofAttempt(tree, proved.index, { prover: "CVC4", outcome: "Valid", timeSeconds: 0.5, steps: 15_000 });
    addProofItem(tree, entity.index, { fileKey: "pkg", sourceFile: "x.adb" });

    expect(aggregateProverTimings(tree).get("pkg")?.representativeName).toBe("pkg-child.adb");
    expect(suggestProverOrder(tree).map((ranking) => ranking.fileName)).toEqual(["pkg-child.adb"]);
  });

  test("starts from scratch on every run", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Unit", sourceFile: "unit.ads" });
    const item = addProofItem(tree, entity.index, { fileKey: "unit", sourceFile: "unit.adb" });
    addProofAttempt(tree, item.index, { prover: "Z3", outcome: "Valid", timeSeconds: 2, steps: 0 });

    aggregateProverTimings(tree);
    const second = aggregateProverTimings(tree);
    expect(second.get("unit")?.provers.get("Z3")?.successTime).toBe(2);
  });
});
