import { describe, expect, test } from "vitest";
import {
  addEntity,
  addProofAttempt,
  addProofItem,
  countProofNodes,
  createProofTree,
  getParentNode,
  getProofItemNode,
  getProofNode,
  isValidOutcome,
  listEntities,
  listProofAttempts,
  listProofItems,
  ProofTreeInvariantError,
} from "../src/proof-tree.js";

describe("proof tree", () => {
  test("traverses entities, proof items and attempts in insertion order", () => {
    const tree = createProofTree();
    const first = addEntity(tree, { name: "Pkg.First", sourceFile: "pkg.ads", line: 3 });
    const second = addEntity(tree, { name: "Pkg.Second", sourceFile: "pkg.ads" });
    const item = addProofItem(tree, first.index, { fileKey: "pkg", sourceFile: "pkg.adb", rule: "VC_RANGE_CHECK" });
    addProofAttempt(tree, item.index, { prover: "CVC4", outcome: "Unknown", timeSeconds: 1.5, steps: 20 });
    addProofAttempt(tree, item.index, { prover: "Z3", outcome: "Valid", timeSeconds: 0.25, steps: 7 });
    addProofItem(tree, second.index, { fileKey: "pkg", sourceFile: "pkg.ads" });

    expect(listEntities(tree).map((entity) => entity.name)).toEqual(["Pkg.First", "Pkg.Second"]);
    expect(listProofItems(tree, first).map((entry) => entry.sourceFile)).toEqual(["pkg.adb"]);
    expect(listProofAttempts(tree, item).map((attempt) => attempt.prover)).toEqual(["CVC4", "Z3"]);
    expect(listProofItems(tree, second)[0]).toMatchObject({ line: 0, column: 0, rule: "", severity: "" });
    expect(second.line).toBe(0);
    expect(countProofNodes(tree)).toEqual({ entity: 2, proof_item: 2, proof_attempt: 2 });
  });

  test("assigns stable indices and resolves parents by kind", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Unit", sourceFile: "unit.ads" });
    const item = addProofItem(tree, entity.index, { fileKey: "unit", sourceFile: "unit.adb" });
    const attempt = addProofAttempt(tree, item.index, { prover: "altergo", outcome: "Valid", timeSeconds: 0, steps: 0 });

    expect([entity.index, item.index, attempt.index]).toEqual([0, 1, 2]);
    expect(getProofNode(tree, 2)).toBe(attempt);
    expect(getParentNode(tree, attempt)).toBe(item);
    expect(getParentNode(tree, item)).toBe(entity);
    expect(getParentNode(tree, entity)).toBeUndefined();
  });

  test("rejects children attached to the wrong kind of node", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Unit", sourceFile: "unit.ads" });
    const item = addProofItem(tree, entity.index, { fileKey: "unit", sourceFile: "unit.adb" });

    expect(() => addProofItem(tree, item.index, { fileKey: "unit", sourceFile: "unit.adb" })).toThrow(
      "Node 1 is a proof_item, expected an entity.",
    );
    expect(() => addProofAttempt(tree, entity.index, { prover: "Z3", outcome: "Valid", timeSeconds: 1, steps: 1 })).toThrow(
      ProofTreeInvariantError,
    );
    expect(() => getProofItemNode(tree, 42)).toThrow("Proof tree has no node at index 42.");
  });

  test("rejects negative times and fractional step counts", () => {
    const tree = createProofTree();
    const entity = addEntity(tree, { name: "Unit", sourceFile: "unit.ads" });
    const item = addProofItem(tree, entity.index, { fileKey: "unit", sourceFile: "unit.adb" });

    expect(() => addProofAttempt(tree, item.index, { prover: "Z3", outcome: "Valid", timeSeconds: -1, steps: 0 })).toThrow(
      "Proof attempt time must be a finite non-negative number (got -1).",
    );
    expect(() => addProofAttempt(tree, item.index, { prover: "Z3", outcome: "Valid", timeSeconds: 1, steps: 2.5 })).toThrow(
      "Proof attempt steps must be a non-negative integer (got 2.5).",
    );
    expect(item.childIndices).toEqual([]);
  });

  test("detects children whose parent link disagrees with the owner", () => {
    const tree = createProofTree();
    const owner = addEntity(tree, { name: "Owner", sourceFile: "owner.ads" });
    const other = addEntity(tree, { name: "Other", sourceFile: "other.ads" });
    const item = addProofItem(tree, owner.index, { fileKey: "owner", sourceFile: "owner.adb" });
    other.childIndices.push(item.index);

    expect(() => listProofItems(tree, other)).toThrow("Proof item 2 is not owned by entity 1.");
  });

  test("only the literal Valid outcome counts as a success", () => {
    expect(isValidOutcome("Valid")).toBe(true);
    expect(isValidOutcome("valid")).toBe(false);
    expect(isValidOutcome("Timeout")).toBe(false);
    expect(isValidOutcome("Step_Limit")).toBe(false);
  });
});
