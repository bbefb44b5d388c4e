export const VALID_OUTCOME = "Valid";
export const TRIVIAL_PROVER = "Trivial";

export type ProofNodeKind = "entity" | "proof_item" | "proof_attempt";

export type ProofOutcome = "Valid" | "Invalid" | "Timeout" | "Unknown" | (string & {});

export interface EntityNode {
  kind: "entity";
  index: number;
  name: string;
  sourceFile: string;
  line: number;
  childIndices: number[];
}

export interface ProofItemNode {
  kind: "proof_item";
  index: number;
  parentIndex: number;
  fileKey: string;
  sourceFile: string;
  line: number;
  column: number;
  rule: string;
  severity: string;
  childIndices: number[];
}

export interface ProofAttemptNode {
  kind: "proof_attempt";
  index: number;
  parentIndex: number;
  prover: string;
  outcome: ProofOutcome;
  timeSeconds: number;
  steps: number;
}

export type ProofNode = EntityNode | ProofItemNode | ProofAttemptNode;

export interface ProofTree {
  nodes: ProofNode[];
  entityIndices: number[];
}

export interface EntityInput {
  name: string;
  sourceFile: string;
  line?: number;
}

export interface ProofItemInput {
  fileKey: string;
  sourceFile: string;
  line?: number;
  column?: number;
  rule?: string;
  severity?: string;
}

export interface ProofAttemptInput {
  prover: string;
  outcome: ProofOutcome;
  timeSeconds: number;
  steps: number;
}

export class ProofTreeInvariantError extends Error {
  public readonly nodeIndex?: number;

  public constructor(message: string, nodeIndex?: number) {
    super(message);
    this.name = "ProofTreeInvariantError";
    this.nodeIndex = nodeIndex;
  }
}

export function createProofTree(): ProofTree {
  return { nodes: [], entityIndices: [] };
}

export function addEntity(tree: ProofTree, input: EntityInput): EntityNode {
  const node: EntityNode = {
    kind: "entity",
    index: tree.nodes.length,
    name: input.name,
    sourceFile: input.sourceFile,
    line: input.line ?? 0,
    childIndices: [],
  };
  tree.nodes.push(node);
  tree.entityIndices.push(node.index);
  return node;
}

export function addProofItem(tree: ProofTree, entityIndex: number, input: ProofItemInput): ProofItemNode {
  const parent = getEntityNode(tree, entityIndex);
  const node: ProofItemNode = {
    kind: "proof_item",
    index: tree.nodes.length,
    parentIndex: parent.index,
    fileKey: input.fileKey,
    sourceFile: input.sourceFile,
    line: input.line ?? 0,
    column: input.column ?? 0,
    rule: input.rule ?? "",
    severity: input.severity ?? "",
    childIndices: [],
  };
  tree.nodes.push(node);
  parent.childIndices.push(node.index);
  return node;
}

export function addProofAttempt(tree: ProofTree, proofItemIndex: number, input: ProofAttemptInput): ProofAttemptNode {
  const parent = getProofItemNode(tree, proofItemIndex);
  if (!Number.isFinite(input.timeSeconds) || input.timeSeconds < 0) {
    throw new ProofTreeInvariantError(
      `Proof attempt time must be a finite non-negative number (got ${String(input.timeSeconds)}).`,
      proofItemIndex,
    );
  }
  if (!Number.isInteger(input.steps) || input.steps < 0) {
    throw new ProofTreeInvariantError(
      `Proof attempt steps must be a non-negative integer (got ${String(input.steps)}).`,
      proofItemIndex,
    );
  }

  const node: ProofAttemptNode = {
    kind: "proof_attempt",
    index: tree.nodes.length,
    parentIndex: parent.index,
    prover: input.prover,
    outcome: input.outcome,
    timeSeconds: input.timeSeconds,
    steps: input.steps,
  };
  tree.nodes.push(node);
  parent.childIndices.push(node.index);
  return node;
}

export function getProofNode(tree: ProofTree, index: number): ProofNode {
  const node = tree.nodes[index];
  if (!node) {
    throw new ProofTreeInvariantError(`Proof tree has no node at index ${index}.`, index);
  }
  return node;
}

export function getEntityNode(tree: ProofTree, index: number): EntityNode {
  const node = getProofNode(tree, index);
  if (node.kind !== "entity") {
    throw new ProofTreeInvariantError(`Node ${index} is a ${node.kind}, expected an entity.`, index);
  }
  return node;
}

export function getProofItemNode(tree: ProofTree, index: number): ProofItemNode {
  const node = getProofNode(tree, index);
  if (node.kind !== "proof_item") {
    throw new ProofTreeInvariantError(`Node ${index} is a ${node.kind}, expected a proof item.`, index);
  }
  return node;
}

export function getProofAttemptNode(tree: ProofTree, index: number): ProofAttemptNode {
  const node = getProofNode(tree, index);
  if (node.kind !== "proof_attempt") {
    throw new ProofTreeInvariantError(`Node ${index} is a ${node.kind}, expected a proof attempt.`, index);
  }
  return node;
}

export function listEntities(tree: ProofTree): EntityNode[] {
  return tree.entityIndices.map((index) => getEntityNode(tree, index));
}

export function listProofItems(tree: ProofTree, entity: EntityNode): ProofItemNode[] {
  return entity.childIndices.map((index) => {
    const item = getProofItemNode(tree, index);
    if (item.parentIndex !== entity.index) {
      throw new ProofTreeInvariantError(`Proof item ${index} is not owned by entity ${entity.index}.`, index);
    }
    return item;
  });
}

export function listProofAttempts(tree: ProofTree, item: ProofItemNode): ProofAttemptNode[] {
  return item.childIndices.map((index) => {
    const attempt = getProofAttemptNode(tree, index);
    if (attempt.parentIndex !== item.index) {
      throw new ProofTreeInvariantError(`Proof attempt ${index} is not owned by proof item ${item.index}.`, index);
    }
    return attempt;
  });
}

export function getParentNode(tree: ProofTree, node: ProofNode): EntityNode | ProofItemNode | undefined {
  switch (node.kind) {
    case "entity":
      return undefined;
    case "proof_item":
      return getEntityNode(tree, node.parentIndex);
    case "proof_attempt":
      return getProofItemNode(tree, node.parentIndex);
  }
}

export function countProofNodes(tree: ProofTree): Record<ProofNodeKind, number> {
  const counts: Record<ProofNodeKind, number> = { entity: 0, proof_item: 0, proof_attempt: 0 };
  for (const node of tree.nodes) {
    counts[node.kind] += 1;
  }
  return counts;
}

export function isValidOutcome(outcome: ProofOutcome): boolean {
  return outcome === VALID_OUTCOME;
}
