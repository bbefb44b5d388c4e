import { promises as fs, type Stats } from "node:fs";
import path from "node:path";
import { DEFAULT_ANALYSIS_CONFIG } from "./analysis-config.js";
import {
  addEntity,
  addProofAttempt,
  addProofItem,
  countProofNodes,
  createProofTree,
  TRIVIAL_PROVER,
  VALID_OUTCOME,
  type EntityNode,
  type ProofTree,
} from "./proof-tree.js";

export const SPARK_FILE_EXTENSION = ".spark";

export interface SparkReportSource {
  filePath: string;
  content: string;
}

export interface SparkIngestionWarning {
  code: "missing_proof_section";
  message: string;
  filePath: string;
}

export interface SparkReportStats {
  entityCount: number;
  proofItemCount: number;
  proofAttemptCount: number;
}

export interface SparkIngestionResult {
  tree: ProofTree;
  reportFiles: string[];
  warnings: SparkIngestionWarning[];
}

export interface SparkIngestionOptions {
  excludeDirectories?: string[];
  onReportLoaded?: (filePath: string, stats: SparkReportStats) => void;
}

export class SparkReportError extends Error {
  public readonly filePath: string;

  public readonly jsonPath: string;

  public constructor(filePath: string, jsonPath: string, message: string) {
    super(`${filePath}: ${jsonPath ? `${jsonPath} ` : ""}${message}`);
    this.name = "SparkReportError";
    this.filePath = filePath;
    this.jsonPath = jsonPath;
  }
}

interface SourceLocation {
  file: string;
  line: number;
}

interface IngestionState {
  tree: ProofTree;
  entitiesByKey: Map<string, EntityNode>;
  warnings: SparkIngestionWarning[];
}

export async function collectSparkFiles(
  root: string,
  options: { excludeDirectories?: string[] } = {},
): Promise<string[]> {
  const resolvedRoot = path.resolve(root);
  const excluded = new Set(options.excludeDirectories ?? DEFAULT_ANALYSIS_CONFIG.excludeDirectories);

  const stats = await fs.stat(resolvedRoot);
  if (stats.isFile()) {
    return resolvedRoot.endsWith(SPARK_FILE_EXTENSION) ? [normalizePath(resolvedRoot)] : [];
  }

  const files: string[] = [];
  const visited = new Set<string>([await fs.realpath(resolvedRoot)]);
  const stack = [resolvedRoot];
  let current = stack.pop();
  while (current !== undefined) {
    const children = await fs.readdir(current, { withFileTypes: true });
    for (const child of children) {
      const absolute = path.join(current, child.name);
      const kind = child.isSymbolicLink() ? await resolveLinkKind(absolute) : child;
      if (kind === undefined) {
        continue;
      }
      if (kind.isDirectory()) {
        if (excluded.has(child.name)) {
          continue;
        }
        const realDirectory = await fs.realpath(absolute);
        if (!visited.has(realDirectory)) {
          visited.add(realDirectory);
          stack.push(absolute);
        }
        continue;
      }
      if (kind.isFile() && child.name.endsWith(SPARK_FILE_EXTENSION)) {
        files.push(normalizePath(absolute));
      }
    }
    current = stack.pop();
  }

  return files.sort((left, right) => left.localeCompare(right));
}

async function resolveLinkKind(linkPath: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(linkPath);
  } catch (error) {
    if (isNodeError(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export async function ingestSparkProject(root: string, options: SparkIngestionOptions = {}): Promise<SparkIngestionResult> {
  const reportFiles = await collectSparkFiles(root, { excludeDirectories: options.excludeDirectories });
  const state = createIngestionState();

  for (const filePath of reportFiles) {
    const content = await fs.readFile(filePath, "utf8");
    const stats = loadSparkReport(state, { filePath, content });
    options.onReportLoaded?.(filePath, stats);
  }

  return { tree: state.tree, reportFiles, warnings: state.warnings };
}

export function ingestSparkReports(sources: SparkReportSource[]): SparkIngestionResult {
  const state = createIngestionState();
  const sorted = sources
    .map((source) => ({ ...source, filePath: normalizePath(source.filePath) }))
    .sort((left, right) => left.filePath.localeCompare(right.filePath));

  for (const source of sorted) {
    loadSparkReport(state, source);
  }

  return {
    tree: state.tree,
    reportFiles: sorted.map((source) => source.filePath),
    warnings: state.warnings,
  };
}

export function fileKeyFromReportPath(filePath: string): string {
  return path.posix.basename(normalizePath(filePath), SPARK_FILE_EXTENSION);
}

function createIngestionState(): IngestionState {
  return { tree: createProofTree(), entitiesByKey: new Map(), warnings: [] };
}

function loadSparkReport(state: IngestionState, source: SparkReportSource): SparkReportStats {
  const filePath = source.filePath;
  const fileKey = fileKeyFromReportPath(filePath);
  const before = countNodes(state.tree);

  const report = parseReportObject(filePath, source.content);

  if (report.spark !== undefined) {
    const declarations = expectArray(report.spark, filePath, "spark");
    declarations.forEach((declaration, index) => {
      const context = `spark[${index}]`;
      if (!isObject(declaration)) {
        throw new SparkReportError(filePath, context, "must be an object.");
      }
      resolveEntity(state, {
        name: expectString(declaration.name, filePath, `${context}.name`),
        location: expectFirstLocation(declaration.sloc, filePath, `${context}.sloc`),
      });
    });
  }

  if (report.proof === undefined) {
    state.warnings.push({
      code: "missing_proof_section",
      message: "Report has no proof section; only flow analysis results are present.",
      filePath,
    });
    return diffCounts(before, countNodes(state.tree));
  }

  const proofs = expectArray(report.proof, filePath, "proof");
  proofs.forEach((proof, proofIndex) => {
    const context = `proof[${proofIndex}]`;
    if (!isObject(proof)) {
      throw new SparkReportError(filePath, context, "must be an object.");
    }
    if (!isObject(proof.entity)) {
      throw new SparkReportError(filePath, `${context}.entity`, "must be an object.");
    }

    const entity = resolveEntity(state, {
      name: expectString(proof.entity.name, filePath, `${context}.entity.name`),
      location: expectFirstLocation(proof.entity.sloc, filePath, `${context}.entity.sloc`),
    });
    const itemInput = {
      fileKey,
      sourceFile: expectString(proof.file, filePath, `${context}.file`),
      line: expectNonNegativeInteger(proof.line, filePath, `${context}.line`),
      column: proof.col === undefined ? 0 : expectNonNegativeInteger(proof.col, filePath, `${context}.col`),
      rule: proof.rule === undefined ? "" : expectString(proof.rule, filePath, `${context}.rule`),
      severity: proof.severity === undefined ? "" : expectString(proof.severity, filePath, `${context}.severity`),
    };

    const checkTree = expectArray(proof.check_tree, filePath, `${context}.check_tree`);
    if (checkTree.length === 0) {
      const item = addProofItem(state.tree, entity.index, itemInput);
      addProofAttempt(state.tree, item.index, { prover: TRIVIAL_PROVER, outcome: VALID_OUTCOME, timeSeconds: 0, steps: 0 });
      return;
    }

    checkTree.forEach((pathEntry, pathIndex) => {
      const pathContext = `${context}.check_tree[${pathIndex}]`;
      if (!isObject(pathEntry)) {
        throw new SparkReportError(filePath, pathContext, "must be an object.");
      }
      const item = addProofItem(state.tree, entity.index, itemInput);
      if (pathEntry.proof_attempts === undefined) {
        return;
      }
      if (!isObject(pathEntry.proof_attempts)) {
        throw new SparkReportError(filePath, `${pathContext}.proof_attempts`, "must be an object.");
      }

      for (const [prover, attempt] of Object.entries(pathEntry.proof_attempts)) {
        const attemptContext = `${pathContext}.proof_attempts.${prover}`;
        if (!isObject(attempt)) {
          throw new SparkReportError(filePath, attemptContext, "must be an object.");
        }
        addProofAttempt(state.tree, item.index, {
          prover,
          outcome: expectString(attempt.result, filePath, `${attemptContext}.result`),
          timeSeconds: expectNonNegativeNumber(attempt.time, filePath, `${attemptContext}.time`),
          steps: expectNonNegativeInteger(attempt.steps, filePath, `${attemptContext}.steps`),
        });
      }
    });
  });

  return diffCounts(before, countNodes(state.tree));
}

function parseReportObject(filePath: string, content: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SparkReportError(filePath, "", `report is not valid JSON (${reason}).`);
  }
  if (!isObject(parsed)) {
    throw new SparkReportError(filePath, "", "report must contain a JSON object.");
  }
  return parsed;
}

function resolveEntity(state: IngestionState, declaration: { name: string; location: SourceLocation }): EntityNode {
  const key = [declaration.name, declaration.location.file, String(declaration.location.line)].join("\u0000");
  const existing = state.entitiesByKey.get(key);
  if (existing) {
    return existing;
  }
  const created = addEntity(state.tree, {
    name: declaration.name,
    sourceFile: declaration.location.file,
    line: declaration.location.line,
  });
  state.entitiesByKey.set(key, created);
  return created;
}

function countNodes(tree: ProofTree): SparkReportStats {
  const counts = countProofNodes(tree);
  return {
    entityCount: counts.entity,
    proofItemCount: counts.proof_item,
    proofAttemptCount: counts.proof_attempt,
  };
}

function diffCounts(before: SparkReportStats, after: SparkReportStats): SparkReportStats {
  return {
    entityCount: after.entityCount - before.entityCount,
    proofItemCount: after.proofItemCount - before.proofItemCount,
    proofAttemptCount: after.proofAttemptCount - before.proofAttemptCount,
  };
}

function expectFirstLocation(value: unknown, filePath: string, context: string): SourceLocation {
  if (value === undefined) {
    return { file: "", line: 0 };
  }
  const locations = expectArray(value, filePath, context);
  const first = locations[0];
  if (first === undefined) {
    return { file: "", line: 0 };
  }
  if (!isObject(first)) {
    throw new SparkReportError(filePath, `${context}[0]`, "must be an object.");
  }
  return {
    file: expectString(first.file, filePath, `${context}[0].file`),
    line: expectNonNegativeInteger(first.line, filePath, `${context}[0].line`),
  };
}

function expectArray(value: unknown, filePath: string, context: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SparkReportError(filePath, context, "must be an array.");
  }
  return value;
}

function expectString(value: unknown, filePath: string, context: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new SparkReportError(filePath, context, "must be a non-empty string.");
  }
  return value;
}

function expectNonNegativeNumber(value: unknown, filePath: string, context: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new SparkReportError(filePath, context, "must be a finite number >= 0.");
  }
  return value;
}

function expectNonNegativeInteger(value: unknown, filePath: string, context: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new SparkReportError(filePath, context, "must be an integer >= 0.");
  }
  return value;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function normalizePath(value: string): string {
  return value.replace(/\\/g, "/");
}
