#!/usr/bin/env node
import { promises as fs } from "node:fs";
import path from "node:path";
import { assertValidAnalysisConfig } from "./analysis-config.js";
import { CLI_USAGE, parseCliArgs } from "./cli-options.js";
import { renderProofTimingAnalysis, runProofTimingAnalysis } from "./proof-timing-analysis.js";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.directory === undefined) {
    throw new Error(`Missing report directory.\n\n${CLI_USAGE}`);
  }

  const config = assertValidAnalysisConfig(options.config);
  const analysis = await runProofTimingAnalysis({
    directory: options.directory,
    config,
    list: options.list,
    suggest: options.suggest,
    onReportLoaded: options.verbose
      ? (filePath, stats) => {
          console.error(
            `Loaded ${filePath}: ${stats.entityCount} entities, ${stats.proofItemCount} proof items, ${stats.proofAttemptCount} attempts`,
          );
        }
      : undefined,
  });

  if (options.verbose) {
    for (const warning of analysis.warnings) {
      console.error(`Warning (${warning.code}) ${warning.filePath}: ${warning.message}`);
    }
  }

  const output = renderProofTimingAnalysis(analysis, options.format);
  if (options.outPath) {
    const resolvedPath = path.resolve(options.outPath);
    await fs.mkdir(path.dirname(resolvedPath), { recursive: true });
    await fs.writeFile(resolvedPath, `${output}\n`, "utf8");
    console.log(`Wrote proof timing analysis to ${resolvedPath}`);
    return;
  }

  console.log(output);
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
