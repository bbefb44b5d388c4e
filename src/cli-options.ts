import type { AnalysisConfigInput } from "./analysis-config.js";

export type OutputFormat = "text" | "json";

export interface CliOptions {
  directory?: string;
  list: boolean;
  suggest: boolean;
  format: OutputFormat;
  outPath?: string;
  verbose: boolean;
  config: AnalysisConfigInput;
}

export const CLI_USAGE = [
  "Usage: proof-timing-advisor [options] <directory>",
  "",
  "  --list                         print per-entity proof timings (default)",
  "  --report-mode=all|failed|unproved",
  "  --sort-by=name|time|max-time",
  "  --cut-off=<seconds>            hide entities whose slowest attempt is below this",
  "  --suggest                      print the suggested prover order per file",
  "  --format=text|json",
  "  --out=<path>                   write output to a file",
  "  --exclude=<dir>                skip directories with this name (repeatable)",
  "  --verbose                      log loaded reports to stderr",
].join("\n");

const VALUE_OPTIONS = ["--report-mode", "--sort-by", "--cut-off", "--format", "--out", "--exclude"] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

export function parseCliArgs(argv: string[]): CliOptions {
  const parsed: CliOptions = {
    list: false,
    suggest: false,
    format: "text",
    verbose: false,
    config: {},
  };
  const excluded: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--list") {
      parsed.list = true;
      continue;
    }
    if (arg === "--suggest") {
      parsed.suggest = true;
      continue;
    }
    if (arg === "--verbose") {
      parsed.verbose = true;
      continue;
    }

    const option = VALUE_OPTIONS.find((name) => arg === name || arg.startsWith(`${name}=`));
    if (option) {
      let value: string;
      if (arg === option) {
        value = argv[index + 1] ?? "";
        index += 1;
      } else {
        value = arg.slice(option.length + 1);
      }
      applyValueOption(parsed, excluded, option, value.trim());
      continue;
    }

    if (arg.startsWith("--")) {
      throw new Error(`Unsupported argument '${arg}'.`);
    }
    if (parsed.directory !== undefined) {
      throw new Error(`Unexpected extra directory argument '${arg}'.`);
    }
    parsed.directory = arg;
  }

  if (excluded.length > 0) {
    parsed.config.excludeDirectories = excluded;
  }
  if (!parsed.list && !parsed.suggest) {
    parsed.list = true;
  }

  return parsed;
}

function applyValueOption(parsed: CliOptions, excluded: string[], option: ValueOption, value: string): void {
  if (value.length === 0) {
    throw new Error(`Option '${option}' requires a value.`);
  }

  switch (option) {
    case "--report-mode":
      parsed.config.reportMode = value;
      return;
    case "--sort-by":
      parsed.config.sortBy = value;
      return;
    case "--cut-off": {
      const seconds = Number(value);
      if (!Number.isFinite(seconds)) {
        throw new Error(`Option '--cut-off' expects a number of seconds (got '${value}').`);
      }
      parsed.config.cutOffSeconds = seconds;
      return;
    }
    case "--format":
      if (value !== "text" && value !== "json") {
        throw new Error(`Option '--format' must be 'text' or 'json' (got '${value}').`);
      }
      parsed.format = value;
      return;
    case "--out":
      parsed.outPath = value;
      return;
    case "--exclude":
      excluded.push(value);
      return;
  }
}
