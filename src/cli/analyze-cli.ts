#!/usr/bin/env node

import * as dotenv from "dotenv";
import { promises as fs } from "fs";
import * as path from "path";
import { glob } from "glob";
import { analyze, type AnalyzeOptions } from "../sas-analyzer.js";
import {
  serializeReport,
  type AnalysisReport,
  type DatabaseUsageReport,
} from "../analysis/report-assembler.js";
import { AnalysisInputError } from "../utils/analysis-errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("AnalyzeCli");

export interface CliArguments {
  command: string | undefined;
  target: string | undefined;
  databaseOnly: boolean;
  pretty: boolean;
  output?: string;
  tokenSize?: number;
  pattern: string;
}

type Report = AnalysisReport | DatabaseUsageReport;

export interface DirectoryReport {
  files: Record<string, Report>;
  errors: Record<string, string>;
}

function showHelp() {
  console.log("SAS Static Analyzer");
  console.log("===================");
  console.log();
  console.log("Usage: sas-analyzer <command> <target> [options]");
  console.log();
  console.log("Commands:");
  console.log("  file <path>            Analyze one SAS file");
  console.log("  dir <path>             Analyze every SAS file under a directory");
  console.log('  code "<source>"        Analyze SAS source given on the command line');
  console.log("  help                   Show this help");
  console.log();
  console.log("Options:");
  console.log("  -d, --database-only    Report database usage only");
  console.log("  -p, --pretty           Indent the JSON output");
  console.log("  -o, --output <file>    Write the report to a file");
  console.log("  --token-size <n>       Token budget per main-body chunk");
  console.log('  --pattern <glob>       File pattern for dir (default "**/*.sas")');
  console.log();
  console.log("Examples:");
  console.log("  sas-analyzer file etl/load_risk.sas --pretty");
  console.log("  sas-analyzer dir etl --database-only -o usage.json");
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    throw new AnalysisInputError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse the command line (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliArguments {
  const parsed: CliArguments = {
    command: argv[0],
    target: undefined,
    databaseOnly: false,
    pretty: false,
    pattern: "**/*.sas",
  };

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-d":
      case "--database-only":
        parsed.databaseOnly = true;
        break;

      case "-p":
      case "--pretty":
        parsed.pretty = true;
        break;

      case "-o":
      case "--output":
        parsed.output = requireValue(arg, argv[++i]);
        break;

      case "--pattern":
        parsed.pattern = requireValue(arg, argv[++i]);
        break;

      case "--token-size": {
        const value = Number(requireValue(arg, argv[++i]));
        if (!Number.isInteger(value) || value < 1) {
          throw new AnalysisInputError("--token-size must be a positive integer");
        }
        parsed.tokenSize = value;
        break;
      }

      default:
        if (arg.startsWith("-")) {
          throw new AnalysisInputError(`Unknown option: ${arg}`);
        }
        if (parsed.target !== undefined) {
          throw new AnalysisInputError(`Unexpected argument: ${arg}`);
        }
        parsed.target = arg;
    }
  }

  return parsed;
}

function toAnalyzeOptions(args: CliArguments): AnalyzeOptions {
  return {
    databaseOnly: args.databaseOnly,
    ...(args.tokenSize !== undefined && { maxTokens: args.tokenSize }),
  };
}

export async function analyzeFile(filePath: string, options: AnalyzeOptions): Promise<Report> {
  const source = await fs.readFile(filePath, "utf-8");
  return analyze(source, { unitName: path.basename(filePath), ...options });
}

/**
 * Analyze every matching file; a failing file is recorded and skipped
 */
export async function analyzeDirectory(
  directory: string,
  pattern: string,
  options: AnalyzeOptions
): Promise<DirectoryReport> {
  const matches = await glob(pattern, { cwd: directory, nodir: true });
  const result: DirectoryReport = { files: {}, errors: {} };

  for (const relative of matches.sort()) {
    const key = relative.split(path.sep).join("/");
    try {
      result.files[key] = await analyzeFile(path.join(directory, relative), { ...options, unitName: key });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("Skipping file", { file: key, error: message });
      result.errors[key] = message;
    }
  }

  return result;
}

async function writeOutput(text: string, args: CliArguments): Promise<void> {
  if (args.output) {
    await fs.writeFile(args.output, text + "\n", "utf-8");
    console.log(`✅ Report written to ${args.output}`);
  } else {
    console.log(text);
  }
}

async function main() {
  dotenv.config();

  try {
    const args = parseCliArgs(process.argv.slice(2));
    const options = toAnalyzeOptions(args);

    switch (args.command) {
      case "file":
        await writeOutput(serializeReport(await analyzeFile(requireValue("file", args.target), options), args.pretty), args);
        break;

      case "dir": {
        const result = await analyzeDirectory(requireValue("dir", args.target), args.pattern, options);
        await writeOutput(JSON.stringify(result, null, args.pretty ? 2 : undefined), args);
        break;
      }

      case "code":
        await writeOutput(serializeReport(analyze(requireValue("code", args.target), options), args.pretty), args);
        break;

      case "help":
      case undefined:
        showHelp();
        break;

      default:
        console.error(`❌ Unknown command: ${args.command}`);
        console.error('Run "sas-analyzer help" for usage information');
        process.exit(1);
    }
  } catch (error) {
    console.error(
      "❌ Error:",
      error instanceof Error ? error.message : String(error)
    );
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("❌ Fatal error:", error);
    process.exit(1);
  });
}
