import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { OUTPUT_FILE_NAME } from "./config";
import { findDuplicates } from "./detect";
import { UsageError, errorMessage } from "./errors";
import { createProgressReporter } from "./progress";
import { ensureOutputPath, formatConsoleSummary, writeReport } from "./report";

export interface CliOptions {
  folders: string[];
  output: string;
  jobs?: number;
  chunkSize?: number;
  ext?: string[];
  verify: boolean;
  progress: boolean;
}

function printUsage(): void {
  console.error("Usage: wastescan -f <folder...> [-o <report file>]");
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Scans the requested folders, prints the summary and writes the report file.
 *
 * @returns Process exit code: 0 on success, 1 on a usage error or failed run
 */
export async function runScan(options: CliOptions): Promise<number> {
  const started = Date.now();
  const roots = options.folders.map((folder) => path.resolve(folder));
  const outputPath = path.resolve(options.output);

  try {
    await ensureOutputPath(outputPath);

    const result = await findDuplicates(roots, {
      config: {
        walkConcurrency: options.jobs,
        hashConcurrency: options.jobs,
        chunkSize: options.chunkSize,
        verifyContent: options.verify
      },
      excludePath: outputPath,
      extensions: options.ext,
      progress: createProgressReporter(options.progress)
    });

    for (const line of formatConsoleSummary(result)) {
      console.log(line);
    }

    await writeReport(outputPath, result.summary);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      printUsage();
      return 1;
    }
    console.error(`Failed to build duplicate report: ${errorMessage(err)}`);
    return 1;
  }

  console.log(`Duplicate report written to: ${outputPath}`);
  console.log(`Time taken: ${((Date.now() - started) / 1000).toFixed(2)}s`);
  return 0;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("wastescan")
    .description("Find duplicate files in the given folders and report the wasted space")
    .version("1.0.0")
    .requiredOption("-f, --folders <dirs...>", "folders to scan for duplicates")
    .option("-o, --output <file>", "file to save the duplicate report", OUTPUT_FILE_NAME)
    .option("-j, --jobs <n>", "concurrent workers per stage (default: CPU count)", parsePositiveInt)
    .option("--chunk-size <bytes>", "bytes read at a time while hashing", parsePositiveInt)
    .option("-e, --ext <extensions...>", "only consider files with these extensions")
    .option("--verify", "confirm hash matches with a byte-for-byte comparison", false)
    .option("--no-progress", "disable progress output")
    .action(async (options: CliOptions) => {
      const code = await runScan(options);
      if (code !== 0) {
        process.exitCode = code;
      }
    });

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
