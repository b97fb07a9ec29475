import fs from "fs";
import path from "path";
import { UsageError, errorMessage } from "./errors";
import { formatSize } from "./format";
import { DetectionResult, DuplicateGroup, DuplicateSummary } from "./types";

const fsp = fs.promises;

function bytesWithSize(bytes: number): string {
  return `${bytes} bytes (${formatSize(bytes)})`;
}

function formatHighlight(title: string, group: DuplicateGroup): string[] {
  return [
    `${title}:`,
    `  ${group.count} copies of the same file`,
    `  Size per file: ${bytesWithSize(group.size)}`,
    `  Total wasted space: ${bytesWithSize(group.wastedSize)}`,
    `  Example: ${group.paths[0]}`,
    ""
  ];
}

/**
 * Renders the report file: totals, the most duplicated and most wasteful groups,
 * then every group ordered by wasted space.
 */
export function formatReport(summary: DuplicateSummary): string {
  const lines = [
    `Duplicate groups: ${summary.sortedGroups.length}`,
    `Total wasted space: ${bytesWithSize(summary.totalWastedSize)}`,
    ""
  ];

  if (summary.mostDuplicatedGroup) {
    lines.push(...formatHighlight("Most duplicated file (by count)", summary.mostDuplicatedGroup));
  }
  if (summary.largestWasteGroup) {
    lines.push(...formatHighlight("Largest waste of space", summary.largestWasteGroup));
  }

  lines.push("All duplicate groups ordered by wasted space:", "=".repeat(41), "");
  for (const group of summary.sortedGroups) {
    lines.push(
      `Group: ${group.count} files, ${group.size} bytes each`,
      `Wasted space: ${bytesWithSize(group.wastedSize)}`,
      "Files:"
    );
    for (const filePath of group.paths) {
      lines.push(`  ${filePath}`);
    }
    lines.push("");
  }

  return lines.join("\n") + "\n";
}

/**
 * Console lines repeating the report's headline numbers.
 */
export function formatConsoleSummary(result: DetectionResult): string[] {
  const { summary, stats } = result;
  const lines = [
    `Found ${stats.duplicateGroups} duplicate groups (${stats.duplicateFiles} files)`,
    `Total wasted space: ${bytesWithSize(summary.totalWastedSize)}`
  ];

  const most = summary.mostDuplicatedGroup;
  if (most) {
    lines.push(
      `Most duplicated file: ${most.count} copies, ${formatSize(most.size)} per file, ${formatSize(most.wastedSize)} wasted`,
      `  Example: ${most.paths[0]}`
    );
  }

  const largest = summary.largestWasteGroup;
  if (largest) {
    lines.push(
      `Largest waste of space: ${formatSize(largest.wastedSize)} from ${largest.count} copies of ${formatSize(largest.size)}`,
      `  Example: ${largest.paths[0]}`
    );
  }

  if (stats.skippedEntries > 0) {
    lines.push(`Skipped ${stats.skippedEntries} unreadable entries`);
  }
  return lines;
}

/**
 * Checks that the report can be written to `outputPath` before any scanning starts.
 *
 * @throws UsageError if the parent directory is missing or the path is a directory
 */
export async function ensureOutputPath(outputPath: string): Promise<void> {
  const parent = path.dirname(outputPath);
  let parentStats: fs.Stats;
  try {
    parentStats = await fsp.stat(parent);
  } catch (err) {
    throw new UsageError(`Cannot access output directory: ${parent}: ${errorMessage(err)}`);
  }
  if (!parentStats.isDirectory()) {
    throw new UsageError(`Output directory is not a directory: ${parent}`);
  }

  let stats: fs.Stats;
  try {
    stats = await fsp.stat(outputPath);
  } catch (err) {
    // The report file is created at the end of the run.
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return;
    }
    throw new UsageError(`Cannot access output file: ${outputPath}: ${errorMessage(err)}`);
  }
  if (stats.isDirectory()) {
    throw new UsageError(`Output path is a directory: ${outputPath}`);
  }
}

export async function writeReport(outputPath: string, summary: DuplicateSummary): Promise<void> {
  await fsp.writeFile(outputPath, formatReport(summary), "utf8");
}
