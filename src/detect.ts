import { createDuplicateGroup, summarizeGroups } from "./aggregate";
import { DetectorConfig, resolveConfig } from "./config";
import { UsageError } from "./errors";
import { groupByHash, groupBySize } from "./group";
import { ProgressReporter } from "./progress";
import { scanRoots } from "./scan";
import { DetectionResult, DuplicateGroup, ScanStats, SkipRecord } from "./types";
import { splitByContent } from "./verify";

export interface DetectOptions {
  config?: Partial<DetectorConfig>;
  /** Absolute path to leave out of the scan, typically the report file */
  excludePath?: string;
  /** Only consider files with these extensions */
  extensions?: string[];
  progress?: ProgressReporter;
}

/**
 * Finds byte-identical files under the given roots.
 *
 * Process:
 * 1. Walk every root concurrently and collect size and mtime per file
 * 2. Group files by size and drop sizes held by a single file
 * 3. Hash each size group's files concurrently and bucket them by hash
 * 4. Optionally confirm each bucket with a byte-for-byte comparison
 * 5. Total and rank the resulting duplicate groups
 *
 * Unreadable roots, directories and files are skipped and listed in `skipped`;
 * only a missing root list or bad configuration raises.
 *
 * @example
 * const result = await findDuplicates(['/data/photos', '/backup/photos']);
 * console.log(`${result.stats.duplicateGroups} groups, ${result.stats.wastedBytes} bytes wasted`);
 */
export async function findDuplicates(
  roots: string[],
  options: DetectOptions = {}
): Promise<DetectionResult> {
  if (roots.length === 0) {
    throw new UsageError("At least one folder to scan is required.");
  }

  const config = resolveConfig(options.config);
  const progress = options.progress;
  const skipped: SkipRecord[] = [];

  let started = Date.now();
  progress?.startScanning(roots.length);
  const files = await scanRoots(roots, {
    concurrency: config.walkConcurrency,
    excludePath: options.excludePath,
    extensions: options.extensions,
    skipped,
    progress
  });
  progress?.endScanning(files.length, Date.now() - started);

  started = Date.now();
  const sizeGroups = groupBySize(files);
  let candidates = 0;
  for (const group of sizeGroups.values()) {
    candidates += group.length;
  }
  progress?.endGrouping(sizeGroups.size, candidates, Date.now() - started);

  started = Date.now();
  progress?.startHashing(candidates);
  const groups: DuplicateGroup[] = [];
  let hashed = 0;
  let hashErrors = 0;

  for (const [size, members] of sizeGroups) {
    const skippedBefore = skipped.length;
    const buckets = await groupByHash(members, {
      concurrency: config.hashConcurrency,
      chunkSize: config.chunkSize,
      skipped,
      onProgress: (completed, file) => progress?.updateHashing(hashed + completed, candidates, file.path)
    });
    hashed += members.length;
    hashErrors += skipped.length - skippedBefore;

    for (const [hash, paths] of buckets.groups) {
      const fileSize = buckets.sizes.get(hash) ?? size;
      if (!config.verifyContent) {
        groups.push(createDuplicateGroup(paths, fileSize));
        continue;
      }

      for (const identical of await splitByContent(paths, config.chunkSize, skipped)) {
        if (identical.length >= 2) {
          groups.push(createDuplicateGroup(identical, fileSize));
        }
      }
    }
  }
  progress?.endHashing(groups.length, Date.now() - started);

  const summary = summarizeGroups(groups);
  const stats: ScanStats = {
    filesScanned: files.length,
    sizeGroups: sizeGroups.size,
    filesHashed: candidates,
    hashErrors,
    duplicateGroups: groups.length,
    duplicateFiles: groups.reduce((sum, group) => sum + group.count, 0),
    wastedBytes: summary.totalWastedSize,
    skippedEntries: skipped.length
  };

  return { summary, stats, skipped };
}
