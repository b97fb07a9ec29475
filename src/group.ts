import { tryHashFile, mapWithConcurrency } from "./hash";
import { FileRecord, HashBuckets, HashedFile, SkipRecord } from "./types";

/**
 * Partitions files by exact byte size, keeping only sizes shared by two or more
 * files. A file with a unique size cannot have a duplicate, so nothing else is read.
 */
export function groupBySize(files: Iterable<FileRecord>): Map<number, FileRecord[]> {
  const sizeGroups = new Map<number, FileRecord[]>();
  for (const file of files) {
    const group = sizeGroups.get(file.size);
    if (group) {
      group.push(file);
    } else {
      sizeGroups.set(file.size, [file]);
    }
  }

  for (const [size, group] of sizeGroups) {
    if (group.length < 2) {
      sizeGroups.delete(size);
    }
  }
  return sizeGroups;
}

export interface HashGroupOptions {
  concurrency: number;
  chunkSize: number;
  skipped: SkipRecord[];
  onProgress?: (completed: number, file: FileRecord) => void;
}

export async function hashFiles(
  files: FileRecord[],
  options: HashGroupOptions
): Promise<HashedFile[]> {
  const { results } = await mapWithConcurrency(
    files,
    options.concurrency,
    async (file): Promise<HashedFile> => {
      const outcome = await tryHashFile(file.path, options.chunkSize);
      if (!outcome.ok) {
        console.error(`Error hashing file: ${file.path}: ${outcome.reason}`);
        options.skipped.push({ stage: "hash", path: file.path, reason: outcome.reason });
        return { path: file.path, size: file.size, hash: null };
      }
      return { path: file.path, size: file.size, hash: outcome.value };
    },
    options.onProgress
  );

  const hashed: HashedFile[] = [];
  for (const result of results) {
    if (result) {
      hashed.push(result);
    }
  }
  return hashed;
}

/**
 * Hashes one size group's files and buckets them by digest. Unreadable files are
 * dropped, as are hashes held by a single file.
 */
export async function groupByHash(
  files: FileRecord[],
  options: HashGroupOptions
): Promise<HashBuckets> {
  const hashed = await hashFiles(files, options);
  const groups = new Map<string, string[]>();
  const sizes = new Map<string, number>();

  for (const file of hashed) {
    if (file.hash === null) {
      continue;
    }

    const group = groups.get(file.hash);
    if (group) {
      group.push(file.path);
    } else {
      groups.set(file.hash, [file.path]);
      sizes.set(file.hash, file.size);
    }
  }

  for (const [hash, paths] of groups) {
    if (paths.length < 2) {
      groups.delete(hash);
      sizes.delete(hash);
    }
  }
  return { groups, sizes };
}
