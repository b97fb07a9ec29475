import fs from "fs";
import path from "path";
import { errorMessage } from "./errors";
import { mapWithConcurrency } from "./hash";
import { ProgressReporter } from "./progress";
import { FileRecord, Outcome, SkipRecord } from "./types";

const fsp = fs.promises;

/**
 * Recursively walks a directory tree and invokes a callback for each regular file.
 *
 * Symbolic links are never followed to prevent cycles and unexpected behavior.
 * Directories that cannot be read are handed to `onError` and the traversal
 * continues with their siblings.
 *
 * @example
 * await walkDirectory('/path/to/dir', async (filePath) => {
 *   console.log(`Found: ${filePath}`);
 * });
 */
export async function walkDirectory(
  rootDir: string,
  onFile: (filePath: string) => Promise<void>,
  onError?: (dirPath: string, reason: string) => void
): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(rootDir, { withFileTypes: true });
  } catch (err) {
    const reason = errorMessage(err);
    if (onError) {
      onError(rootDir, reason);
    } else {
      console.error(`Error reading directory: ${rootDir}: ${reason}`);
    }
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(rootDir, entry.name);

    // Do not follow symbolic links to avoid cycles or unexpected paths.
    if (entry.isSymbolicLink()) {
      continue;
    }

    if (entry.isDirectory()) {
      await walkDirectory(fullPath, onFile, onError);
      continue;
    }

    if (entry.isFile()) {
      await onFile(fullPath);
    }
  }
}

export async function statFile(filePath: string): Promise<Outcome<FileRecord | null>> {
  try {
    const stats = await fsp.stat(filePath);
    if (!stats.isFile()) {
      return { ok: true, value: null };
    }
    return {
      ok: true,
      value: { path: filePath, size: stats.size, modifiedTime: stats.mtime }
    };
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
}

export interface WalkOptions {
  /** Absolute path to leave out of the results, typically the report file */
  excludePath?: string;
  /** Extensions to keep, compared case-insensitively (e.g. ['.jpg', '.png']) */
  extensions?: string[];
  /** Receives every skipped entry */
  skipped: SkipRecord[];
  /** Called once per file found */
  onFile?: (record: FileRecord) => void;
}

export function normalizeExtensions(extensions: string[]): string[] {
  return extensions
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`));
}

/**
 * Lists every regular file under `rootDir` with its size and modification time.
 *
 * Unreadable subdirectories and files that cannot be stat'ed are logged, recorded
 * in `options.skipped` and left out. A root that cannot be opened yields an empty
 * list instead of an error.
 */
export async function walkTree(rootDir: string, options: WalkOptions): Promise<FileRecord[]> {
  const files: FileRecord[] = [];
  const extSet = options.extensions ? new Set(normalizeExtensions(options.extensions)) : undefined;

  const root = await statRoot(rootDir);
  if (!root.ok) {
    console.error(`Error scanning root: ${rootDir}: ${root.reason}`);
    options.skipped.push({ stage: "root", path: rootDir, reason: root.reason });
    return files;
  }

  await walkDirectory(
    rootDir,
    async (filePath) => {
      if (options.excludePath && filePath === options.excludePath) {
        return;
      }

      if (extSet) {
        const ext = path.extname(filePath).toLowerCase();
        if (!extSet.has(ext)) {
          return;
        }
      }

      const result = await statFile(filePath);
      if (!result.ok) {
        console.error(`Error stating file: ${filePath}: ${result.reason}`);
        options.skipped.push({ stage: "stat", path: filePath, reason: result.reason });
        return;
      }

      if (result.value) {
        files.push(result.value);
        options.onFile?.(result.value);
      }
    },
    (dirPath, reason) => {
      console.error(`Error reading directory: ${dirPath}: ${reason}`);
      options.skipped.push({ stage: "directory", path: dirPath, reason });
    }
  );

  return files;
}

async function statRoot(rootDir: string): Promise<Outcome<fs.Stats>> {
  try {
    const stats = await fsp.stat(rootDir);
    if (!stats.isDirectory()) {
      return { ok: false, reason: "not a directory" };
    }
    await fsp.access(rootDir, fs.constants.R_OK | fs.constants.X_OK);
    return { ok: true, value: stats };
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
}

/**
 * Splits roots into walker assignments. With no more roots than workers each root
 * gets its own worker; otherwise the roots are cut into `limit` contiguous chunks
 * whose sizes differ by at most one.
 */
export function partitionRoots(roots: string[], limit: number): string[][] {
  if (roots.length <= limit) {
    return roots.map((root) => [root]);
  }

  const chunks: string[][] = [];
  const base = Math.floor(roots.length / limit);
  const remainder = roots.length % limit;
  let start = 0;
  for (let i = 0; i < limit; i++) {
    const length = base + (i < remainder ? 1 : 0);
    chunks.push(roots.slice(start, start + length));
    start += length;
  }
  return chunks;
}

export interface ScanOptions extends Omit<WalkOptions, "onFile"> {
  /** Maximum number of concurrent walkers */
  concurrency: number;
  progress?: ProgressReporter;
}

/**
 * Walks all roots concurrently and merges their files into one list, keeping
 * each path once. Each worker walks the roots of its chunk one after another.
 */
export async function scanRoots(roots: string[], options: ScanOptions): Promise<FileRecord[]> {
  const chunks = partitionRoots(roots, options.concurrency);
  let found = 0;

  const walkOptions: WalkOptions = {
    excludePath: options.excludePath,
    extensions: options.extensions,
    skipped: options.skipped,
    onFile: () => {
      found++;
      options.progress?.updateScanning(found);
    }
  };

  const { results, errors } = await mapWithConcurrency(chunks, chunks.length, async (chunk) => {
    let files: FileRecord[] = [];
    for (const root of chunk) {
      files = files.concat(await walkTree(root, walkOptions));
    }
    return files;
  });

  for (const { item, error } of errors) {
    for (const root of item) {
      console.error(`Error scanning root: ${root}: ${error.message}`);
      options.skipped.push({ stage: "root", path: root, reason: error.message });
    }
  }

  // Overlapping or repeated roots reach the same file more than once.
  const seen = new Set<string>();
  const merged: FileRecord[] = [];
  for (const files of results) {
    for (const file of files ?? []) {
      const key = path.resolve(file.path);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(file);
      }
    }
  }
  return merged;
}
