/**
 * A regular file found by the tree walker.
 */
export interface FileRecord {
  readonly path: string;
  readonly size: number;
  readonly modifiedTime: Date;
}

/**
 * A size-group candidate after hashing. `hash` is null when the file could not be read.
 */
export interface HashedFile {
  path: string;
  size: number;
  hash: string | null;
}

/**
 * Hash buckets for a single size group, singletons already removed.
 */
export interface HashBuckets {
  /** Paths sharing each hash value */
  groups: Map<string, string[]>;
  /** Common file size of each hash bucket */
  sizes: Map<string, number>;
}

/**
 * A set of 2+ files with identical size and content hash.
 */
export interface DuplicateGroup {
  /** Member paths, sorted ascending */
  readonly paths: readonly string[];
  /** Size of each member in bytes */
  readonly size: number;
  readonly count: number;
  /** Bytes taken by all copies but one: (count - 1) * size */
  readonly wastedSize: number;
}

/**
 * Ranking and totals over every duplicate group of a run.
 */
export interface DuplicateSummary {
  totalWastedSize: number;
  /** Group with the most copies; ties go to the smaller first path */
  mostDuplicatedGroup: DuplicateGroup | null;
  /** Group wasting the most bytes; same tie-break */
  largestWasteGroup: DuplicateGroup | null;
  /** All groups by wasted size, largest first */
  sortedGroups: DuplicateGroup[];
}

/**
 * Result of an operation that may fail without aborting the run.
 */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export type SkipStage = "root" | "directory" | "stat" | "hash" | "verify";

/**
 * An entry left out of the run, and why.
 */
export interface SkipRecord {
  stage: SkipStage;
  path: string;
  reason: string;
}

/**
 * Statistics collected during a duplicate file scan.
 */
export interface ScanStats {
  /** Total number of files discovered during directory scan */
  filesScanned: number;
  /** Number of sizes shared by two or more files */
  sizeGroups: number;
  /** Number of files that were hashed (only files with matching sizes) */
  filesHashed: number;
  /** Number of files that failed to hash */
  hashErrors: number;
  /** Number of duplicate groups found */
  duplicateGroups: number;
  /** Total number of duplicate files (sum across all groups) */
  duplicateFiles: number;
  /** Total bytes wasted by duplicates (sum of size × (count - 1) for each group) */
  wastedBytes: number;
  /** Entries skipped at any stage */
  skippedEntries: number;
}

/**
 * Complete result of a detection run.
 */
export interface DetectionResult {
  summary: DuplicateSummary;
  stats: ScanStats;
  skipped: SkipRecord[];
}

/**
 * Result of mapping items with concurrency, including both successes and errors.
 */
export interface MappedResult<T, R> {
  /** Array of results (null for failed items) */
  results: (R | null)[];
  /** Array of errors that occurred during mapping */
  errors: Array<{
    /** Index of the item that failed */
    index: number;
    /** The item that failed */
    item: T;
    /** The error that occurred */
    error: Error;
  }>;
}
