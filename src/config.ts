import os from "os";
import { UsageError } from "./errors";

export const OUTPUT_FILE_NAME = "duplicates.txt";
export const DEFAULT_CHUNK_SIZE = 16 * 1024 * 1024;
export const DEFAULT_CONCURRENCY = Math.max(1, os.cpus().length || 1);

/**
 * Tunables for a detection run. Passed explicitly to each stage so tests can
 * shrink the chunk size or pin the worker count.
 */
export interface DetectorConfig {
  /** Bytes read per chunk while hashing or comparing file content */
  chunkSize: number;
  /** Maximum number of concurrent tree walkers */
  walkConcurrency: number;
  /** Maximum number of files hashed at once */
  hashConcurrency: number;
  /** Confirm hash matches with a byte-for-byte comparison */
  verifyContent: boolean;
}

export const DEFAULT_CONFIG: Readonly<DetectorConfig> = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  walkConcurrency: DEFAULT_CONCURRENCY,
  hashConcurrency: DEFAULT_CONCURRENCY,
  verifyContent: false
};

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveConfig(overrides: Partial<DetectorConfig> = {}): DetectorConfig {
  const config: DetectorConfig = { ...DEFAULT_CONFIG };
  if (overrides.chunkSize !== undefined) {
    config.chunkSize = requirePositiveInteger("chunkSize", overrides.chunkSize);
  }
  if (overrides.walkConcurrency !== undefined) {
    config.walkConcurrency = requirePositiveInteger("walkConcurrency", overrides.walkConcurrency);
  }
  if (overrides.hashConcurrency !== undefined) {
    config.hashConcurrency = requirePositiveInteger("hashConcurrency", overrides.hashConcurrency);
  }
  if (overrides.verifyContent !== undefined) {
    config.verifyContent = overrides.verifyContent;
  }
  return config;
}
