import fs from "fs";
import xxhash from "xxhash-wasm";
import { DEFAULT_CHUNK_SIZE } from "./config";
import { errorMessage } from "./errors";
import { MappedResult, Outcome } from "./types";

let hasherApi: ReturnType<typeof xxhash> | undefined;

// The wasm module is compiled once and shared by every hash call.
function loadHasher(): ReturnType<typeof xxhash> {
  if (!hasherApi) {
    hasherApi = xxhash().catch((err: unknown) => {
      // Let the next call retry a failed start-up.
      hasherApi = undefined;
      throw err;
    });
  }
  return hasherApi;
}

/**
 * Computes the xxHash64 digest of a file, streaming it in `chunkSize` reads.
 *
 * @returns Promise resolving to the 16-character hex digest
 * @throws Error if the file cannot be opened or read
 *
 * @example
 * const hash = await hashFile('/path/to/file.txt');
 * console.log(hash); // "ef46db3751d8e999" for an empty file
 */
export async function hashFile(
  filePath: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<string> {
  const { create64 } = await loadHasher();
  const hasher = create64();

  return new Promise((resolve, reject) => {
    const stream = fs.createReadStream(filePath, { highWaterMark: chunkSize });

    stream.on("error", reject);
    stream.on("data", (chunk) => hasher.update(chunk));
    stream.on("end", () => resolve(hasher.digest().toString(16).padStart(16, "0")));
  });
}

/**
 * Like {@link hashFile}, but reports a read failure as an outcome instead of throwing.
 */
export async function tryHashFile(
  filePath: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<Outcome<string>> {
  try {
    return { ok: true, value: await hashFile(filePath, chunkSize) };
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }
}

/**
 * Maps items through an async function with controlled concurrency.
 *
 * At most `limit` mappers run at once. Errors thrown by the mapper are captured
 * and returned rather than thrown, allowing partial results.
 *
 * @param limit - Maximum number of concurrent operations (must be > 0)
 * @param mapper - Async function to transform each item (may return null or throw)
 * @param onProgress - Optional callback invoked after each item completes (completed count, current item)
 * @returns Results in input order (null for failed items) plus the captured errors
 *
 * @example
 * const { results, errors } = await mapWithConcurrency(
 *   files,
 *   4,
 *   async (file) => hashFile(file),
 *   (completed, file) => console.log(`Progress: ${completed}`)
 * );
 */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  mapper: (item: T) => Promise<R | null>,
  onProgress?: (completed: number, item: T) => void
): Promise<MappedResult<T, R>> {
  const results: (R | null)[] = new Array(items.length).fill(null);
  const errors: MappedResult<T, R>["errors"] = [];
  let index = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        return;
      }

      try {
        results[current] = await mapper(items[current]);
      } catch (err) {
        results[current] = null;
        errors.push({
          index: current,
          item: items[current],
          error: err instanceof Error ? err : new Error(String(err))
        });
      }

      completed++;
      onProgress?.(completed, items[current]);
    }
  }

  const workerCount = Math.max(1, Math.min(limit, items.length));
  const workers = Array.from({ length: workerCount }, () => worker());
  await Promise.all(workers);
  return { results, errors };
}
