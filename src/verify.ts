import fs from "fs";
import { FileHandle } from "fs/promises";
import { errorMessage } from "./errors";
import { SkipRecord } from "./types";

const fsp = fs.promises;

/**
 * A comparison failure, tied to the file that could not be opened or read.
 */
export class CompareError extends Error {
  constructor(readonly path: string, reason: string) {
    super(reason);
    this.name = "CompareError";
  }
}

async function openForCompare(filePath: string): Promise<FileHandle> {
  try {
    return await fsp.open(filePath, "r");
  } catch (err) {
    throw new CompareError(filePath, errorMessage(err));
  }
}

async function readChunk(
  handle: FileHandle,
  filePath: string,
  buffer: Buffer,
  position: number
): Promise<number> {
  try {
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
    return bytesRead;
  } catch (err) {
    throw new CompareError(filePath, errorMessage(err));
  }
}

/**
 * Opens and closes `filePath` to confirm it can still be read.
 *
 * @throws CompareError naming the file
 */
export async function ensureReadable(filePath: string): Promise<void> {
  const handle = await openForCompare(filePath);
  await handle.close();
}

/**
 * Compares two files of equal size chunk by chunk.
 *
 * @throws CompareError naming whichever file could not be opened or read
 */
export async function contentEquals(a: string, b: string, chunkSize: number): Promise<boolean> {
  const handleA = await openForCompare(a);
  try {
    const handleB = await openForCompare(b);
    try {
      const bufA = Buffer.alloc(chunkSize);
      const bufB = Buffer.alloc(chunkSize);
      let position = 0;
      while (true) {
        const [readA, readB] = await Promise.all([
          readChunk(handleA, a, bufA, position),
          readChunk(handleB, b, bufB, position)
        ]);
        if (readA !== readB) {
          return false;
        }
        if (readA === 0) {
          return true;
        }
        if (!bufA.subarray(0, readA).equals(bufB.subarray(0, readB))) {
          return false;
        }
        position += readA;
      }
    } finally {
      await handleB.close();
    }
  } finally {
    await handleA.close();
  }
}

function recordFailure(err: unknown, fallbackPath: string, skipped: SkipRecord[]): string {
  const failedPath = err instanceof CompareError ? err.path : fallbackPath;
  const reason = errorMessage(err);
  console.error(`Error comparing file: ${failedPath}: ${reason}`);
  skipped.push({ stage: "verify", path: failedPath, reason });
  return failedPath;
}

/**
 * Splits paths that share a hash into sets of byte-identical files. Each path is
 * compared against the first member of every set found so far, and only a readable
 * path can start a new set. A file that fails is recorded and left out: a failing
 * set head is dropped and the next member of its set takes its place.
 */
export async function splitByContent(
  paths: readonly string[],
  chunkSize: number,
  skipped: SkipRecord[]
): Promise<string[][]> {
  const sets: string[][] = [];

  for (const candidate of paths) {
    let placed = false;
    let dropped = false;
    let index = 0;

    while (index < sets.length) {
      const set = sets[index];
      try {
        if (await contentEquals(set[0], candidate, chunkSize)) {
          set.push(candidate);
          placed = true;
          break;
        }
        index++;
      } catch (err) {
        if (recordFailure(err, candidate, skipped) === candidate) {
          dropped = true;
          break;
        }
        // Remaining members already matched the old head, so the next one stands in for it.
        set.shift();
        if (set.length === 0) {
          sets.splice(index, 1);
        }
      }
    }

    if (placed || dropped) {
      continue;
    }

    try {
      await ensureReadable(candidate);
    } catch (err) {
      recordFailure(err, candidate, skipped);
      continue;
    }
    sets.push([candidate]);
  }

  return sets;
}
