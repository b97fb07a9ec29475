import fs from 'fs';
import path from 'path';
import os from 'os';

/**
 * Creates an isolated temporary directory for testing.
 * Returns the absolute path to the temp directory.
 */
export async function createTempDir(prefix = 'wastescan-test-'): Promise<string> {
  const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
  return tmpDir;
}

/**
 * Recursively removes a directory and all its contents.
 */
export async function cleanupTempDir(dirPath: string): Promise<void> {
  try {
    await fs.promises.rm(dirPath, { recursive: true, force: true });
  } catch (err) {
    console.warn(`Failed to cleanup temp dir ${dirPath}:`, err);
  }
}

/**
 * Creates a file with specified content at the given path.
 * Creates parent directories if they don't exist.
 */
export async function createTestFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });
  await fs.promises.writeFile(filePath, content);
}

/**
 * Creates a known duplicate file structure for testing.
 * Returns an object with paths to duplicate and unique files.
 */
export async function createDuplicateStructure(baseDir: string): Promise<{
  duplicates: { content: string; files: string[] }[];
  unique: string[];
}> {
  const file1 = path.join(baseDir, 'file1.txt');
  const file1Copy = path.join(baseDir, 'file1-copy.txt');
  const file1Copy2 = path.join(baseDir, 'subdir', 'file1-copy2.txt');

  await createTestFile(file1, 'Hello, World!');
  await createTestFile(file1Copy, 'Hello, World!');
  await createTestFile(file1Copy2, 'Hello, World!');

  const file2 = path.join(baseDir, 'file2.txt');
  const file2Copy = path.join(baseDir, 'subdir', 'file2-copy.txt');

  await createTestFile(file2, 'Different content here');
  await createTestFile(file2Copy, 'Different content here');

  // Same size as file1 but different bytes
  const unique1 = path.join(baseDir, 'unique1.txt');
  const unique2 = path.join(baseDir, 'subdir', 'unique2.txt');

  await createTestFile(unique1, 'Hello, Earth!');
  await createTestFile(unique2, 'Unique content 2');

  return {
    duplicates: [
      {
        content: 'Hello, World!',
        files: [file1, file1Copy, file1Copy2]
      },
      {
        content: 'Different content here',
        files: [file2, file2Copy]
      }
    ],
    unique: [unique1, unique2]
  };
}

/**
 * Creates a symbolic link at linkPath pointing to targetPath.
 * Used for testing symlink handling behavior.
 */
export async function createSymlink(
  targetPath: string,
  linkPath: string
): Promise<void> {
  await fs.promises.symlink(targetPath, linkPath);
}

/**
 * Builds the error fs raises for a permission failure, for stubbing calls that
 * should fail whoever runs the tests.
 */
export function accessDenied(syscall: string, targetPath: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`EACCES: permission denied, ${syscall} '${targetPath}'`), {
    code: 'EACCES',
    errno: -13,
    syscall,
    path: targetPath
  });
}
