import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { createDuplicateGroup, summarizeGroups } from '../src/aggregate';
import { UsageError } from '../src/errors';
import { ensureOutputPath, formatConsoleSummary, formatReport, writeReport } from '../src/report';
import { DetectionResult } from '../src/types';
import { createTempDir, cleanupTempDir, createTestFile } from './setup';

const summary = summarizeGroups([
  createDuplicateGroup(['/c/z', '/c/x', '/c/y'], 10),
  createDuplicateGroup(['/b/1', '/a/1'], 100)
]);

describe('formatReport', () => {
  it('should render totals, highlights and every group by wasted space', () => {
    expect(formatReport(summary)).toBe([
      'Duplicate groups: 2',
      'Total wasted space: 120 bytes (120 Bytes)',
      '',
      'Most duplicated file (by count):',
      '  3 copies of the same file',
      '  Size per file: 10 bytes (10 Bytes)',
      '  Total wasted space: 20 bytes (20 Bytes)',
      '  Example: /c/x',
      '',
      'Largest waste of space:',
      '  2 copies of the same file',
      '  Size per file: 100 bytes (100 Bytes)',
      '  Total wasted space: 100 bytes (100 Bytes)',
      '  Example: /a/1',
      '',
      'All duplicate groups ordered by wasted space:',
      '=========================================',
      '',
      'Group: 2 files, 100 bytes each',
      'Wasted space: 100 bytes (100 Bytes)',
      'Files:',
      '  /a/1',
      '  /b/1',
      '',
      'Group: 3 files, 10 bytes each',
      'Wasted space: 20 bytes (20 Bytes)',
      'Files:',
      '  /c/x',
      '  /c/y',
      '  /c/z',
      '',
      ''
    ].join('\n'));
  });

  it('should state zero groups and zero waste when nothing was found', () => {
    expect(formatReport(summarizeGroups([]))).toBe([
      'Duplicate groups: 0',
      'Total wasted space: 0 bytes (0 Bytes)',
      '',
      'All duplicate groups ordered by wasted space:',
      '=========================================',
      '',
      ''
    ].join('\n'));
  });

  it('should show human-readable sizes next to raw bytes', () => {
    const big = summarizeGroups([createDuplicateGroup(['/x', '/y'], 1536000000)]);
    expect(formatReport(big)).toContain('Total wasted space: 1536000000 bytes (1.5 GB)');
  });
});

describe('formatConsoleSummary', () => {
  it('should repeat the headline numbers', () => {
    const result: DetectionResult = {
      summary,
      stats: {
        filesScanned: 9,
        sizeGroups: 2,
        filesHashed: 5,
        hashErrors: 0,
        duplicateGroups: 2,
        duplicateFiles: 5,
        wastedBytes: 120,
        skippedEntries: 1
      },
      skipped: [{ stage: 'stat', path: '/d/locked', reason: 'EACCES' }]
    };

    expect(formatConsoleSummary(result)).toEqual([
      'Found 2 duplicate groups (5 files)',
      'Total wasted space: 120 bytes (120 Bytes)',
      'Most duplicated file: 3 copies, 10 Bytes per file, 20 Bytes wasted',
      '  Example: /c/x',
      'Largest waste of space: 100 Bytes from 2 copies of 100 Bytes',
      '  Example: /a/1',
      'Skipped 1 unreadable entries'
    ]);
  });
});

describe('ensureOutputPath', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should accept a new file in an existing directory', async () => {
    await expect(ensureOutputPath(path.join(tempDir, 'report.txt'))).resolves.toBeUndefined();
  });

  it('should accept an existing file', async () => {
    const existing = path.join(tempDir, 'report.txt');
    await createTestFile(existing, 'old report');
    await expect(ensureOutputPath(existing)).resolves.toBeUndefined();
  });

  it('should reject a missing parent directory', async () => {
    await expect(ensureOutputPath(path.join(tempDir, 'nope', 'report.txt'))).rejects.toBeInstanceOf(UsageError);
  });

  it('should reject a parent that is a file', async () => {
    const file = path.join(tempDir, 'file.txt');
    await createTestFile(file, 'content');
    await expect(ensureOutputPath(path.join(file, 'report.txt'))).rejects.toBeInstanceOf(UsageError);
  });

  it('should reject a directory as the output path', async () => {
    await expect(ensureOutputPath(tempDir)).rejects.toThrow(`Output path is a directory: ${tempDir}`);
  });
});

describe('writeReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should write the formatted report as UTF-8', async () => {
    const output = path.join(tempDir, 'duplicates.txt');

    await writeReport(output, summary);

    expect(await fs.promises.readFile(output, 'utf8')).toBe(formatReport(summary));
  });
});
