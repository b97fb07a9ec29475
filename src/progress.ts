import path from "path";

/**
 * Interface for progress and timing output while a detection run moves through its stages.
 */
export interface ProgressReporter {
  /** Called when directory scanning begins */
  startScanning(rootCount: number): void;

  /** Called as files are found, with the running total across all walkers */
  updateScanning(filesFound: number): void;

  /** Called when every root has been walked */
  endScanning(totalFiles: number, elapsedMs: number): void;

  /** Called once files have been grouped by size */
  endGrouping(sizeGroups: number, candidates: number, elapsedMs: number): void;

  /** Called when file hashing begins */
  startHashing(totalFiles: number): void;

  /** Called periodically during hashing with progress */
  updateHashing(completed: number, total: number, currentFile?: string): void;

  /** Called when every size group has been hashed and bucketed */
  endHashing(duplicateGroups: number, elapsedMs: number): void;
}

function seconds(elapsedMs: number): string {
  return `${(elapsedMs / 1000).toFixed(2)}s`;
}

/**
 * Progress reporter that outputs to stderr with throttled updates.
 * Updates are throttled to avoid excessive I/O during fast operations.
 */
export class StderrProgressReporter implements ProgressReporter {
  private lastUpdate = 0;
  private readonly UPDATE_INTERVAL_MS = 100; // Throttle to 10 updates/sec

  startScanning(rootCount: number): void {
    const noun = rootCount === 1 ? "folder" : "folders";
    process.stderr.write(`Scanning ${rootCount} ${noun}...\n`);
  }

  updateScanning(filesFound: number): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    process.stderr.write(`\rFiles found: ${filesFound}`);
  }

  endScanning(totalFiles: number, elapsedMs: number): void {
    process.stderr.write(`\rScan completed in ${seconds(elapsedMs)}: ${totalFiles} files found\n`);
  }

  endGrouping(sizeGroups: number, candidates: number, elapsedMs: number): void {
    process.stderr.write(
      `Grouped by size in ${seconds(elapsedMs)}: ${sizeGroups} shared sizes, ${candidates} candidate files\n`
    );
  }

  startHashing(totalFiles: number): void {
    process.stderr.write(`Hashing ${totalFiles} candidate files...\n`);
  }

  updateHashing(completed: number, total: number, currentFile?: string): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.UPDATE_INTERVAL_MS) return;
    this.lastUpdate = now;

    const percent = ((completed / total) * 100).toFixed(1);
    const fileName = currentFile ? path.basename(currentFile) : '';
    const display = fileName
      ? `\rHashing: ${completed}/${total} (${percent}%) - ${fileName}`
      : `\rHashing: ${completed}/${total} (${percent}%)`;

    // Pad with spaces to clear previous line
    process.stderr.write(display + ' '.repeat(20));
  }

  endHashing(duplicateGroups: number, elapsedMs: number): void {
    process.stderr.write(
      `\rHashing completed in ${seconds(elapsedMs)}: ${duplicateGroups} duplicate groups` +
        ' '.repeat(30) +
        '\n'
    );
  }
}

/**
 * No-op progress reporter that produces no output.
 */
export class NoOpProgressReporter implements ProgressReporter {
  startScanning(_rootCount: number): void {}
  updateScanning(_filesFound: number): void {}
  endScanning(_totalFiles: number, _elapsedMs: number): void {}
  endGrouping(_sizeGroups: number, _candidates: number, _elapsedMs: number): void {}
  startHashing(_totalFiles: number): void {}
  updateHashing(_completed: number, _total: number, _currentFile?: string): void {}
  endHashing(_duplicateGroups: number, _elapsedMs: number): void {}
}

/**
 * Creates a progress reporter based on whether progress should be enabled.
 */
export function createProgressReporter(enabled: boolean): ProgressReporter {
  return enabled ? new StderrProgressReporter() : new NoOpProgressReporter();
}
