import { describe, it, expect } from 'vitest';
import { formatSize } from '../src/format';

describe('formatSize', () => {
  it('should spell out small counts in bytes', () => {
    expect(formatSize(0)).toBe('0 Bytes');
    expect(formatSize(1)).toBe('1 Byte');
    expect(formatSize(999)).toBe('999 Bytes');
  });

  it('should use decimal units with one digit after the point', () => {
    expect(formatSize(1000)).toBe('1.0 kB');
    expect(formatSize(1536)).toBe('1.5 kB');
    expect(formatSize(2500000)).toBe('2.5 MB');
    expect(formatSize(1536000000)).toBe('1.5 GB');
    expect(formatSize(3 * 1000 ** 4)).toBe('3.0 TB');
  });

  it('should stop at exabytes', () => {
    expect(formatSize(2000 * 1000 ** 6)).toBe('2000.0 EB');
  });
});
