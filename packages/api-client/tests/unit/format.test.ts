import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatMegabytes,
  formatUptime,
  truncate,
  truncateStart,
} from '../../src/lib/format.js';

describe('format helpers', () => {
  it('formats megabyte limits', () => {
    expect(formatMegabytes(0)).toBe('Unlimited');
    expect(formatMegabytes(-1)).toBe('Unlimited');
    expect(formatMegabytes(512)).toBe('512 MB');
    expect(formatMegabytes(1536)).toBe('1.5 GB');
  });

  it('formats byte counts', () => {
    expect(formatBytes(0)).toBe('0 MB');
    expect(formatBytes(524288)).toBe('0.5 MB');
    expect(formatBytes(2147483648)).toBe('2.00 GB');
  });

  it('formats uptime with at most three units', () => {
    expect(formatUptime(0)).toBe('—');
    expect(formatUptime(5000)).toBe('5s');
    expect(formatUptime(3_723_000)).toBe('1h 2m 3s');
    expect(formatUptime(93_784_000)).toBe('1d 2h 3m');
  });

  it('truncates from either end', () => {
    expect(truncate('abcdef', 5)).toBe('ab...');
    expect(truncate('abc', 5)).toBe('abc');
    expect(truncateStart('ghcr.io/example/java:17', 8)).toBe('…java:17');
  });
});
