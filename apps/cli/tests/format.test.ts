import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatLength,
  formatProgress,
  formatPublishDate,
  formatViews,
  truncateTitle,
} from '../src/lib/format.js';

describe('format', () => {
  it('should truncate long titles to 40 characters', () => {
    expect(truncateTitle('Short title')).toBe('Short title');
    expect(truncateTitle('a'.repeat(45))).toBe(`${'a'.repeat(40)}...`);
  });

  it('should format lengths as minutes and seconds', () => {
    expect(formatLength(0)).toBe('0:00');
    expect(formatLength(125)).toBe('2:05');
    expect(formatLength(3725)).toBe('62:05');
  });

  it('should group view counts', () => {
    expect(formatViews(1234567)).toBe('1,234,567');
  });

  it('should show ISO dates as day/month/year', () => {
    expect(formatPublishDate('2024-03-09')).toBe('09/03/2024');
    expect(formatPublishDate('2024-03-09T00:00:00-07:00')).toBe('09/03/2024');
    expect(formatPublishDate('March 2024')).toBe('March 2024');
    expect(formatPublishDate(undefined)).toBe('unknown');
  });

  it('should format byte counts', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1048576)).toBe('1 MB');
  });

  it('should show a percentage only when the total is known', () => {
    expect(formatProgress(512, 1024)).toBe('50% (512 B / 1 KB)');
    expect(formatProgress(2048)).toBe('2 KB');
    expect(formatProgress(2048, 0)).toBe('2 KB');
  });
});
