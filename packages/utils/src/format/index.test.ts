import { describe, it, expect } from 'vitest';
import {
  formatSize,
  formatDurationMs,
  formatDimensions,
} from './index';

describe('formatSize', () => {
  it('should format bytes', () => {
    expect(formatSize(0)).toBe('0 B');
    expect(formatSize(500)).toBe('500 B');
    expect(formatSize(1023)).toBe('1023 B');
  });

  it('should format kilobytes', () => {
    expect(formatSize(1024)).toBe('1.0 KB');
    expect(formatSize(1536)).toBe('1.5 KB');
    expect(formatSize(10240)).toBe('10.0 KB');
  });

  it('should format megabytes', () => {
    expect(formatSize(1048576)).toBe('1.0 MB');
    expect(formatSize(5242880)).toBe('5.0 MB');
    expect(formatSize(1572864)).toBe('1.5 MB');
  });

  it('should format gigabytes', () => {
    expect(formatSize(1073741824)).toBe('1.0 GB');
    expect(formatSize(5368709120)).toBe('5.0 GB');
  });

  it('should format terabytes', () => {
    expect(formatSize(1099511627776)).toBe('1.0 TB');
  });

  it('should respect decimal places', () => {
    expect(formatSize(1536, 0)).toBe('2 KB');
    expect(formatSize(1536, 2)).toBe('1.50 KB');
    expect(formatSize(1536, 3)).toBe('1.500 KB');
  });

  it('should handle negative values', () => {
    expect(formatSize(-100)).toBe('Invalid size');
  });
});

describe('formatDurationMs', () => {
  it('should format milliseconds', () => {
    expect(formatDurationMs(0)).toBe('0ms');
    expect(formatDurationMs(500)).toBe('500ms');
    expect(formatDurationMs(999)).toBe('999ms');
  });

  it('should format seconds', () => {
    expect(formatDurationMs(1000)).toBe('1.0s');
    expect(formatDurationMs(1500)).toBe('1.5s');
    expect(formatDurationMs(30000)).toBe('30.0s');
  });

  it('should format minutes and seconds', () => {
    expect(formatDurationMs(60000)).toBe('1m 0s');
    expect(formatDurationMs(65000)).toBe('1m 5s');
    expect(formatDurationMs(125000)).toBe('2m 5s');
  });

  it('should format hours, minutes and seconds', () => {
    expect(formatDurationMs(3600000)).toBe('1h 0m');
    expect(formatDurationMs(3661000)).toBe('1h 1m 1s');
    expect(formatDurationMs(7325000)).toBe('2h 2m 5s');
  });

  it('should round fractional milliseconds', () => {
    expect(formatDurationMs(12.6)).toBe('13ms');
  });

  it('should handle negative values', () => {
    expect(formatDurationMs(-100)).toBe('Invalid duration');
  });
});

describe('formatDimensions', () => {
  it('should join width and height', () => {
    expect(formatDimensions(1790, 1210)).toBe('1790x1210');
    expect(formatDimensions(1, 1)).toBe('1x1');
  });
});
