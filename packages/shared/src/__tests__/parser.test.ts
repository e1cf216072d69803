import { describe, it, expect } from 'vitest';
import {
  formatBytes,
  formatKilobytes,
  formatCpu,
  formatPercent,
  formatTimeAgo,
} from '../utils/parser.js';

describe('formatBytes', () => {
  it('should format zero', () => {
    expect(formatBytes(0)).toBe('0 B');
  });

  it('should keep small values in bytes', () => {
    expect(formatBytes(500)).toBe('500 B');
  });

  it('should scale to KB and MB', () => {
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1024 * 1024)).toBe('1 MB');
  });
});

describe('formatKilobytes', () => {
  it('should treat the input as kilobytes', () => {
    expect(formatKilobytes(1)).toBe('1 KB');
    expect(formatKilobytes(2048)).toBe('2 MB');
    expect(formatKilobytes(1024 * 1024)).toBe('1 GB');
  });
});

describe('formatCpu', () => {
  it('should render one decimal place', () => {
    expect(formatCpu(43.3333)).toBe('43.3%');
    expect(formatCpu(0)).toBe('0.0%');
  });
});

describe('formatPercent', () => {
  it('should render two decimal places', () => {
    expect(formatPercent(43.3333)).toBe('43.33%');
  });
});

describe('formatTimeAgo', () => {
  const now = new Date('2026-03-01T12:00:00Z');

  it('should report seconds under a minute', () => {
    expect(formatTimeAgo(new Date('2026-03-01T11:59:18Z'), now)).toBe('42s ago');
  });

  it('should report whole minutes under an hour', () => {
    expect(formatTimeAgo(new Date('2026-03-01T11:54:30Z'), now)).toBe('5m ago');
  });

  it('should report whole hours beyond that', () => {
    expect(formatTimeAgo(new Date('2026-03-01T08:30:00Z'), now)).toBe('3h ago');
  });

  it('should accept ISO strings', () => {
    expect(formatTimeAgo('2026-03-01T11:59:59Z', now)).toBe('1s ago');
  });

  it('should return unknown for timestamps in the future or unparsable input', () => {
    expect(formatTimeAgo(new Date('2026-03-01T12:00:05Z'), now)).toBe('unknown');
    expect(formatTimeAgo('not a date', now)).toBe('unknown');
  });
});
