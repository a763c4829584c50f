import { describe, it, expect } from 'vitest';
import { formatBytes, formatDuration, isPositiveInteger, sanitizeSegment } from '../src/index.js';

describe('formatDuration', () => {
  it('formats milliseconds, seconds, minutes and hours', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(42_000)).toBe('42s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_723_000)).toBe('1h 2m 3s');
  });
});

describe('formatBytes', () => {
  it('keeps small counts in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('uses binary units with one decimal', () => {
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(100 * 1024 * 1024)).toBe('100 MiB');
    expect(formatBytes(10 * 1024 ** 3)).toBe('10 GiB');
  });
});

describe('sanitizeSegment', () => {
  it('replaces characters outside the safe set', () => {
    expect(sanitizeSegment('task/1 ..x')).toBe('task_1_..x');
  });

  it('truncates long values', () => {
    expect(sanitizeSegment('a'.repeat(80))).toHaveLength(64);
  });
});

describe('isPositiveInteger', () => {
  it('accepts only safe integers above zero', () => {
    expect(isPositiveInteger(3)).toBe(true);
    expect(isPositiveInteger(0)).toBe(false);
    expect(isPositiveInteger(1.5)).toBe(false);
    expect(isPositiveInteger('3')).toBe(false);
  });
});
