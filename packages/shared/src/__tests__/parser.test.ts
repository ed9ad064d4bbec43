import { describe, it, expect } from 'vitest';
import {
  parseDuration,
  formatDuration,
  formatBytes,
  formatPercent,
  formatAge,
} from '../utils/parser.js';

describe('parseDuration', () => {
  it('should pass numbers through as milliseconds', () => {
    expect(parseDuration(5000)).toBe(5000);
    expect(parseDuration(0)).toBe(0);
  });

  it('should parse capture-window style durations', () => {
    expect(parseDuration('5s')).toBe(5000);
    expect(parseDuration('60s')).toBe(60000);
    expect(parseDuration('250ms')).toBe(250);
  });

  it('should parse retention horizons', () => {
    expect(parseDuration('1h')).toBe(3600000);
    expect(parseDuration('30d')).toBe(2592000000);
  });

  it('should throw on an unparseable string', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration string: "soon"');
  });

  it('should throw on an empty string', () => {
    expect(() => parseDuration('')).toThrow();
  });
});

describe('formatDuration', () => {
  it('should keep sub-second values in milliseconds', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should switch units at each boundary', () => {
    expect(formatDuration(1000)).toBe('1s');
    expect(formatDuration(60000)).toBe('1m');
    expect(formatDuration(3600000)).toBe('1h');
    expect(formatDuration(86400000)).toBe('1d');
  });

  it('should round to the nearest unit', () => {
    expect(formatDuration(1500)).toBe('2s');
    expect(formatDuration(90000)).toBe('2m');
  });
});

describe('formatBytes', () => {
  it('should format zero bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
  });

  it('should format byte counts with binary units', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1024)).toBe('1 KB');
    expect(formatBytes(1048576)).toBe('1 MB');
    expect(formatBytes(1073741824)).toBe('1 GB');
  });
});

describe('formatPercent', () => {
  it('should render one decimal place', () => {
    expect(formatPercent(0)).toBe('0.0%');
    expect(formatPercent(42)).toBe('42.0%');
    expect(formatPercent(45.678)).toBe('45.7%');
  });

  it('should render an unavailable reading as a dash', () => {
    expect(formatPercent(null)).toBe('-');
  });
});

describe('formatAge', () => {
  it('should floor to the largest whole unit', () => {
    expect(formatAge(59.9)).toBe('59s');
    expect(formatAge(119)).toBe('1m');
    expect(formatAge(7199)).toBe('1h');
    expect(formatAge(90000)).toBe('1d');
  });
});
