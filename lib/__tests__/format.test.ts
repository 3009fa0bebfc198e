import { describe, it, expect } from 'vitest';
import {
  centerString,
  formatClockLabel,
  formatTimestamp,
  formatUptime,
  percentStyle,
  prettyBytes,
  rightJustify,
  stripAnsi,
} from '../format';

describe('format helpers', () => {
  describe('stripAnsi', () => {
    it('removes colour sequences', () => {
      expect(stripAnsi('\x1B[1;32mSunny\x1B[0m +21°C')).toBe('Sunny +21°C');
    });
  });

  describe('justification', () => {
    it('pads on the left', () => {
      expect(rightJustify(6, 'eth0')).toBe('  eth0');
    });

    it('leaves long strings alone', () => {
      expect(rightJustify(2, 'wlan0')).toBe('wlan0');
    });

    it('centres within the width', () => {
      expect(centerString(13, 'abc')).toBe('     abc');
      expect(centerString(2, 'abcdef')).toBe('abcdef');
    });
  });

  describe('prettyBytes', () => {
    it('picks the largest unit', () => {
      expect(prettyBytes(3 * 1024 * 1024 * 1024)).toBe('3.00G');
      expect(prettyBytes(1.5 * 1024 * 1024)).toBe('1.50M');
      expect(prettyBytes(2048)).toBe('2.00K');
      expect(prettyBytes(512)).toBe('512bytes');
    });

    it('uses the smaller unit at an exact boundary', () => {
      expect(prettyBytes(1024)).toBe('1024bytes');
    });
  });

  describe('percentStyle', () => {
    it('colours high values well when not inverted', () => {
      expect(percentStyle(5, 0, 100, false)).toEqual({ color: 'red', bold: true });
      expect(percentStyle(60, 0, 100, false)).toEqual({ color: 'green' });
      expect(percentStyle(99, 0, 100, false)).toEqual({ color: 'blue', bold: true });
    });

    it('colours high values badly when inverted', () => {
      expect(percentStyle(95, 0, 100, true)).toEqual({ color: 'red', bold: true });
      expect(percentStyle(30, 0, 100, true)).toEqual({ color: 'green' });
      expect(percentStyle(1, 0, 100, true)).toEqual({ color: 'blue', bold: true });
    });
  });

  describe('time formatting', () => {
    it('formats clock labels as HH:MM', () => {
      expect(formatClockLabel(new Date(2026, 0, 2, 7, 5, 9))).toBe('07:05');
    });

    it('formats timestamps with date, time and zone', () => {
      expect(formatTimestamp(new Date(2026, 2, 4, 9, 8, 7))).toMatch(/^2026\/03\/04 09:08:07( \S+)?$/);
    });

    it('omits leading zero units from uptime', () => {
      expect(formatUptime(42)).toBe('42s');
      expect(formatUptime(3 * 3600 + 7)).toBe('3h 0m 7s');
      expect(formatUptime(2 * 86400 + 5 * 3600 + 6 * 60 + 7.9)).toBe('2d 5h 6m 7s');
    });
  });
});
