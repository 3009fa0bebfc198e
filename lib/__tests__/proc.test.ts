import { describe, it, expect } from 'vitest';
import { parseCpuStat, parseLoadAverage, parseMounts, parseUptime } from '../sources/proc';

describe('/proc parsers', () => {
  it('parses the load average', () => {
    expect(parseLoadAverage('0.52 0.58 0.59 2/1134 12345\n')).toEqual({ load1: 0.52, load5: 0.58, load15: 0.59 });
    expect(parseLoadAverage('garbage')).toBeNull();
  });

  it('parses the aggregate cpu line and counts processors', () => {
    const stat = [
      'cpu  100 5 50 800 20 3 2 0 0 0',
      'cpu0 50 2 25 400 10 1 1 0 0 0',
      'cpu1 50 3 25 400 10 2 1 0 0 0',
      'intr 12345',
    ].join('\n');

    expect(parseCpuStat(stat)).toEqual({
      total: { user: 100, nice: 5, system: 50, idle: 800, iowait: 20, irq: 3, softirq: 2, steal: 0 },
      processors: 2,
    });
  });

  it('pads short cpu lines with zeros', () => {
    expect(parseCpuStat('cpu 1 2 3 4')?.total).toEqual({
      user: 1, nice: 2, system: 3, idle: 4, iowait: 0, irq: 0, softirq: 0, steal: 0,
    });
  });

  it('returns null without an aggregate line', () => {
    expect(parseCpuStat('intr 1 2 3')).toBeNull();
  });

  it('parses uptime seconds', () => {
    expect(parseUptime('35232.51 134412.33\n')).toBe(35232.51);
    expect(parseUptime('')).toBeNull();
  });

  it('parses mounts and decodes octal escapes', () => {
    const mounts = parseMounts([
      '/dev/sda1 / ext4 rw,relatime 0 0',
      '/dev/sdb1 /media/My\\040Disk vfat rw 0 0',
      '',
    ].join('\n'));

    expect(mounts).toEqual([
      { device: '/dev/sda1', mountPoint: '/', fsType: 'ext4' },
      { device: '/dev/sdb1', mountPoint: '/media/My Disk', fsType: 'vfat' },
    ]);
  });
});
