/**
 * Parsers for the Linux /proc pseudo-files the host probes read
 */

export interface LoadAverage {
  load1: number;
  load5: number;
  load15: number;
}

export interface CpuTimes {
  user: number;
  nice: number;
  system: number;
  idle: number;
  iowait: number;
  irq: number;
  softirq: number;
  steal: number;
}

export interface CpuStat {
  total: CpuTimes;
  processors: number;
}

export interface MountEntry {
  device: string;
  mountPoint: string;
  fsType: string;
}

/**
 * /proc/loadavg: "0.52 0.58 0.59 2/1134 12345"
 */
export function parseLoadAverage(content: string): LoadAverage | null {
  const parts = content.trim().split(/\s+/);
  if (parts.length < 3) return null;

  const [load1, load5, load15] = parts.slice(0, 3).map(part => Number.parseFloat(part));
  if (load1 === undefined || load5 === undefined || load15 === undefined) return null;
  if ([load1, load5, load15].some(value => Number.isNaN(value))) return null;

  return { load1, load5, load15 };
}

function parseCpuLine(fields: Array<string>): CpuTimes | null {
  const values = fields.slice(1, 9).map(field => Number.parseInt(field, 10));
  // Old kernels omit steal (and earlier columns); missing columns count as zero
  while (values.length < 8) values.push(0);
  if (values.some(value => Number.isNaN(value))) return null;

  const [user = 0, nice = 0, system = 0, idle = 0, iowait = 0, irq = 0, softirq = 0, steal = 0] = values;
  return { user, nice, system, idle, iowait, irq, softirq, steal };
}

/**
 * /proc/stat: aggregate "cpu" line plus one "cpuN" line per processor
 */
export function parseCpuStat(content: string): CpuStat | null {
  let total: CpuTimes | null = null;
  let processors = 0;

  for (const rawLine of content.split(/\r?\n/)) {
    const fields = rawLine.trim().split(/\s+/);
    const head = fields[0];
    if (head === undefined) continue;

    if (head === 'cpu') {
      total = parseCpuLine(fields);
    } else if (/^cpu\d+$/.test(head)) {
      processors++;
    }
  }

  if (total === null) return null;
  return { total, processors: Math.max(processors, 1) };
}

/**
 * /proc/uptime: "35232.51 134412.33" (seconds up, seconds idle)
 */
export function parseUptime(content: string): number | null {
  const first = content.trim().split(/\s+/)[0];
  if (first === undefined) return null;
  const seconds = Number.parseFloat(first);
  return Number.isNaN(seconds) ? null : seconds;
}

// Mount paths escape space, tab, newline and backslash as octal
function decodeMountField(field: string) {
  return field.replace(/\\([0-7]{3})/g, (_match, octal: string) => String.fromCharCode(Number.parseInt(octal, 8)));
}

/**
 * /proc/mounts: "device mountpoint fstype options dump pass"
 */
export function parseMounts(content: string): Array<MountEntry> {
  const mounts: Array<MountEntry> = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const fields = rawLine.trim().split(/\s+/);
    const [device, mountPoint, fsType] = fields;
    if (device === undefined || mountPoint === undefined || fsType === undefined) continue;

    mounts.push({
      device: decodeMountField(device),
      mountPoint: decodeMountField(mountPoint),
      fsType,
    });
  }

  return mounts;
}
