import type { FileSystem, FsUsage } from '../deps';
import type { Drawable, Gauge } from '../drawables';
import { centerString, percentStyle, prettyBytes } from '../format';
import { BaseProbe } from '../probe';
import { parseMounts, type MountEntry } from '../sources/proc';

export interface DiskEntry {
  mountPoint: string;
  device: string;
  fsType: string;
  totalBytes: number;
  availBytes: number;
  /** 0..1 share of blocks available to unprivileged users */
  freeFraction: number;
  totalInodes: number;
  freeInodes: number;
  freeInodeFraction: number;
}

export interface DiskState {
  entries: ReadonlyArray<DiskEntry>;
}

export interface DiskFilter {
  fsTypes: ReadonlySet<string>;
  mountPoints: ReadonlySet<string>;
}

const MOUNTS_FILE = '/proc/mounts';
const HEADER = '--- Disks ---';

/**
 * Drop pseudo filesystems and excluded mount points. A mount point listed
 * twice (stacked mounts) is shown once.
 */
export function selectMounts(mounts: ReadonlyArray<MountEntry>, filter: DiskFilter): Array<MountEntry> {
  const seen = new Set<string>();
  const selected: Array<MountEntry> = [];

  for (const mount of mounts) {
    if (filter.fsTypes.has(mount.fsType)) continue;
    if (filter.mountPoints.has(mount.mountPoint)) continue;
    if (seen.has(mount.mountPoint)) continue;
    seen.add(mount.mountPoint);
    selected.push(mount);
  }

  return selected;
}

export interface UsageResult {
  totalBytes: number;
  availBytes: number;
  freeFraction: number;
  totalInodes: number;
  freeInodes: number;
  freeInodeFraction: number;
  problems: Array<string>;
}

export function computeUsage(usage: FsUsage): UsageResult {
  const problems: Array<string> = [];

  let blockSize = usage.bsize;
  if (blockSize <= 0) {
    problems.push('zero block size');
    blockSize = 1;
  }

  const totalBytes = usage.blocks * blockSize;
  const availBytes = usage.bavail * blockSize;

  let freeFraction = 0;
  if (usage.blocks <= 0) {
    problems.push('zero total blocks');
  } else {
    freeFraction = Math.min(1, Math.max(0, usage.bavail / usage.blocks));
  }

  let freeInodeFraction = 0;
  if (usage.files <= 0) {
    problems.push('zero total inodes');
  } else {
    freeInodeFraction = Math.min(1, Math.max(0, usage.ffree / usage.files));
  }

  return {
    totalBytes,
    availBytes,
    freeFraction,
    totalInodes: usage.files,
    freeInodes: usage.ffree,
    freeInodeFraction,
    problems,
  };
}

export function diskGauge(entry: DiskEntry): Gauge {
  const percent = Math.floor(entry.freeFraction * 100);
  const style = percentStyle(percent, 0, 100, false);

  return {
    kind: 'gauge',
    height: 3,
    border: true,
    title: [{ text: entry.mountPoint }],
    percent,
    label: `Free: ${prettyBytes(entry.availBytes)}/${prettyBytes(entry.totalBytes)} (${String(percent)}%)`,
    labelAlign: 'center',
    labelStyle: { color: 'white', bold: true },
    barStyle: style,
  };
}

/**
 * Free space per mounted filesystem
 */
export class DiskProbe extends BaseProbe<DiskState> {
  constructor(
    private readonly fs: FileSystem,
    private readonly filter: DiskFilter,
    intervalMs: number,
  ) {
    super('disk', { entries: [] }, intervalMs);
  }

  protected async sample(_now: Date, previous: DiskState): Promise<DiskState | null> {
    let mounts: Array<MountEntry>;
    try {
      mounts = selectMounts(parseMounts(await this.fs.readFile(MOUNTS_FILE)), this.filter);
    } catch (error) {
      this.log.warn({ err: error, file: MOUNTS_FILE }, 'Failed to read mount list');
      return null;
    }

    const known = new Map(previous.entries.map(entry => [entry.mountPoint, entry]));
    const entries: Array<DiskEntry> = [];

    for (const mount of mounts) {
      const entry = await this.measure(mount, known.get(mount.mountPoint));
      if (entry !== undefined) entries.push(entry);
    }

    entries.sort((a, b) => (a.mountPoint < b.mountPoint ? -1 : a.mountPoint > b.mountPoint ? 1 : 0));
    return { entries };
  }

  private async measure(mount: MountEntry, previous: DiskEntry | undefined): Promise<DiskEntry | undefined> {
    let usage: FsUsage;
    try {
      usage = await this.fs.statfs(mount.mountPoint);
    } catch (error) {
      this.log.warn({ err: error, mountPoint: mount.mountPoint }, 'statfs failed, keeping previous entry');
      return previous;
    }

    const { problems, ...measured } = computeUsage(usage);
    if (problems.length > 0) {
      this.log.warn({ mountPoint: mount.mountPoint, problems }, 'Suspicious filesystem statistics');
    }

    return {
      mountPoint: mount.mountPoint,
      device: mount.device,
      fsType: mount.fsType,
      ...measured,
    };
  }

  protected view(state: DiskState, size: { width: number }): Drawable {
    const header: Drawable = {
      kind: 'text',
      height: 1,
      border: false,
      lines: [[{ text: centerString(size.width, HEADER), color: 'green' }]],
    };

    const gauges = state.entries.map(diskGauge);

    return {
      kind: 'stack',
      height: 1 + 3 * gauges.length,
      border: false,
      children: [header, ...gauges],
    };
  }
}
