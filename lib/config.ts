import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

import { logger, LOG_FILE } from './logger';
import { StartupError } from './errors';
import { parseKeyBinding, type KeyBinding } from './keys';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;

export const TICK_INTERVAL_MS = 5 * SECOND;

export const REFRESH_INTERVALS = {
  battery: 10 * SECOND,
  disk: 30 * SECOND,
  gitStatus: 10 * SECOND,
  gitDiscovery: 30 * SECOND,
  weather: HOUR,
  feed: HOUR,
} as const;

export type RefreshIntervals = Record<keyof typeof REFRESH_INTERVALS, number>;

/**
 * Pseudo and virtual filesystems never shown as disks
 */
export const EXCLUDED_FS_TYPES: ReadonlySet<string> = new Set([
  'sysfs', 'proc', 'udev', 'devpts', 'tmpfs', 'cgroup', 'cgroup2', 'systemd-1',
  'mqueue', 'debugfs', 'hugetlbfs', 'fusectl', 'tracefs', 'binfmt_misc',
  'devtmpfs', 'securityfs', 'pstore', 'autofs', 'bpf', 'configfs', 'nsfs',
  'overlay', 'squashfs', 'fuse.jetbrains-toolbox', 'fuse.gvfsd-fuse',
  'fuse.lxcfs', 'fuse.portal',
]);

// Docker storage mounts duplicate the root filesystem
export const EXCLUDED_MOUNT_POINTS: ReadonlySet<string> = new Set([
  '/var/lib/docker/aufs',
  '/var/lib/docker/devicemapper',
]);

export interface RepoSearchRoot {
  root: string;
  depth: number;
}

export interface DashboardConfig {
  tickIntervalMs: number;
  intervals: RefreshIntervals;
  excludedFsTypes: ReadonlySet<string>;
  excludedMountPoints: ReadonlySet<string>;
  home: string;
  repoSearch: Array<RepoSearchRoot>;
  weatherLocation: string;
  feedAccounts: Array<string>;
  quitKeys: Array<KeyBinding>;
  logFile: string | null;
}

const DEFAULT_REPO_DEPTH = 3;
const DEFAULT_QUIT_KEYS = 'q,C-c';

function expandHome(path: string, home: string) {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

function resolveDepth(raw: string) {
  if (!/^\d+$/.test(raw.trim())) return null;
  return Number.parseInt(raw, 10);
}

/**
 * Parse "path:depth,path:depth". Bad entries are logged and skipped; when
 * nothing usable remains the home directory is searched.
 */
export function parseRepoSearchPaths(raw: string | undefined, home: string): Array<RepoSearchRoot> {
  const defaults = [{ root: home, depth: DEFAULT_REPO_DEPTH }];
  if (raw === undefined || raw.trim().length === 0) return defaults;

  const roots = new Map<string, number>();

  for (const entry of raw.split(',')) {
    const separator = entry.lastIndexOf(':');
    if (separator <= 0) {
      logger.warn({ entry }, 'Ignoring repository search entry without depth');
      continue;
    }

    const path = entry.slice(0, separator).trim();
    const depth = resolveDepth(entry.slice(separator + 1));
    if (depth === null) {
      logger.warn({ entry }, 'Ignoring repository search entry with invalid depth');
      continue;
    }

    const expanded = expandHome(path, home);
    roots.set(isAbsolute(expanded) ? resolve(expanded) : resolve(home, expanded), depth);
  }

  if (roots.size === 0) {
    logger.warn({ raw }, 'No usable repository search paths, using defaults');
    return defaults;
  }

  return Array.from(roots, ([root, depth]) => ({ root, depth }));
}

function parseList(raw: string | undefined) {
  if (raw === undefined) return [];
  return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DashboardConfig {
  const home = env['HOME'] ?? homedir();
  const quitKeys = parseList(env['SYSDASH_QUIT_KEYS'] ?? DEFAULT_QUIT_KEYS).map(parseKeyBinding);
  if (quitKeys.length === 0) {
    throw new StartupError('SYSDASH_QUIT_KEYS must name at least one key');
  }

  return {
    tickIntervalMs: TICK_INTERVAL_MS,
    intervals: { ...REFRESH_INTERVALS },
    excludedFsTypes: EXCLUDED_FS_TYPES,
    excludedMountPoints: EXCLUDED_MOUNT_POINTS,
    home,
    repoSearch: parseRepoSearchPaths(env['SYSDASH_REPO_SEARCH_PATHS'], home),
    weatherLocation: (env['SYSDASH_WEATHER_LOCATION'] ?? '').trim(),
    feedAccounts: parseList(env['SYSDASH_FEED_ACCOUNTS']),
    quitKeys,
    logFile: LOG_FILE,
  };
}
