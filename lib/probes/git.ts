import { basename, dirname, join, relative, sep } from 'node:path';

import type { RepoSearchRoot } from '../config';
import type { CommandRunner, DirectoryWalker, FileSystem } from '../deps';
import type { Drawable, Line, Span, Style } from '../drawables';
import { rightJustify } from '../format';
import { BaseProbe } from '../probe';
import { RefreshSchedule } from '../refresh-policy';

export const STATUS_KEYS = ['M', 'A', 'D', 'R', 'C', 'U', '?', '!'] as const;
export type StatusKey = typeof STATUS_KEYS[number];
export type StatusCounts = Record<StatusKey, number>;

const STATUS_DISPLAY: Record<StatusKey, { symbol: string; style: Style }> = {
  'M': { symbol: 'M', style: { color: 'green' } },
  'A': { symbol: '+', style: { color: 'green', bold: true } },
  'D': { symbol: '-', style: { color: 'red', bold: true } },
  'R': { symbol: 'R', style: { color: 'yellow', bold: true } },
  'C': { symbol: 'C', style: { color: 'blue', bold: true } },
  'U': { symbol: 'U', style: { color: 'magenta', bold: true } },
  '?': { symbol: '?', style: { color: 'red' } },
  '!': { symbol: '!', style: { color: 'cyan' } },
};

const PRIMARY_BRANCHES = new Set(['master', 'main', 'mainline']);
const MIN_NAME_WIDTH = 26;
const GIT_MARKER = '.git';
const STATUS_ARGS = ['-c', 'color.status=never', '-c', 'color.ui=never', 'status', '-sb'];

export interface GitStatus {
  branch: string;
  tracking: string;
  counts: StatusCounts;
}

export interface RepoRecord {
  name: string;
  fullPath: string;
  homePath: string;
  branchStatus: Line;
  status: Line;
}

export interface GitState {
  repos: ReadonlyArray<RepoRecord>;
}

function emptyCounts(): StatusCounts {
  return { 'M': 0, 'A': 0, 'D': 0, 'R': 0, 'C': 0, 'U': 0, '?': 0, '!': 0 };
}

/**
 * Parse `git status -sb`. Null when the branch header is missing.
 */
export function parseGitStatus(output: string): GitStatus | null {
  const lines = output.split('\n');
  const header = lines[0] ?? '';
  if (!header.startsWith('## ')) return null;

  const branchLine = header.slice(3);
  const branchToken = branchLine.split(' ')[0] ?? '';
  const branch = branchToken.split('...')[0] ?? branchToken;

  const bracket = branchLine.indexOf('[');
  const tracking = bracket >= 0 ? branchLine.slice(bracket) : '';

  const counts = emptyCounts();
  for (const rawLine of lines.slice(1)) {
    const entry = rawLine.trim();
    if (entry.length < 2) continue;
    const flags = entry.slice(0, 2);
    for (const key of STATUS_KEYS) {
      if (flags.includes(key)) counts[key]++;
    }
  }

  return { branch, tracking, counts };
}

export function branchLine(status: GitStatus): Line {
  const spans: Array<Span> = [
    { text: status.branch, color: PRIMARY_BRANCHES.has(status.branch) ? 'green' : 'cyan' },
  ];
  if (status.tracking.length > 0) {
    spans.push({ text: ' ' }, { text: status.tracking, color: 'magenta' });
  }
  return spans;
}

export function statusLine(counts: StatusCounts): Line {
  const spans: Array<Span> = [];
  for (const key of STATUS_KEYS) {
    const count = counts[key];
    if (count === 0) continue;
    if (spans.length > 0) spans.push({ text: ' ' });
    const { symbol, style } = STATUS_DISPLAY[key];
    spans.push({ text: `${symbol}:${String(count)}`, ...style });
  }
  return spans;
}

/**
 * `~/...` when the repository lives under either spelling of the home directory
 */
export function homeRelative(fullPath: string, homes: ReadonlyArray<string>) {
  for (const home of homes) {
    if (fullPath === home) return '~';
    if (fullPath.startsWith(home.endsWith(sep) ? home : home + sep)) {
      return join('~', relative(home, fullPath));
    }
  }
  return fullPath;
}

/**
 * Walk every search root for `.git` directories and return the canonical,
 * sorted, de-duplicated repository paths.
 */
export async function discoverRepositories(
  walker: DirectoryWalker,
  fs: FileSystem,
  roots: ReadonlyArray<RepoSearchRoot>,
): Promise<Array<string>> {
  const repos = new Set<string>();

  for (const { root, depth } of roots) {
    const markers = await walker.walk(root, depth, GIT_MARKER);
    for (const marker of markers) {
      const canonical = await fs.realpath(marker).catch(() => marker);
      repos.add(dirname(canonical));
    }
  }

  return Array.from(repos).sort();
}

function nameCell(repo: RepoRecord, nameWidth: number): Line {
  const parent = dirname(repo.homePath);
  return [
    { text: `${rightJustify(nameWidth - repo.name.length, parent)}${sep}`, color: 'cyan' },
    { text: repo.name, color: 'cyan', bold: true },
  ];
}

/**
 * Table of discovered repositories with branch and working tree counts.
 *
 * Discovery and per-repository status run on their own schedules; the probe
 * itself is asked every tick.
 */
export class GitProbe extends BaseProbe<GitState> {
  private readonly discovery: RefreshSchedule;
  private readonly statusSchedules = new Map<string, RefreshSchedule>();
  private homes: Array<string> | null = null;

  constructor(
    private readonly walker: DirectoryWalker,
    private readonly fs: FileSystem,
    private readonly commands: CommandRunner,
    private readonly roots: ReadonlyArray<RepoSearchRoot>,
    private readonly home: string,
    discoveryIntervalMs: number,
    private readonly statusIntervalMs: number,
  ) {
    super('git', { repos: [] });
    this.discovery = new RefreshSchedule(discoveryIntervalMs);
  }

  protected async sample(now: Date, previous: GitState): Promise<GitState> {
    let repos = previous.repos;

    if (this.discovery.due(now.getTime())) {
      repos = await this.rediscover(repos);
    }

    const updated: Array<RepoRecord> = [];
    for (const repo of repos) {
      updated.push(await this.refreshRepo(repo, now));
    }

    return { repos: updated };
  }

  private async homeSpellings() {
    if (this.homes === null) {
      const canonical = await this.fs.realpath(this.home).catch(() => this.home);
      this.homes = canonical === this.home ? [this.home] : [this.home, canonical];
    }
    return this.homes;
  }

  private async rediscover(current: ReadonlyArray<RepoRecord>) {
    const paths = await discoverRepositories(this.walker, this.fs, this.roots);
    const homes = await this.homeSpellings();
    const known = new Map(current.map(repo => [repo.fullPath, repo]));

    for (const path of this.statusSchedules.keys()) {
      if (!paths.includes(path)) this.statusSchedules.delete(path);
    }

    this.log.debug({ count: paths.length }, 'Repository discovery finished');

    return paths.map(fullPath => known.get(fullPath) ?? {
      name: basename(fullPath),
      fullPath,
      homePath: homeRelative(fullPath, homes),
      branchStatus: [],
      status: [],
    });
  }

  private async refreshRepo(repo: RepoRecord, now: Date): Promise<RepoRecord> {
    let schedule = this.statusSchedules.get(repo.fullPath);
    if (schedule === undefined) {
      schedule = new RefreshSchedule(this.statusIntervalMs);
      this.statusSchedules.set(repo.fullPath, schedule);
    }
    if (!schedule.due(now.getTime())) return repo;

    const result = await this.commands.run('git', STATUS_ARGS, { cwd: repo.fullPath });
    if (!result.ok) {
      this.log.warn({ repo: repo.fullPath, exitCode: result.exitCode, err: result.err }, 'git status failed');
      return repo;
    }

    const status = parseGitStatus(result.out);
    if (status === null) {
      this.log.warn({ repo: repo.fullPath, raw: result.out }, 'Unexpected git status output');
      return repo;
    }

    return {
      ...repo,
      branchStatus: branchLine(status),
      status: statusLine(status.counts),
    };
  }

  protected view(state: GitState): Drawable {
    const nameWidth = Math.max(MIN_NAME_WIDTH, ...state.repos.map(repo => repo.homePath.length));

    return {
      kind: 'table',
      height: 2 + state.repos.length,
      border: true,
      title: [{ text: 'Git Repos' }],
      rows: state.repos.map(repo => [nameCell(repo, nameWidth), repo.branchStatus, repo.status]),
    };
  }
}
