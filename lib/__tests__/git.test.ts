import { mkdir, mkdtemp, realpath, rm, symlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NodeDirectoryWalker, NodeFileSystem } from '../deps';
import { lineText, type Drawable } from '../drawables';
import {
  branchLine,
  discoverRepositories,
  GitProbe,
  homeRelative,
  parseGitStatus,
  statusLine,
} from '../probes/git';
import { walkForMarker } from '../sources/walker';
import { MockCommandRunner, MockDirectoryWalker, MockFileSystem } from './mocks';

const STATUS_ARGS = ['-c', 'color.status=never', '-c', 'color.ui=never', 'status', '-sb'];

function tableRows(drawable: Drawable) {
  return drawable.kind === 'table' ? drawable.rows.map(row => row.map(lineText)) : [];
}

describe('parseGitStatus', () => {
  it('reads branch, tracking state and counts per status letter', () => {
    const status = parseGitStatus('## main...origin/main [ahead 2]\n M src/a.ts\nA  b.ts\n?? c.ts\nRM d.ts\n');

    expect(status?.branch).toBe('main');
    expect(status?.tracking).toBe('[ahead 2]');
    expect(status?.counts).toEqual({ 'M': 2, 'A': 1, 'D': 0, 'R': 1, 'C': 0, 'U': 0, '?': 1, '!': 0 });
  });

  it('handles a branch without upstream', () => {
    expect(parseGitStatus('## feature/x\n')).toMatchObject({ branch: 'feature/x', tracking: '' });
  });

  it('rejects output without a branch header', () => {
    expect(parseGitStatus('fatal: not a git repository')).toBeNull();
  });
});

describe('git display lines', () => {
  it('colours primary branches green and tracking magenta', () => {
    const status = parseGitStatus('## main...origin/main [behind 1]');
    expect(status === null ? [] : branchLine(status)).toEqual([
      { text: 'main', color: 'green' },
      { text: ' ' },
      { text: '[behind 1]', color: 'magenta' },
    ]);

    const feature = parseGitStatus('## topic');
    expect(feature === null ? [] : branchLine(feature)).toEqual([{ text: 'topic', color: 'cyan' }]);
  });

  it('renders non-zero counts with their symbols', () => {
    const line = statusLine({ 'M': 2, 'A': 1, 'D': 3, 'R': 0, 'C': 0, 'U': 0, '?': 1, '!': 0 });
    expect(lineText(line)).toBe('M:2 +:1 -:3 ?:1');
    expect(line[4]).toEqual({ text: '-:3', color: 'red', bold: true });
  });
});

describe('homeRelative', () => {
  it('abbreviates either spelling of the home directory', () => {
    const homes = ['/home/test', '/data/home/test'];
    expect(homeRelative('/home/test/src/app', homes)).toBe('~/src/app');
    expect(homeRelative('/data/home/test/x', homes)).toBe('~/x');
    expect(homeRelative('/home/tester/x', homes)).toBe('/home/tester/x');
    expect(homeRelative('/opt/tool', homes)).toBe('/opt/tool');
  });
});

describe('discoverRepositories', () => {
  it('canonicalises, de-duplicates and sorts', async () => {
    const walker = new MockDirectoryWalker();
    walker.setMarkers('/home/test', ['/home/test/src/app/.git', '/home/test/link/.git']);
    walker.setMarkers('/opt', ['/opt/tool/.git']);
    const fs = new MockFileSystem();
    fs.setRealpath('/home/test/link/.git', '/home/test/src/app/.git');

    const repos = await discoverRepositories(walker, fs, [
      { root: '/opt', depth: 1 },
      { root: '/home/test', depth: 3 },
    ]);

    expect(repos).toEqual(['/home/test/src/app', '/opt/tool']);
  });
});

describe('repository walk on disk', () => {
  let root = '';

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), 'sysdash-git-')));
    await mkdir(join(root, 'a', '.git', 'refs'), { recursive: true });
    await mkdir(join(root, 'b', 'c', '.git'), { recursive: true });
    await mkdir(join(root, 'd', 'e', 'f', '.git'), { recursive: true });
    await symlink(join(root, 'b'), join(root, 'link'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('stops at the depth limit and follows directory links', async () => {
    const markers = await walkForMarker(root, 3, '.git');

    expect([...markers].sort()).toEqual([
      join(root, 'a', '.git'),
      join(root, 'b', 'c', '.git'),
      join(root, 'link', 'c', '.git'),
    ]);
  });

  it('resolves linked repositories to one entry', async () => {
    const repos = await discoverRepositories(new NodeDirectoryWalker(), new NodeFileSystem(), [{ root, depth: 3 }]);
    expect(repos).toEqual([join(root, 'a'), join(root, 'b', 'c')]);
  });

  it('finds nothing under a missing root', async () => {
    expect(await walkForMarker(join(root, 'missing'), 3, '.git')).toEqual([]);
  });
});

describe('GitProbe', () => {
  const APP = '/home/test/src/app';

  function setup() {
    const walker = new MockDirectoryWalker();
    walker.setMarkers('/home/test', [`${APP}/.git`]);
    const commands = new MockCommandRunner();
    commands.setOutputIn(APP, 'git', STATUS_ARGS, '## main...origin/main\n M x.ts\n');
    const probe = new GitProbe(walker, new MockFileSystem(), commands, [{ root: '/home/test', depth: 3 }], '/home/test', 30_000, 10_000);
    return { walker, commands, probe };
  }

  it('lists repositories with branch and status', async () => {
    const { probe } = setup();
    await probe.refresh(new Date(0));

    const drawable = probe.renderTarget();
    expect(drawable.height).toBe(3);
    expect(tableRows(drawable)).toEqual([
      [`${' '.repeat(18)}~/src/app`, 'main', 'M:1'],
    ]);
  });

  it('keeps per-repository schedules and records across rediscovery', async () => {
    const { walker, commands, probe } = setup();

    await probe.refresh(new Date(0));
    await probe.refresh(new Date(25_000));
    commands.setOutputIn(APP, 'git', STATUS_ARGS, 'fatal: broken');
    await probe.refresh(new Date(31_000));

    expect(walker.walks).toBe(2);
    expect(commands.count('git')).toBe(2);

    await probe.refresh(new Date(36_000));
    expect(commands.count('git')).toBe(3);
    expect(tableRows(probe.renderTarget())).toEqual([
      [`${' '.repeat(18)}~/src/app`, 'main', 'M:1'],
    ]);
  });

  it('drops repositories that disappear', async () => {
    const { walker, probe } = setup();
    await probe.refresh(new Date(0));

    walker.setMarkers('/home/test', []);
    await probe.refresh(new Date(31_000));

    expect(probe.renderTarget().height).toBe(2);
  });
});
