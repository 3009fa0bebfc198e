import { describe, it, expect, vi } from 'vitest';
import { StartupError } from '../errors';
import { parseKeyBinding } from '../keys';
import { LayoutManager } from '../layout';
import { ProbeRegistry } from '../registry';
import { Scheduler } from '../scheduler';
import { FakeTerminal, ManualTickSource, ScriptedProbe } from './mocks';

function setup() {
  const journal: Array<string> = [];
  const probes = {
    chrome: new ScriptedProbe('chrome', journal),
    left: new ScriptedProbe('left', journal),
    right: new ScriptedProbe('right', journal),
  };
  const registry = new ProbeRegistry().register(probes.chrome).register(probes.left).register(probes.right);
  const layout = new LayoutManager({
    chrome: 'chrome',
    rows: [{ columns: [{ span: 6, probes: ['left'] }, { span: 6, probes: ['right'] }] }],
  }, registry);
  const terminal = new FakeTerminal({ width: 42, height: 20 }, journal);
  const ticks = new ManualTickSource();
  const scheduler = new Scheduler({
    registry,
    layout,
    terminal,
    ticks,
    quitKeys: [parseKeyBinding('q'), parseKeyBinding('C-c')],
    clock: () => new Date(1_000),
  });
  return { journal, probes, terminal, ticks, scheduler };
}

async function untilRunning(scheduler: Scheduler) {
  await vi.waitFor(() => {
    expect(scheduler.currentPhase).toBe('running');
  });
}

describe('Scheduler', () => {
  it('initializes in order and exits cleanly on a quit key', async () => {
    const { journal, terminal, ticks, probes, scheduler } = setup();

    const running = scheduler.run();
    await untilRunning(scheduler);
    terminal.press('q');

    expect(await running).toBe(0);
    expect(journal).toEqual([
      'open',
      'refresh:chrome', 'refresh:left', 'refresh:right',
      'resize:chrome', 'resize:left', 'resize:right',
      'draw',
      'close',
    ]);
    expect(probes.left.refreshes).toEqual([new Date(1_000)]);
    expect(probes.left.sizes).toEqual([{ width: 20, height: 20 }]);
    expect(ticks.started).toBe(true);
    expect(ticks.stopped).toBe(true);
    expect(probes.right.disposed).toBe(true);
    expect(scheduler.currentPhase).toBe('stopped');
  });

  it('handles a resize that arrives during the first refresh', async () => {
    const { journal, terminal, probes, scheduler } = setup();

    const running = scheduler.run();
    terminal.resize({ width: 62, height: 30 });
    await vi.waitFor(() => {
      expect(terminal.frames).toHaveLength(2);
    });
    terminal.press('q');

    expect(await running).toBe(0);
    expect(journal).toEqual([
      'open',
      'refresh:chrome', 'refresh:left', 'refresh:right',
      'resize:chrome', 'resize:left', 'resize:right',
      'draw',
      'resize:chrome', 'resize:left', 'resize:right',
      'draw',
      'close',
    ]);
    expect(probes.right.sizes).toEqual([{ width: 30, height: 30 }, { width: 30, height: 30 }]);
  });

  it('resizes every probe before drawing the resized frame', async () => {
    const { journal, terminal, probes, scheduler } = setup();

    const running = scheduler.run();
    await untilRunning(scheduler);
    journal.length = 0;

    terminal.resize({ width: 62, height: 30 });
    await vi.waitFor(() => {
      expect(terminal.frames).toHaveLength(2);
    });
    terminal.press('c', { ctrl: true });

    expect(await running).toBe(0);
    expect(journal).toEqual(['resize:chrome', 'resize:left', 'resize:right', 'draw', 'close']);
    expect(probes.right.sizes.at(-1)).toEqual({ width: 30, height: 30 });
    expect(terminal.frames[1]?.size).toEqual({ width: 62, height: 30 });
  });

  it('refreshes on ticks and only draws frames that changed', async () => {
    const { terminal, ticks, probes, scheduler } = setup();

    const running = scheduler.run();
    await untilRunning(scheduler);

    ticks.tick(new Date(6_000));
    await vi.waitFor(() => {
      expect(probes.right.refreshes).toHaveLength(2);
    });
    expect(probes.right.refreshes.at(-1)).toEqual(new Date(6_000));
    expect(scheduler.stats.ticks).toBe(1);
    expect(terminal.frames).toHaveLength(1);

    probes.left.text = 'updated';
    ticks.tick(new Date(11_000));
    await vi.waitFor(() => {
      expect(terminal.frames).toHaveLength(2);
    });

    scheduler.requestQuit('SIGTERM');
    expect(await running).toBe(0);
  });

  it('keeps running when a probe throws', async () => {
    const { terminal, ticks, probes, scheduler } = setup();
    probes.left.failRefresh = true;

    const running = scheduler.run();
    await untilRunning(scheduler);
    ticks.tick(new Date(6_000));
    await vi.waitFor(() => {
      expect(probes.right.refreshes).toHaveLength(2);
    });

    expect(scheduler.currentPhase).toBe('running');
    terminal.press('q');
    expect(await running).toBe(0);
  });

  it('coalesces ticks that are still queued', () => {
    const { scheduler } = setup();

    scheduler.dispatch({ type: 'tick', at: new Date(0) });
    scheduler.dispatch({ type: 'tick', at: new Date(5_000) });
    scheduler.dispatch({ type: 'resize', size: { width: 10, height: 10 } });
    scheduler.dispatch({ type: 'tick', at: new Date(10_000) });

    expect(scheduler.stats.pendingEvents).toBe(2);
  });

  it('ignores keys that are not quit bindings', async () => {
    const { terminal, scheduler } = setup();

    const running = scheduler.run();
    await untilRunning(scheduler);
    terminal.press('x');
    terminal.press('c');
    expect(scheduler.stats.pendingEvents).toBe(0);

    terminal.press('q');
    expect(await running).toBe(0);
  });

  it('fails startup when the terminal cannot be acquired', async () => {
    const { terminal, ticks, scheduler } = setup();
    terminal.failOpen = new Error('not a tty');

    await expect(scheduler.run()).rejects.toBeInstanceOf(StartupError);
    expect(ticks.started).toBe(false);
  });

  it('refuses to run twice', async () => {
    const { terminal, scheduler } = setup();

    const running = scheduler.run();
    await untilRunning(scheduler);
    await expect(scheduler.run()).rejects.toThrow('already running');

    terminal.press('q');
    expect(await running).toBe(0);
  });
});
