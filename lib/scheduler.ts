/**
 * Dashboard driver: one event channel, one consumer.
 *
 * Ticks, resizes and quit requests are delivered serially, so no two refresh
 * or resize calls ever overlap each other or a render.
 */
import { EventChannel } from './channel';
import { StartupError } from './errors';
import { matchesBinding, type KeyBinding, type KeyPress } from './keys';
import type { Geometry, LayoutManager } from './layout';
import { logger } from './logger';
import type { Size } from './probe';
import type { ProbeRegistry } from './registry';
import { RenderPass } from './render';
import type { Terminal } from './terminal';
import type { TickSource } from './ticker';

export type DashboardEvent =
  | { type: 'tick'; at: Date }
  | { type: 'resize'; size: Size }
  | { type: 'quit'; reason: string };

export type SchedulerPhase = 'idle' | 'initializing' | 'running' | 'terminating' | 'stopped';

export interface SchedulerOptions {
  registry: ProbeRegistry;
  layout: LayoutManager;
  terminal: Terminal;
  ticks: TickSource;
  quitKeys: ReadonlyArray<KeyBinding>;
  clock?: () => Date;
}

const schedulerLogger = logger.child({ component: 'scheduler' });

function assertNever(value: never): never {
  throw new Error(`Unhandled dashboard event: ${JSON.stringify(value)}`);
}

export class Scheduler {
  private phase: SchedulerPhase = 'idle';
  private readonly events = new EventChannel<DashboardEvent>();
  private readonly renderPass: RenderPass;
  private readonly clock: () => Date;
  private geometry: Geometry | null = null;
  private ticksHandled = 0;

  constructor(private readonly options: SchedulerOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.renderPass = new RenderPass(options.registry, options.layout, options.terminal);
  }

  get currentPhase() {
    return this.phase;
  }

  get stats() {
    return {
      ticks: this.ticksHandled,
      frames: this.renderPass.framesDrawn,
      pendingEvents: this.events.pending,
    };
  }

  /**
   * Queue an event. A tick is dropped while another tick is still waiting,
   * so a slow refresh pass cannot build a backlog.
   */
  dispatch(event: DashboardEvent) {
    if (this.phase === 'terminating' || this.phase === 'stopped') return;
    if (event.type === 'tick' && this.events.has(queued => queued.type === 'tick')) {
      schedulerLogger.debug('Tick still queued, dropping');
      return;
    }
    this.events.send(event);
  }

  requestQuit(reason: string) {
    this.dispatch({ type: 'quit', reason });
  }

  /**
   * Initialize, loop until quit, release the terminal. Resolves with the exit status.
   */
  async run() {
    if (this.phase !== 'idle') {
      throw new Error(`Scheduler already ${this.phase}`);
    }

    await this.initialize();

    try {
      while (this.currentPhase === 'running') {
        const event = await this.events.receive();
        await this.handle(event);
      }
    } catch (error) {
      schedulerLogger.error({ err: error }, 'Event loop failed');
      this.terminate();
      throw error;
    }

    return this.terminate() ? 0 : 1;
  }

  private async initialize() {
    const { registry, layout, terminal, ticks } = this.options;
    this.phase = 'initializing';

    try {
      terminal.open();
    } catch (error) {
      if (error instanceof StartupError) throw error;
      throw new StartupError('Failed to acquire the terminal', { cause: error });
    }

    // Resizes during the first refresh are queued and handled once running
    terminal.onResize((size) => {
      this.dispatch({ type: 'resize', size });
    });

    // Every probe's first refresh is unconditional: no schedule has a stamp yet
    await registry.refreshAll(this.clock());
    this.applyResize(terminal.size());
    this.draw(true);

    terminal.onKey((key) => {
      this.onKey(key);
    });
    ticks.start((at) => {
      this.dispatch({ type: 'tick', at });
    });

    this.phase = 'running';
    schedulerLogger.info({ probes: registry.names() }, 'Dashboard running');
  }

  private onKey(key: KeyPress) {
    const binding = this.options.quitKeys.find(candidate => matchesBinding(candidate, key));
    if (binding !== undefined) {
      this.requestQuit(`key ${binding.source}`);
    }
  }

  private async handle(event: DashboardEvent) {
    switch (event.type) {
      case 'tick':
        this.ticksHandled++;
        await this.options.registry.refreshAll(event.at);
        this.draw(false);
        return;
      case 'resize':
        this.applyResize(event.size);
        this.draw(true);
        return;
      case 'quit':
        schedulerLogger.info({ reason: event.reason }, 'Quit requested');
        this.phase = 'terminating';
        return;
      default:
        assertNever(event);
    }
  }

  /**
   * Recompute geometry and let every probe adapt before anything is drawn.
   */
  private applyResize(size: Size) {
    const { registry, layout } = this.options;
    const geometry = layout.compute(size);
    registry.resizeAll(name => layout.sizeFor(name, geometry));
    this.geometry = geometry;
  }

  private draw(force: boolean) {
    if (this.geometry === null) return;
    this.renderPass.render(this.geometry, { force });
  }

  private terminate() {
    const { registry, terminal, ticks } = this.options;
    this.phase = 'terminating';
    ticks.stop();
    registry.dispose();
    let released = true;
    try {
      terminal.close();
    } catch (error) {
      released = false;
      schedulerLogger.error({ err: error }, 'Failed to release the terminal');
    }
    this.phase = 'stopped';
    schedulerLogger.info({ ticks: this.ticksHandled, frames: this.renderPass.framesDrawn }, 'Dashboard stopped');
    return released;
  }
}
