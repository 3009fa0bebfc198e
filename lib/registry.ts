import { describeError, StartupError } from './errors';
import { logger } from './logger';
import type { Probe, Size } from './probe';

const registryLogger = logger.child({ component: 'registry' });

/**
 * Ordered, explicitly owned collection of probes. Registration order is the
 * refresh and resize order.
 */
export class ProbeRegistry {
  private readonly probes: Array<Probe> = [];
  private readonly byName = new Map<string, Probe>();

  register(probe: Probe) {
    if (this.byName.has(probe.name)) {
      throw new StartupError(`Probe '${probe.name}' registered twice`);
    }
    this.probes.push(probe);
    this.byName.set(probe.name, probe);
    return this;
  }

  get(name: string) {
    return this.byName.get(name);
  }

  has(name: string) {
    return this.byName.has(name);
  }

  list(): ReadonlyArray<Probe> {
    return this.probes;
  }

  names() {
    return this.probes.map(probe => probe.name);
  }

  /**
   * Refresh every probe, one at a time, in registration order.
   */
  async refreshAll(now: Date) {
    for (const probe of this.probes) {
      try {
        await probe.refresh(now);
      } catch (error) {
        registryLogger.error({ err: error, probe: probe.name, detail: describeError(error) }, 'Probe refresh escaped its probe');
      }
    }
  }

  resizeAll(sizeFor: (name: string) => Size) {
    for (const probe of this.probes) {
      try {
        probe.onResize(sizeFor(probe.name));
      } catch (error) {
        registryLogger.error({ err: error, probe: probe.name }, 'Probe resize failed');
      }
    }
  }

  dispose() {
    for (const probe of this.probes) {
      try {
        probe.dispose?.();
      } catch (error) {
        registryLogger.warn({ err: error, probe: probe.name }, 'Probe dispose failed');
      }
    }
  }
}
