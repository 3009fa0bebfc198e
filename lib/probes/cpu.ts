import type { FileSystem } from '../deps';
import type { Drawable, Line } from '../drawables';
import { formatClockLabel, percentStyle } from '../format';
import { BaseProbe, type Size } from '../probe';
import { BoundedSeries, type SeriesPoint } from '../series';
import { parseCpuStat, parseLoadAverage, type CpuTimes, type LoadAverage } from '../sources/proc';

export interface CpuState {
  times: CpuTimes | null;
  /** 0..1, null until two samples exist */
  utilization: number | null;
  load: LoadAverage | null;
  processors: number;
  points: ReadonlyArray<SeriesPoint>;
}

const STAT_FILE = '/proc/stat';
const LOADAVG_FILE = '/proc/loadavg';
const CHART_HEIGHT = 14;
const INITIAL_CAPACITY = 60;

function sumTimes(times: CpuTimes) {
  return times.user + times.nice + times.system + times.idle
    + times.iowait + times.irq + times.softirq + times.steal;
}

/**
 * Utilization between two cumulative samples, clamped to [0, 1].
 * Null without a previous sample or when the counters did not move forward.
 */
export function computeUtilization(previous: CpuTimes | null, current: CpuTimes): number | null {
  if (previous === null) return null;

  const totalDelta = sumTimes(current) - sumTimes(previous);
  if (totalDelta <= 0) return null;

  const idleDelta = (current.idle + current.iowait) - (previous.idle + previous.iowait);
  const utilization = 1 - idleDelta / totalDelta;
  return Math.min(1, Math.max(0, utilization));
}

export function cpuTitle(state: CpuState): Line {
  const utilization = state.utilization === null
    ? { text: 'CPU: --', color: 'white' as const }
    : {
      text: `CPU: ${(state.utilization * 100).toFixed(2)}%`,
      ...percentStyle(state.utilization * 100, 0, 100, true),
    };

  const load5 = state.load === null
    ? { text: '5m Load: --' }
    : {
      text: `5m Load: ${state.load.load5.toFixed(2)}`,
      ...percentStyle(state.load.load5 / state.processors, 0, 1, true),
    };

  return [utilization, { text: ' ─── ' }, load5];
}

/**
 * Utilization plus a chart of the 1-minute load average
 */
export class CpuProbe extends BaseProbe<CpuState> {
  private readonly series = new BoundedSeries(INITIAL_CAPACITY);

  constructor(private readonly fs: FileSystem) {
    super('cpu', { times: null, utilization: null, load: null, processors: 1, points: [] });
  }

  protected async sample(now: Date, previous: CpuState): Promise<CpuState | null> {
    const [statRaw, loadRaw] = await Promise.all([
      this.fs.readFile(STAT_FILE),
      this.fs.readFile(LOADAVG_FILE),
    ]);

    const stat = parseCpuStat(statRaw);
    const load = parseLoadAverage(loadRaw);
    if (stat === null || load === null) {
      this.log.warn({ stat: stat === null, load: load === null }, 'Unexpected /proc content');
      return null;
    }

    this.series.append(formatClockLabel(now), load.load1);

    return {
      times: stat.total,
      utilization: computeUtilization(previous.times, stat.total),
      load,
      processors: stat.processors,
      points: this.series.snapshot(),
    };
  }

  onResize(size: Size) {
    super.onResize(size);
    // Two data points per cell of chart width
    this.series.setCapacity(size.width * 2);
    this.replaceState({ ...this.state, points: this.series.snapshot() });
  }

  protected view(state: CpuState): Drawable {
    const axesStyle = state.load === null
      ? {}
      : percentStyle(state.load.load1 / state.processors, 0, 1, true);

    return {
      kind: 'chart',
      height: CHART_HEIGHT,
      border: true,
      title: cpuTitle(state),
      values: state.points.map(point => point.value),
      labels: state.points.map(point => point.label),
      lineStyle: { color: 'cyan', bold: true },
      axesStyle,
    };
  }
}
