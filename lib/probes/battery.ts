import type { CommandRunner } from '../deps';
import type { Drawable } from '../drawables';
import { percentStyle, stripAnsi } from '../format';
import { BaseProbe } from '../probe';
import { parseBoolean, unsupportedGauge } from './common';

export interface BatteryReading {
  percent: number;
  charging: boolean;
  timeLeft: string;
}

export type BatteryState =
  | { kind: 'pending' }
  | { kind: 'unsupported' }
  | { kind: 'reading'; reading: BatteryReading };

const BATTERY_COMMAND = 'ibam-battery-prompt';

export interface BatteryParseResult {
  reading: BatteryReading | null;
  problems: Array<string>;
}

/**
 * `ibam-battery-prompt -p` prints: line 2 time left, line 3 charging flag,
 * line 5 percent. Anything shorter is unusable.
 */
export function parseBatteryOutput(output: string): BatteryParseResult {
  const lines = output.split('\n');
  if (lines.length < 5) {
    return { reading: null, problems: ['not enough lines'] };
  }

  const problems: Array<string> = [];
  const timeLeft = stripAnsi(lines[1] ?? '').trim();

  const charging = parseBoolean(lines[2] ?? '');
  if (charging === null) problems.push(`bad charging flag '${lines[2] ?? ''}'`);

  const percentRaw = (lines[4] ?? '').trim();
  const percent = /^-?\d+$/.test(percentRaw) ? Number.parseInt(percentRaw, 10) : null;
  if (percent === null) problems.push(`bad percent '${percentRaw}'`);

  return {
    reading: {
      percent: Math.min(100, Math.max(0, percent ?? 0)),
      charging: charging ?? false,
      timeLeft,
    },
    problems,
  };
}

export class BatteryProbe extends BaseProbe<BatteryState> {
  constructor(private readonly commands: CommandRunner, intervalMs: number) {
    super('battery', { kind: 'pending' }, intervalMs);
  }

  protected async sample(_now: Date, previous: BatteryState): Promise<BatteryState | null> {
    if (previous.kind === 'unsupported') return null;

    const result = await this.commands.run(BATTERY_COMMAND, ['-p']);

    if (result.missing) {
      // Decided once; never retried
      this.log.info({ command: BATTERY_COMMAND }, 'Battery command not available, battery unsupported');
      return previous.kind === 'pending' ? { kind: 'unsupported' } : null;
    }

    if (!result.ok) {
      this.log.warn({ command: BATTERY_COMMAND, exitCode: result.exitCode, err: result.err }, 'Battery command failed');
      return null;
    }

    const { reading, problems } = parseBatteryOutput(result.out);
    if (reading === null) {
      this.log.warn({ raw: result.out, problems }, 'Unexpected battery output');
      return null;
    }
    if (problems.length > 0) {
      this.log.warn({ raw: result.out, problems }, 'Partially unreadable battery output');
    }

    return { kind: 'reading', reading };
  }

  protected view(state: BatteryState): Drawable {
    if (state.kind === 'unsupported') return unsupportedGauge('Battery');

    if (state.kind === 'pending') {
      return {
        kind: 'gauge',
        height: 3,
        border: true,
        title: [{ text: 'Battery' }],
        percent: 0,
        label: '...',
        labelAlign: 'right',
        labelStyle: { color: 'white', bold: true },
        barStyle: {},
      };
    }

    const { percent, charging, timeLeft } = state.reading;
    const batteryStyle = percentStyle(percent, 0, 100, false);

    return {
      kind: 'gauge',
      height: 3,
      border: true,
      title: charging
        ? [{ text: 'Battery (charging)', color: 'cyan', bold: true }]
        : [{ text: 'Battery', ...batteryStyle }],
      percent,
      label: `${String(percent)}% (${timeLeft})`,
      labelAlign: 'right',
      labelStyle: { color: 'white', bold: true },
      barStyle: batteryStyle,
    };
  }
}
