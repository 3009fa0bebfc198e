import type { CommandRunner, FileSystem } from '../deps';
import type { Drawable, Line, Style } from '../drawables';
import { formatTimestamp, formatUptime } from '../format';
import { BaseProbe } from '../probe';
import { parseUptime } from '../sources/proc';
import { UNSUPPORTED_LABEL, UNSUPPORTED_STYLE } from './common';

export type KerberosStatus =
  | { kind: 'ticket'; timeLeft: string | null }
  | { kind: 'none' }
  | { kind: 'unsupported' };

export interface HostInfoState {
  time: string;
  uptimeSeconds: number | null;
  kerberos: KerberosStatus | null;
}

const UPTIME_FILE = '/proc/uptime';

export function kerberosLabel(status: KerberosStatus | null): { text: string; style: Style } {
  if (status === null) return { text: '...', style: { color: 'white' } };
  switch (status.kind) {
    case 'ticket':
      return {
        text: status.timeLeft !== null ? `OK (${status.timeLeft})` : 'OK',
        style: { color: 'green', bold: true },
      };
    case 'none':
      return { text: 'NO TICKET', style: { color: 'red', bold: true } };
    case 'unsupported':
      return { text: UNSUPPORTED_LABEL, style: UNSUPPORTED_STYLE };
  }
}

function item(label: string, dots: string, value: string, style: Style): Line {
  return [
    { text: label, color: 'cyan' },
    { text: `${dots} ` },
    { text: value, ...style },
  ];
}

/**
 * Clock, uptime and Kerberos ticket state. Refreshes every tick.
 */
export class HostInfoProbe extends BaseProbe<HostInfoState> {
  constructor(private readonly fs: FileSystem, private readonly commands: CommandRunner) {
    super('host-info', { time: '', uptimeSeconds: null, kerberos: null });
  }

  protected async sample(now: Date, previous: HostInfoState): Promise<HostInfoState> {
    const [uptimeSeconds, kerberos] = await Promise.all([
      this.readUptime(previous.uptimeSeconds),
      this.readKerberos(previous.kerberos),
    ]);

    return {
      time: formatTimestamp(now),
      uptimeSeconds,
      kerberos,
    };
  }

  private async readUptime(previous: number | null) {
    try {
      const raw = await this.fs.readFile(UPTIME_FILE);
      const seconds = parseUptime(raw);
      if (seconds === null) {
        this.log.warn({ raw }, 'Unexpected uptime format');
        return previous;
      }
      return seconds;
    } catch (error) {
      this.log.warn({ err: error, file: UPTIME_FILE }, 'Failed to read uptime');
      return previous;
    }
  }

  private async readKerberos(previous: KerberosStatus | null): Promise<KerberosStatus> {
    if (previous?.kind === 'unsupported') return previous;

    const check = await this.commands.run('klist', ['-s']);
    if (check.missing) {
      this.log.info('klist not available, Kerberos status unsupported');
      return { kind: 'unsupported' };
    }
    if (check.exitCode !== 0) {
      return { kind: 'none' };
    }

    const left = await this.commands.run('kleft', []);
    let timeLeft: string | null = null;
    if (left.ok) {
      const parts = left.out.split(' ');
      const candidate = parts[1]?.trim();
      if (candidate !== undefined && candidate.length > 0) {
        timeLeft = candidate;
      }
    }
    return { kind: 'ticket', timeLeft };
  }

  protected view(state: HostInfoState): Drawable {
    const kerberos = kerberosLabel(state.kerberos);
    const uptime = state.uptimeSeconds !== null ? formatUptime(state.uptimeSeconds) : '?';

    return {
      kind: 'list',
      height: 5,
      border: true,
      borderColor: { color: 'blue', bold: true },
      paddingLeft: 2,
      items: [
        item('Time', '.......', state.time, { color: 'magenta' }),
        item('Uptime', '.....', uptime, { color: 'green' }),
        item('Kerberos', '...', kerberos.text, kerberos.style),
      ],
    };
  }
}
