import { hostname, userInfo } from 'node:os';

import type { CommandRunner } from '../deps';
import type { Drawable } from '../drawables';
import { BaseProbe, type Size } from '../probe';

export interface HeaderState {
  title: string | null;
}

export interface HostIdentity {
  user(): string;
  host(): string;
}

export const osIdentity: HostIdentity = {
  user() {
    try {
      return userInfo().username;
    } catch {
      return 'unknown';
    }
  },
  host() {
    return hostname();
  },
};

/**
 * The frame around the dashboard, labelled with user and host
 */
export class HeaderProbe extends BaseProbe<HeaderState> {
  constructor(private readonly commands: CommandRunner, private readonly identity: HostIdentity = osIdentity) {
    super('header', { title: null });
  }

  protected async sample(_now: Date, previous: HeaderState): Promise<HeaderState | null> {
    // Identity does not change while we run
    if (previous.title !== null) return null;

    const user = this.identity.user();
    const host = this.identity.host();
    const pretty = await this.commands.run('pretty-hostname', []);
    const prettyName = pretty.ok ? pretty.out.trim() : '';

    const title = prettyName.length > 0
      ? `${user} @ ${prettyName} (${host})`
      : `${user} @ ${host}`;

    return { title };
  }

  protected view(state: HeaderState, size: Size): Drawable {
    return {
      kind: 'text',
      height: size.height,
      border: true,
      borderColor: { color: 'cyan', bold: true },
      title: [{ text: state.title ?? '', color: 'cyan', bold: true }],
      lines: [],
    };
  }
}
