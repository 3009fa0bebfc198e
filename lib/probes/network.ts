import type { NetworkSource } from '../deps';
import type { Drawable } from '../drawables';
import { rightJustify } from '../format';
import { BaseProbe } from '../probe';

export interface InterfaceAddress {
  name: string;
  address: string;
}

export interface NetworkState {
  addresses: ReadonlyArray<InterfaceAddress>;
}

const LOOPBACK = 'lo';

/**
 * Addresses of every non-loopback interface
 */
export class NetworkProbe extends BaseProbe<NetworkState> {
  constructor(private readonly network: NetworkSource) {
    super('network', { addresses: [] });
  }

  protected sample(): Promise<NetworkState> {
    const addresses: Array<InterfaceAddress> = [];

    for (const [name, infos] of Object.entries(this.network.interfaces())) {
      if (name === LOOPBACK || infos === undefined) continue;
      for (const info of infos) {
        addresses.push({ name, address: info.address });
      }
    }

    return Promise.resolve({ addresses });
  }

  protected view(state: NetworkState): Drawable {
    return {
      kind: 'list',
      height: 2 + state.addresses.length,
      border: true,
      title: [{ text: 'Network' }],
      paddingLeft: 0,
      items: state.addresses.map(entry => [
        { text: rightJustify(10, entry.name), color: 'cyan' },
        { text: ': ' },
        { text: rightJustify(15, entry.address), color: 'blue', bold: true },
      ]),
    };
  }
}
