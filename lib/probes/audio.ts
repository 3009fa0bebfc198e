import type { Drawable } from '../drawables';
import { BaseProbe } from '../probe';
import type { AudioBackend, SinkStatus } from '../sources/pactl';
import { unsupportedGauge } from './common';

export type AudioState =
  | { kind: 'pending' }
  | { kind: 'unsupported' }
  | { kind: 'sink'; sink: SinkStatus };

/**
 * Default sink volume and mute state.
 *
 * Besides the scheduled refresh, the sound server pushes change
 * notifications; those replace the sink record in one assignment and wait
 * for the next render pass to be drawn.
 */
export class AudioProbe extends BaseProbe<AudioState> {
  private unsubscribe: (() => void) | null = null;
  private disposed = false;
  // Bumped by every push; a read that saw it change is stale
  private pushes = 0;

  constructor(private readonly backend: AudioBackend) {
    super('audio', { kind: 'pending' });
  }

  protected async sample(_now: Date, previous: AudioState): Promise<AudioState | null> {
    if (previous.kind === 'unsupported') return null;

    if (previous.kind === 'pending') {
      const connected = await this.backend.connect();
      if (!connected) {
        this.log.info('No sound server, audio unsupported');
        return { kind: 'unsupported' };
      }
      this.listen();
    }

    const seen = this.pushes;
    const sink = await this.backend.readSink();
    if (sink === null || this.pushes !== seen) return null;
    return { kind: 'sink', sink };
  }

  private listen() {
    if (this.unsubscribe !== null || this.disposed) return;
    this.unsubscribe = this.backend.subscribe(() => {
      void this.onPush();
    });
  }

  private async onPush() {
    if (this.disposed || this.state.kind === 'unsupported') return;
    const push = ++this.pushes;
    try {
      const sink = await this.backend.readSink();
      if (sink !== null && !this.disposed && this.pushes === push) {
        this.replaceState({ kind: 'sink', sink });
      }
    } catch (error) {
      this.log.warn({ err: error }, 'Failed to handle audio change notification');
    }
  }

  dispose() {
    this.disposed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  protected view(state: AudioState): Drawable {
    if (state.kind === 'unsupported') return unsupportedGauge('Audio');

    const sink = state.kind === 'sink' ? state.sink : { volumePercent: 0, muted: false };

    return {
      kind: 'gauge',
      height: 3,
      border: true,
      title: [{ text: sink.muted ? 'Audio (muted)' : 'Audio' }],
      percent: Math.min(100, sink.volumePercent),
      label: `${String(sink.volumePercent)}%`,
      labelAlign: 'right',
      labelStyle: { color: 'white', bold: true },
      barStyle: { color: sink.muted ? 'red' : 'green' },
    };
  }
}
