/**
 * PulseAudio (or PipeWire's pulse server) through the pactl command
 */
import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';

import type { CommandRunner } from '../deps';
import { logger } from '../logger';

export interface SinkStatus {
  volumePercent: number;
  muted: boolean;
}

export interface AudioBackend {
  /** False when no sound server can be reached */
  connect(): Promise<boolean>;
  readSink(): Promise<SinkStatus | null>;
  /** Calls `onChange` whenever the server reports a sink change. Returns an unsubscribe. */
  subscribe(onChange: () => void): () => void;
}

const DEFAULT_SINK = '@DEFAULT_SINK@';
const FULL_VOLUME = 65536;
const SINK_EVENT_REGEX = /^Event '(?:change|new|remove)' on (?:sink|server) /;

const pactlLogger = logger.child({ component: 'pactl' });

/**
 * Raw volume (0..65536 = 100%) to a whole percent, rounding half up
 */
export function rawVolumeToPercent(raw: number) {
  const perMille = Math.floor((raw * 1000) / FULL_VOLUME);
  return Math.floor((perMille + 5) / 10);
}

/**
 * "Volume: front-left: 32768 /  50% / -18.06 dB,   front-right: ..."
 * The first channel's raw value wins.
 */
export function parseSinkVolume(output: string): number | null {
  const match = /:\s*(\d+)\s*\/\s*\d+%/.exec(output);
  if (match?.[1] === undefined) return null;
  return rawVolumeToPercent(Number.parseInt(match[1], 10));
}

export function parseSinkMute(output: string): boolean | null {
  const match = /Mute:\s*(yes|no)/i.exec(output);
  if (match?.[1] === undefined) return null;
  return match[1].toLowerCase() === 'yes';
}

export function isSinkEvent(line: string) {
  return SINK_EVENT_REGEX.test(line);
}

export class PactlAudioBackend implements AudioBackend {
  constructor(private readonly commands: CommandRunner) {}

  async connect(): Promise<boolean> {
    const result = await this.commands.run('pactl', ['info']);
    return result.ok;
  }

  async readSink(): Promise<SinkStatus | null> {
    const [volume, mute] = await Promise.all([
      this.commands.run('pactl', ['get-sink-volume', DEFAULT_SINK]),
      this.commands.run('pactl', ['get-sink-mute', DEFAULT_SINK]),
    ]);

    if (!volume.ok) {
      pactlLogger.warn({ err: volume.err, exitCode: volume.exitCode }, 'Failed to read sink volume');
      return null;
    }

    const volumePercent = parseSinkVolume(volume.out);
    if (volumePercent === null) {
      pactlLogger.warn({ raw: volume.out }, 'Unexpected sink volume output');
      return null;
    }

    return {
      volumePercent,
      muted: mute.ok ? parseSinkMute(mute.out) ?? false : false,
    };
  }

  subscribe(onChange: () => void) {
    const child = spawn('pactl', ['subscribe'], { stdio: ['ignore', 'pipe', 'ignore'] });
    const lines = createInterface({ input: child.stdout });

    lines.on('line', (line) => {
      if (isSinkEvent(line)) onChange();
    });

    child.on('error', (error) => {
      pactlLogger.error({ err: error }, 'pactl subscribe failed');
    });

    child.on('exit', (code, signal) => {
      pactlLogger.debug({ code, signal }, 'pactl subscribe exited');
    });

    return () => {
      lines.close();
      child.kill();
    };
  }
}
