import { describe, it, expect } from 'vitest';
import { AudioProbe } from '../probes/audio';
import { isSinkEvent, parseSinkMute, parseSinkVolume, rawVolumeToPercent } from '../sources/pactl';
import { flushPromises, MockAudioBackend } from './mocks';

describe('pactl parsing', () => {
  it('converts raw volume to a rounded percent', () => {
    expect(rawVolumeToPercent(65536)).toBe(100);
    expect(rawVolumeToPercent(32768)).toBe(50);
    expect(rawVolumeToPercent(655)).toBe(1);
    expect(rawVolumeToPercent(0)).toBe(0);
  });

  it('reads the first channel volume', () => {
    const output = 'Volume: front-left: 32768 /  50% / -18.06 dB,   front-right: 19661 /  30% / -31.37 dB\n        balance -0.40\n';
    expect(parseSinkVolume(output)).toBe(50);
    expect(parseSinkVolume('Connection failure')).toBeNull();
  });

  it('reads the mute flag', () => {
    expect(parseSinkMute('Mute: yes\n')).toBe(true);
    expect(parseSinkMute('Mute: no\n')).toBe(false);
    expect(parseSinkMute('')).toBeNull();
  });

  it('recognises sink change events', () => {
    expect(isSinkEvent('Event \'change\' on sink #56')).toBe(true);
    expect(isSinkEvent('Event \'change\' on server #-1')).toBe(true);
    expect(isSinkEvent('Event \'new\' on client #812')).toBe(false);
  });
});

describe('AudioProbe', () => {
  it('latches unsupported without a sound server', async () => {
    const backend = new MockAudioBackend();
    backend.available = false;
    const probe = new AudioProbe(backend);

    await probe.refresh(new Date(0));
    backend.available = true;
    await probe.refresh(new Date(5_000));

    expect(probe.state).toEqual({ kind: 'unsupported' });
    expect(probe.renderTarget()).toMatchObject({ label: 'UNSUPPORTED' });
    expect(backend.subscriptions).toBe(0);
  });

  it('subscribes once and draws the sink volume', async () => {
    const backend = new MockAudioBackend();
    const probe = new AudioProbe(backend);

    await probe.refresh(new Date(0));
    await probe.refresh(new Date(5_000));

    expect(backend.subscriptions).toBe(1);
    expect(probe.renderTarget()).toMatchObject({ percent: 50, label: '50%', barStyle: { color: 'green' } });
  });

  it('replaces the sink record on change notifications', async () => {
    const backend = new MockAudioBackend();
    const probe = new AudioProbe(backend);
    await probe.refresh(new Date(0));

    backend.sink = { volumePercent: 80, muted: true };
    backend.emitChange();
    await flushPromises();

    expect(probe.state).toEqual({ kind: 'sink', sink: { volumePercent: 80, muted: true } });
    expect(probe.renderTarget()).toMatchObject({ label: '80%', barStyle: { color: 'red' } });
  });

  it('does not let a slow scheduled read overwrite a newer notification', async () => {
    const backend = new MockAudioBackend();
    const probe = new AudioProbe(backend);
    await probe.refresh(new Date(0));

    const release = backend.holdNextRead();
    const tick = probe.refresh(new Date(5_000));
    await flushPromises();

    backend.sink = { volumePercent: 80, muted: true };
    backend.emitChange();
    await flushPromises();
    expect(probe.state).toEqual({ kind: 'sink', sink: { volumePercent: 80, muted: true } });

    release();
    await tick;

    expect(probe.state).toEqual({ kind: 'sink', sink: { volumePercent: 80, muted: true } });
  });

  it('keeps the previous record when the sink cannot be read', async () => {
    const backend = new MockAudioBackend();
    const probe = new AudioProbe(backend);
    await probe.refresh(new Date(0));

    backend.sink = null;
    await probe.refresh(new Date(5_000));
    backend.emitChange();
    await flushPromises();

    expect(probe.state).toEqual({ kind: 'sink', sink: { volumePercent: 50, muted: false } });
  });

  it('releases the subscription on dispose', async () => {
    const backend = new MockAudioBackend();
    const probe = new AudioProbe(backend);
    await probe.refresh(new Date(0));

    probe.dispose();
    backend.sink = { volumePercent: 10, muted: false };
    backend.emitChange();
    await flushPromises();

    expect(backend.unsubscribed).toBe(1);
    expect(probe.state).toEqual({ kind: 'sink', sink: { volumePercent: 50, muted: false } });
  });
});
