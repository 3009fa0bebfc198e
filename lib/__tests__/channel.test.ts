import { describe, it, expect } from 'vitest';
import { EventChannel } from '../channel';

describe('EventChannel', () => {
  it('delivers queued events in order', async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);

    expect(channel.pending).toBe(2);
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
    expect(channel.pending).toBe(0);
  });

  it('wakes a waiting receiver', async () => {
    const channel = new EventChannel<string>();
    const received = channel.receive();
    channel.send('tick');

    expect(await received).toBe('tick');
    expect(channel.pending).toBe(0);
  });

  it('allows a single waiting receiver', async () => {
    const channel = new EventChannel<string>();
    void channel.receive();
    await expect(channel.receive()).rejects.toThrow('single receiver');
  });

  it('answers queued-event queries', () => {
    const channel = new EventChannel<{ type: string }>();
    channel.send({ type: 'resize' });
    expect(channel.has(event => event.type === 'resize')).toBe(true);
    expect(channel.has(event => event.type === 'tick')).toBe(false);
  });
});
