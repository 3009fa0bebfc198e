import { describe, it, expect } from 'vitest';
import { StartupError } from '../errors';
import { ProbeRegistry } from '../registry';
import { ScriptedProbe } from './mocks';

describe('ProbeRegistry', () => {
  it('keeps registration order', () => {
    const journal: Array<string> = [];
    const registry = new ProbeRegistry()
      .register(new ScriptedProbe('b', journal))
      .register(new ScriptedProbe('a', journal));

    expect(registry.names()).toEqual(['b', 'a']);
    expect(registry.get('a')?.name).toBe('a');
    expect(registry.has('c')).toBe(false);
  });

  it('refuses duplicate names', () => {
    const registry = new ProbeRegistry().register(new ScriptedProbe('cpu'));
    expect(() => registry.register(new ScriptedProbe('cpu'))).toThrow(StartupError);
  });

  it('refreshes sequentially and survives a probe that throws', async () => {
    const journal: Array<string> = [];
    const broken = new ScriptedProbe('broken', journal);
    broken.failRefresh = true;
    const registry = new ProbeRegistry()
      .register(new ScriptedProbe('first', journal))
      .register(broken)
      .register(new ScriptedProbe('last', journal));

    await registry.refreshAll(new Date(0));

    expect(journal).toEqual(['refresh:first', 'refresh:broken', 'refresh:last']);
  });

  it('resizes every probe with its own size and disposes them all', () => {
    const first = new ScriptedProbe('first');
    const second = new ScriptedProbe('second');
    const registry = new ProbeRegistry().register(first).register(second);

    registry.resizeAll(name => ({ width: name.length, height: 10 }));
    registry.dispose();

    expect(first.sizes).toEqual([{ width: 5, height: 10 }]);
    expect(second.sizes).toEqual([{ width: 6, height: 10 }]);
    expect(first.disposed && second.disposed).toBe(true);
  });
});
