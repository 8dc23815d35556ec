import { LifecycleEventBus } from '../../src/services/lifecycle/LifecycleEventBus.js';
import { makeSource } from '../utils/fixtures.js';

describe('LifecycleEventBus', () => {
  it('runs handlers one after another in registration order', async () => {
    const bus = new LifecycleEventBus();
    const calls: string[] = [];
    bus.on('source:after-create', async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
      calls.push('first');
    });
    bus.on('source:after-create', async ({ source }) => {
      calls.push(`second:${source.id}`);
    });

    await bus.emit('source:after-create', { source: makeSource({ id: 9 }) });

    expect(calls).toEqual(['first', 'second:9']);
  });

  it('stops at a failing handler and rejects the emit', async () => {
    const bus = new LifecycleEventBus();
    const calls: string[] = [];
    bus.on('source:after-delete', async () => {
      throw new Error('rule failed');
    });
    bus.on('source:after-delete', async () => {
      calls.push('after');
    });

    await expect(bus.emit('source:after-delete', { source: makeSource() })).rejects.toThrow('rule failed');
    expect(calls).toEqual([]);
  });

  it('keeps handlers of different events apart', () => {
    const bus = new LifecycleEventBus();
    bus.on('media:after-create', async () => undefined);

    expect(bus.listenerCount('media:after-create')).toBe(1);
    expect(bus.listenerCount('media:after-update')).toBe(0);
  });
});
