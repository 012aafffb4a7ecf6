/// <reference types="jest" />
import { SerialQueue } from '../../src/utils/serial-queue';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('SerialQueue', () => {
  it('runs tasks one after another in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run(task('a')), queue.run(task('b'))]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('keeps going after a rejected task', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('reports pending tasks', async () => {
    const queue = new SerialQueue();
    const pending = [queue.run(tick), queue.run(tick)];
    expect(queue.size).toBe(2);
    await Promise.all(pending);
    await tick();
    expect(queue.size).toBe(0);
  });
});
