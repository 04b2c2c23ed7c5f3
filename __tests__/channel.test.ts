import { describe, it, expect } from 'vitest';
import { BoundedChannel, pump } from '../src/relay/channel.js';
import { fromArray } from './helpers/fake-provider.js';

async function collect<T>(channel: BoundedChannel<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of channel) items.push(item);
  return items;
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('BoundedChannel', () => {
  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedChannel(0)).toThrow(RangeError);
    expect(() => new BoundedChannel(1.5)).toThrow(RangeError);
  });

  it('delivers items in order, then completes after close', async () => {
    const channel = new BoundedChannel<string>(2);
    expect(await channel.send('a')).toBe(true);
    expect(await channel.send('b')).toBe(true);
    channel.close();
    expect(await collect(channel)).toEqual(['a', 'b']);
  });

  it('holds senders while the buffer is full', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);

    let sent = false;
    const pending = channel.send(2).then((ok) => {
      sent = ok;
    });
    await tick();
    expect(sent).toBe(false);
    expect(channel.size).toBe(1);

    expect(await channel.receive()).toEqual({ value: 1, done: false });
    await pending;
    expect(sent).toBe(true);
    expect(await channel.receive()).toEqual({ value: 2, done: false });
  });

  it('hands items straight to a waiting receiver', async () => {
    const channel = new BoundedChannel<string>(1);
    const next = channel.receive();
    await channel.send('direct');
    expect(await next).toEqual({ value: 'direct', done: false });
    expect(channel.size).toBe(0);
  });

  it('delivers buffered items before a failure', async () => {
    const channel = new BoundedChannel<number>(4);
    await channel.send(1);
    channel.fail(new Error('upstream broke'));
    expect(await channel.receive()).toEqual({ value: 1, done: false });
    await expect(channel.receive()).rejects.toThrow('upstream broke');
  });

  it('drops buffered items on cancel and refuses new ones', async () => {
    const channel = new BoundedChannel<number>(4);
    await channel.send(1);
    channel.cancel();
    expect(channel.isClosed).toBe(true);
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
    expect(await channel.send(2)).toBe(false);
  });

  it('releases a blocked sender on cancel', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);
    channel.cancel();
    expect(await blocked).toBe(false);
  });

  it('completes a waiting receiver on close', async () => {
    const channel = new BoundedChannel<number>();
    const next = channel.receive();
    channel.close();
    expect(await next).toEqual({ value: undefined, done: true });
  });
});

describe('pump', () => {
  it('moves every item and closes the channel', async () => {
    const channel = new BoundedChannel<number>(2);
    const done = pump(fromArray([1, 2, 3]), channel, new AbortController().signal);
    expect(await collect(channel)).toEqual([1, 2, 3]);
    await done;
    expect(channel.isClosed).toBe(true);
  });

  it('forwards a source failure after the items before it', async () => {
    async function* failing(): AsyncGenerator<number> {
      yield 1;
      throw new Error('upstream broke');
    }
    const channel = new BoundedChannel<number>(2);
    await pump(failing(), channel, new AbortController().signal);

    const seen: number[] = [];
    await expect(
      (async () => {
        for await (const item of channel) seen.push(item);
      })()
    ).rejects.toThrow('upstream broke');
    expect(seen).toEqual([1]);
  });

  it('releases the source once aborted', async () => {
    let released = false;
    async function* endless(): AsyncGenerator<number> {
      try {
        for (let i = 0; ; i++) yield i;
      } finally {
        released = true;
      }
    }

    const controller = new AbortController();
    const channel = new BoundedChannel<number>(1);
    const done = pump(endless(), channel, controller.signal);

    expect(await channel.receive()).toEqual({ value: 0, done: false });
    controller.abort();
    channel.cancel();
    await done;
    expect(released).toBe(true);
  });
});
