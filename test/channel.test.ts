import { describe, expect, it } from 'vitest';
import { Channel, ChannelClosedError } from '../src/worker/channel.js';
import { Semaphore } from '../src/worker/semaphore.js';

describe('Channel', () => {
  it('delivers values in order', async () => {
    const channel = new Channel<number>(4);
    channel.trySend(1);
    channel.trySend(2);
    await channel.send(3);

    expect(await channel.receive()).toBe(1);
    expect(channel.drain()).toEqual([2, 3]);
    expect(channel.tryReceive()).toBeUndefined();
  });

  it('refuses trySend when full and parks send until there is room', async () => {
    const channel = new Channel<string>(1);
    expect(channel.trySend('a')).toBe(true);
    expect(channel.trySend('b')).toBe(false);

    let sent = false;
    const pending = channel.send('c').then(() => {
      sent = true;
    });
    await Promise.resolve();
    expect(sent).toBe(false);

    expect(channel.tryReceive()).toBe('a');
    await pending;
    expect(sent).toBe(true);
    expect(channel.tryReceive()).toBe('c');
  });

  it('hands a value straight to a waiting receiver', async () => {
    const channel = new Channel<string>(1);
    const received = channel.receive();
    channel.trySend('x');
    expect(await received).toBe('x');
    expect(channel.size).toBe(0);
  });

  it('lets buffered values out after close, then ends', async () => {
    const channel = new Channel<number>(2);
    channel.trySend(1);
    channel.close();

    const seen: number[] = [];
    for await (const value of channel) seen.push(value);

    expect(seen).toEqual([1]);
    expect(channel.closed).toBe(true);
    expect(() => channel.trySend(2)).toThrow(ChannelClosedError);
  });

  it('wakes waiting receivers and rejects blocked senders on close', async () => {
    const waiting = new Channel<number>(1);
    const received = waiting.receive();
    waiting.close();
    expect(await received).toBeUndefined();

    const full = new Channel<number>(1);
    full.trySend(1);
    const blocked = full.send(2);
    full.close();
    await expect(blocked).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new Channel<number>(0)).toThrow(RangeError);
  });
});

describe('Semaphore', () => {
  it('never lets more than the limit run at once', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(task)));

    expect(peak).toBe(2);
    expect(semaphore.inFlight).toBe(0);
  });

  it('releases its permit when the task throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(semaphore.run(() => Promise.resolve('ok'))).resolves.toBe('ok');
  });
});
