import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../src/utils/channel.js';
import { collect } from './helpers.js';

describe('BoundedChannel', () => {
  it('delivers values in order and ends when closed', async () => {
    const channel = new BoundedChannel<string>(4);
    await channel.send('a');
    await channel.send('b');
    channel.close();

    expect(await collect(channel)).toEqual(['a', 'b']);
  });

  it('suspends the producer while the buffer is full', async () => {
    const channel = new BoundedChannel<string>(1);
    expect(await channel.send('a')).toBe(true);

    let settled = false;
    const pending = channel.send('b').then(result => {
      settled = true;
      return result;
    });
    await Promise.resolve();
    expect(settled).toBe(false);

    expect(await channel.receive()).toEqual({ value: 'a', done: false });
    expect(await pending).toBe(true);
    expect(await channel.receive()).toEqual({ value: 'b', done: false });
  });

  it('delivers buffered values before surfacing a producer error', async () => {
    const channel = new BoundedChannel<string>(4);
    await channel.send('partial');
    channel.close(new Error('upstream failed'));

    expect(await channel.receive()).toEqual({ value: 'partial', done: false });
    await expect(channel.receive()).rejects.toThrow('upstream failed');
  });

  it('releases a blocked producer and aborts the signal on cancel', async () => {
    const channel = new BoundedChannel<string>(1);
    await channel.send('a');
    const pending = channel.send('b');

    channel.cancel();

    expect(await pending).toBe(false);
    expect(channel.signal.aborted).toBe(true);
    expect(await channel.send('c')).toBe(false);
  });

  it('cancels when the consumer leaves the loop early', async () => {
    const channel = new BoundedChannel<number>(4);
    await channel.send(1);
    await channel.send(2);

    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }

    expect(channel.isCancelled).toBe(true);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new BoundedChannel(0)).toThrow(RangeError);
  });
});
