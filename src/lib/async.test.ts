/**
 * Tests for the timeout helper and the async queue
 */

import { describe, it, expect } from 'vitest';
import { AsyncQueue, withTimeout } from './async';
import { TimeoutError } from './errors';

describe('withTimeout', () => {
  it('should pass through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve('ready'), 50, 'Lookup')).resolves.toBe('ready');
  });

  it('should reject with a TimeoutError when the work is too slow', async () => {
    const slow = new Promise<string>(resolve => setTimeout(() => resolve('late'), 200));

    const attempt = withTimeout(slow, 10, 'Lookup');

    await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
    await expect(attempt).rejects.toThrow('Lookup timed out after 10ms');
  });

  it('should pass through the error of failing work', async () => {
    await expect(withTimeout(Promise.reject(new Error('broken')), 50, 'Lookup')).rejects.toThrow('broken');
  });
});

describe('AsyncQueue', () => {
  it('should hand out items in push order', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.empty()).toBe(false);
    await expect(queue.next()).resolves.toBe(1);
    await expect(queue.next()).resolves.toBe(2);
    expect(queue.empty()).toBe(true);
  });

  it('should wake a waiting reader on push', async () => {
    const queue = new AsyncQueue<string>();

    const waiting = queue.next();
    queue.push('event');

    await expect(waiting).resolves.toBe('event');
  });
});
