import { describe, expect, it } from 'vitest';

import { LatestFrameQueue } from '../stream/latest-frame-queue';

describe('LatestFrameQueue', () => {
  it('hands over only the newest of several pushes', () => {
    const queue = new LatestFrameQueue<string>();

    expect(queue.push('F1')).toBe(false);
    expect(queue.push('F2')).toBe(true);
    expect(queue.push('F3')).toBe(true);

    expect(queue.pullLatest()).toEqual({ fresh: true, item: 'F3' });
    expect(queue.dropped).toBe(2);
    expect(queue.delivered).toBe(1);
    expect(queue.pushed).toBe(3);
  });

  it('reports nothing fresh on an empty slot', () => {
    const queue = new LatestFrameQueue<number>();

    expect(queue.pullLatest()).toEqual({ fresh: false });
    queue.push(1);
    queue.pullLatest();
    expect(queue.pullLatest()).toEqual({ fresh: false });
    expect(queue.pending).toBe(false);
  });

  it('does not count delivered items as dropped', () => {
    const queue = new LatestFrameQueue<number>();

    queue.push(1);
    queue.pullLatest();
    queue.push(2);
    queue.pullLatest();

    expect(queue.dropped).toBe(0);
    expect(queue.delivered).toBe(2);
  });

  it('counts a cleared pending item as dropped', () => {
    const queue = new LatestFrameQueue<number>();

    queue.push(1);
    queue.clear();

    expect(queue.pending).toBe(false);
    expect(queue.dropped).toBe(1);
    expect(queue.pullLatest()).toEqual({ fresh: false });
  });
});
