import { jest, describe, it, expect } from '@jest/globals';
import type { Subscription } from '@agri-telemetry/domain';

import { SubscriberList } from '../subscriber-list.js';
import { mockLogger } from '../../../__tests__/support.js';

describe('SubscriberList', () => {
  it('delivers to every listener in order', () => {
    const list = new SubscriberList<number>('data', mockLogger());
    const seen: string[] = [];
    list.add((n) => seen.push(`a${n}`));
    list.add((n) => seen.push(`b${n}`));
    list.emit(1);
    expect(seen).toEqual(['a1', 'b1']);
  });

  it('unsubscribe stops delivery', () => {
    const list = new SubscriberList<number>('data', mockLogger());
    const listener = jest.fn();
    const sub = list.add(listener);
    sub.unsubscribe();
    list.emit(1);
    expect(listener).not.toHaveBeenCalled();
  });

  it('gives each subscription its own id', () => {
    const list = new SubscriberList<number>('data', mockLogger());
    expect(list.add(() => undefined).id).not.toBe(list.add(() => undefined).id);
  });

  it('isolates a failing listener', () => {
    const logger = mockLogger();
    const list = new SubscriberList<number>('alert', logger);
    const failure = new Error('render failed');
    const bad = list.add(() => {
      throw failure;
    });
    const good = jest.fn();
    list.add(good);

    list.emit(7);
    expect(good).toHaveBeenCalledWith(7);
    expect(logger.error).toHaveBeenCalledWith(`alert subscriber ${bad.id} failed`, failure);
  });

  it('lets a listener unsubscribe while being notified', () => {
    const list = new SubscriberList<number>('status', mockLogger());
    const later = jest.fn();
    const sub: Subscription = list.add(() => sub.unsubscribe());
    list.add(later);
    list.emit(1);
    list.emit(2);
    expect(later).toHaveBeenCalledTimes(2);
  });

  it('stops delivering once the active check fails', () => {
    const list = new SubscriberList<number>('data', mockLogger());
    let open = true;
    const later = jest.fn();
    list.add(() => {
      open = false;
    });
    list.add(later);
    list.emit(1, { active: () => open });
    expect(later).not.toHaveBeenCalled();
  });

  it('hands each listener its own copy', () => {
    const list = new SubscriberList<{ value: number }>('data', mockLogger());
    const seen: number[] = [];
    list.add((payload) => {
      payload.value = 0;
    });
    list.add((payload) => seen.push(payload.value));
    const original = { value: 42 };
    list.emit(original, { copy: (payload) => ({ ...payload }) });
    expect(seen).toEqual([42]);
    expect(original.value).toBe(42);
  });
});
