import { describe, expect, it, vi } from 'vitest';

import { SubscriberRegistry } from './SubscriberRegistry';

interface Slots {
  price: (value: number) => void;
  status: (value: string) => void;
}

describe('SubscriberRegistry', () => {
  it('replaces the previous subscriber (last writer wins)', () => {
    const onReplace = vi.fn();
    const registry = new SubscriberRegistry<Slots>(onReplace);
    const first = vi.fn();
    const second = vi.fn();

    registry.subscribe('price', first);
    registry.subscribe('price', second);
    registry.get('price')?.(42);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith(42);
    expect(onReplace).toHaveBeenCalledTimes(1);
    expect(onReplace).toHaveBeenCalledWith('price');
  });

  it('re-subscribing the same callback is not a replacement', () => {
    const onReplace = vi.fn();
    const registry = new SubscriberRegistry<Slots>(onReplace);
    const callback = vi.fn();

    registry.subscribe('price', callback);
    registry.subscribe('price', callback);

    expect(onReplace).not.toHaveBeenCalled();
  });

  it('a stale unsubscribe leaves the current subscriber intact', () => {
    const registry = new SubscriberRegistry<Slots>();
    const stale = vi.fn();
    const current = vi.fn();

    registry.subscribe('price', stale);
    registry.subscribe('price', current);

    expect(registry.unsubscribe('price', stale)).toBe(false);
    expect(registry.get('price')).toBe(current);

    expect(registry.unsubscribe('price', current)).toBe(true);
    expect(registry.get('price')).toBeUndefined();
  });

  it('slots are independent per concern and clear empties all of them', () => {
    const registry = new SubscriberRegistry<Slots>();
    registry.subscribe('price', vi.fn());
    registry.subscribe('status', vi.fn());

    expect(registry.has('price')).toBe(true);
    expect(registry.has('status')).toBe(true);

    registry.clear();
    expect(registry.has('price')).toBe(false);
    expect(registry.has('status')).toBe(false);
  });
});
