/**
 * One callback slot per concern.  Subscribing replaces whatever was in
 * the slot (last writer wins); unsubscribing only clears the slot when the
 * caller still owns it, so a stale cleanup from an unmounted component
 * cannot remove the subscriber that replaced it.
 */
export class SubscriberRegistry<M extends Record<keyof M, (payload: never) => void>> {
  private slots: Partial<M> = {};

  constructor(private readonly onReplace?: (concern: keyof M) => void) {}

  subscribe<K extends keyof M>(concern: K, callback: M[K]): void {
    const previous = this.slots[concern];
    if (previous !== undefined && previous !== callback) {
      this.onReplace?.(concern);
    }
    this.slots[concern] = callback;
  }

  unsubscribe<K extends keyof M>(concern: K, callback: M[K]): boolean {
    if (this.slots[concern] !== callback) {
      return false;
    }
    delete this.slots[concern];
    return true;
  }

  get<K extends keyof M>(concern: K): M[K] | undefined {
    return this.slots[concern];
  }

  has(concern: keyof M): boolean {
    return this.slots[concern] !== undefined;
  }

  clear(): void {
    this.slots = {};
  }
}
