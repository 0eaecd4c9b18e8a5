/**
 * AtomicRef - single owned reference updated through pure functions
 *
 * Updates run synchronously, so no other task can observe a half-applied
 * change between the read and the write.
 */
export class AtomicRef<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  set(next: T): void {
    this.value = next;
  }

  update(fn: (current: T) => T): T {
    this.value = fn(this.value);
    return this.value;
  }

  /**
   * Compute a result and the next state together; throwing leaves the state untouched
   */
  modify<R>(fn: (current: T) => readonly [R, T]): R {
    const [result, next] = fn(this.value);
    this.value = next;
    return result;
  }
}
