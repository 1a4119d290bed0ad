/**
 * Per-key count of `acquire` calls blocked on a token. A non-blocking
 * `check` refuses while any are counted, so it cannot take a token ahead of
 * them.
 */
export class WaitingAcquirers {
  private readonly counts = new Map<string, number>();

  has(key: string): boolean {
    return (this.counts.get(key) ?? 0) > 0;
  }

  /** Counts one waiter on `key`; the returned function uncounts it once. */
  enter(key: string): () => void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);

    let left = false;
    return () => {
      if (left) {
        return;
      }
      left = true;
      const remaining = (this.counts.get(key) ?? 1) - 1;
      if (remaining > 0) {
        this.counts.set(key, remaining);
      } else {
        this.counts.delete(key);
      }
    };
  }
}
