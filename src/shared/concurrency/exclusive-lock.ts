/**
 * FIFO mutual exclusion for async critical sections.
 *
 * Each caller waits for the previous holder to settle before its own section
 * runs, so sections never interleave across `await` points. A section that
 * throws releases the lock and rejects only its own caller.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await section();
    } finally {
      release();
    }
  }
}
