/**
 * Serializes async critical sections. Callers queue in arrival order and a
 * failing section does not block the ones behind it.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(section: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(section);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending--;
  }
}
