/**
 * Process-wide running flag. Cleared once by the shutdown path; loops check it
 * between cycles and sleep through it so a stop wakes them immediately.
 */
export class RunFlag {
  private isRunning = true;
  private sleepers = new Set<() => void>();

  get running(): boolean {
    return this.isRunning;
  }

  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    for (const wake of this.sleepers) wake();
    this.sleepers.clear();
  }

  /** Resolves after `ms`, or as soon as the flag is stopped. */
  sleep(ms: number): Promise<void> {
    if (!this.isRunning) return Promise.resolve();

    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.sleepers.add(wake);
    });
  }
}
