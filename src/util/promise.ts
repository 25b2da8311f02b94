/**
 * A signal that can be waited on and triggered.
 * Every waiter that started before the signal fires is released by it;
 * the signal then re-arms itself for the next round of waiters.
 */
export class Signal {
  private resolveCurrent: () => void = () => { };
  private current: Promise<void> = this.arm();

  /**
   * Resets the signal to its initial state.
   */
  public reset(): void {
    this.current = this.arm();
  }

  /**
   * Releases all current waiters and re-arms.
   */
  public signal(): void {
    const resolve = this.resolveCurrent;
    this.reset();
    resolve();
  }

  /**
   * Waits for the signal to be triggered, or for the timeout to elapse.
   * Resolves to true if the signal fired.
   */
  public wait(timeoutMs: number): Promise<boolean> {
    const signalled = this.current;
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void signalled.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private arm(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.resolveCurrent = resolve;
    });
  }
}
