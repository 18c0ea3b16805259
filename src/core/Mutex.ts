/**
 * Mutex - single-permit lock serializing access to engine state
 */

export class Mutex {
  private locked = false;
  private waiting: Array<() => void> = [];

  /**
   * Acquire the lock (waits while another holder has it)
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    // Ownership is handed over directly by release()
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Release the lock, handing it to the next waiter in FIFO order
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    if (!this.locked) {
      throw new Error('Mutex.release() called while unlocked');
    }
    this.locked = false;
  }

  /**
   * Execute a function while holding the lock (auto-release)
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Get current status
   */
  getStatus(): { locked: boolean; waiting: number } {
    return {
      locked: this.locked,
      waiting: this.waiting.length,
    };
  }
}
