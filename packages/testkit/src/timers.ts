/**
 * Deterministic time for poller and wait tests
 */

/**
 * Clock whose `sleep` advances time instantly and records each delay
 */
export class FakeClock {
  #now: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.#now = start;
  }

  readonly now = (): number => this.#now;

  readonly sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      throw signal.reason;
    }
    this.sleeps.push(ms);
    this.#now += ms;
  };

  advance(ms: number): void {
    this.#now += ms;
  }
}
