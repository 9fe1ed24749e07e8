/**
 * Operation deadlines.
 *
 * One deadline is started when an operation begins and shared by every
 * request it sends (metadata lookups, the request itself, follow-up reads),
 * so the caller's timeout bounds the whole operation.
 *
 * @module client/deadline
 */

import { TimeoutError } from '../errors.js';

export class Deadline {
  private readonly expiresAt: number;

  /**
   * @param timeoutMs - Budget in milliseconds, starting now
   */
  constructor(readonly timeoutMs: number) {
    this.expiresAt = Date.now() + timeoutMs;
  }

  /** Milliseconds left; zero or less once expired */
  remaining(): number {
    return this.expiresAt - Date.now();
  }

  get expired(): boolean {
    return this.remaining() <= 0;
  }

  /**
   * Runs `task` with an abort signal and rejects with TimeoutError when the
   * deadline passes, whether or not the task honours the signal. An expired
   * deadline rejects without starting the task.
   *
   * A task that settles after the deadline is ignored: nothing chained after
   * `run` runs for it.
   */
  async run<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const remaining = this.remaining();
    if (remaining <= 0) {
      throw new TimeoutError(this.timeoutMs);
    }

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(this.timeoutMs);
        controller.abort(error);
        reject(error);
      }, remaining);
    });

    try {
      return await Promise.race([task(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
