import { performance } from "node:perf_hooks";

/**
 * Fixed point on the monotonic clock by which an operation must finish.
 *
 * Invariant: `startedAt` is captured once; wall-clock changes never move it.
 */
export class Deadline {
  readonly startedAt: number;
  readonly durationMs: number;

  private constructor(startedAt: number, durationMs: number) {
    this.startedAt = startedAt;
    this.durationMs = durationMs;
  }

  static after(durationMs: number): Deadline {
    return new Deadline(performance.now(), durationMs);
  }

  elapsedMs(): number {
    return performance.now() - this.startedAt;
  }

  remainingMs(): number {
    return Math.max(0, this.durationMs - this.elapsedMs());
  }

  isExpired(): boolean {
    return this.elapsedMs() > this.durationMs;
  }
}

export class DeadlineExceeded extends Error {
  constructor(durationMs: number) {
    super(`deadline of ${durationMs}ms exceeded`);
    this.name = "DeadlineExceeded";
  }
}

/**
 * Settle with `operation` or reject with `DeadlineExceeded`, whichever comes first.
 * The losing operation is abandoned, not cancelled.
 *
 * @param operation - Pending work bounded by the deadline.
 * @param deadline - Bound shared with the I/O inside `operation`.
 */
export function withDeadline<T>(operation: Promise<T>, deadline: Deadline): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceeded(deadline.durationMs)), deadline.remainingMs());
  });
  return Promise.race([operation, expiry]).finally(() => {
    clearTimeout(timer);
  });
}

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}
