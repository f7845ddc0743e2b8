import { PublishTimeoutError, RegistryIoError } from "./errors.js";
import { IndexHandle, openIndexAccessor } from "./index/accessor.js";
import { debug, info } from "./logger.js";
import { PackageRef } from "./types.js";
import { Deadline, DeadlineExceeded, sleep, withDeadline } from "./utils/deadline.js";
import { formatDuration } from "./utils/duration.js";
import { SecretToken } from "./utils/secret.js";

export const POLL_INTERVAL_MS = 2000;

export interface WaitOptions {
  /** Bound for the whole polling loop. */
  readonly totalTimeoutMs: number;
  /** Bound for each individual lookup. */
  readonly lookupTimeoutMs: number;
  /** Pause between attempts; 2 seconds unless overridden. */
  readonly pollIntervalMs?: number;
}

/**
 * Check once whether the index lists the package version, bounded by a timeout.
 *
 * The check is not retried here; the polling loop retries and the sparse
 * index already downgrades the protocol once.
 *
 * @param index - Index to query.
 * @param pkg - Crate name and exact version.
 * @param lookupTimeoutMs - Hard bound for this lookup.
 * @param token - Optional registry token.
 * @returns Whether the version is visible.
 * @throws PublishTimeoutError if the lookup does not finish in time.
 */
export async function isPublished(
  index: IndexHandle,
  pkg: PackageRef,
  lookupTimeoutMs: number,
  token?: SecretToken
): Promise<boolean> {
  const deadline = Deadline.after(lookupTimeoutMs);
  const accessor = openIndexAccessor(index);
  try {
    return await withDeadline(accessor.lookup(pkg, token, deadline), deadline);
  } catch (error) {
    if (error instanceof DeadlineExceeded || (error instanceof RegistryIoError && deadline.remainingMs() === 0)) {
      throw PublishTimeoutError.lookup(pkg.name, pkg.version, lookupTimeoutMs);
    }
    throw error;
  }
}

/**
 * Poll the index until the package version is visible or the total timeout elapses.
 *
 * Only an explicit "not published" answer is retried; any other failure aborts
 * the loop. The waiting notice is logged once per call.
 *
 * @param index - Index to query.
 * @param pkg - Crate name and exact version.
 * @param options - Total and per-lookup bounds.
 * @param token - Optional registry token.
 * @throws PublishTimeoutError once the total timeout has elapsed.
 */
export async function waitUntilPublished(
  index: IndexHandle,
  pkg: PackageRef,
  options: WaitOptions,
  token?: SecretToken
): Promise<void> {
  const loop = Deadline.after(options.totalTimeoutMs);
  const pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  let notified = false;
  let attempt = 0;

  for (;;) {
    attempt += 1;
    const published = await isPublished(index, pkg, options.lookupTimeoutMs, token);
    if (published) {
      debug(`${pkg.name} ${pkg.version} visible after ${attempt} attempt(s)`);
      return;
    }
    if (loop.isExpired()) {
      throw PublishTimeoutError.publish(pkg.name, pkg.version, options.totalTimeoutMs);
    }

    if (!notified) {
      info(`waiting for the package ${pkg.name} to be published...`);
      notified = true;
    }

    debug(`${pkg.name} ${pkg.version} not visible yet, next check in ${formatDuration(pollIntervalMs)}`);
    await sleep(pollIntervalMs);
  }
}
