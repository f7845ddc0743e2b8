const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000
};

/**
 * Parse a human duration such as `30m`, `5s`, `250ms` or `2h`.
 * A bare number is read as seconds.
 *
 * @param input - Duration text.
 * @returns Duration in milliseconds.
 * @throws Error if the text is not a non-negative duration.
 */
export function parseDuration(input: string): number {
  const match = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/.exec(input.trim());
  if (!match) {
    throw new Error(`Invalid duration: "${input}" (expected e.g. 30m, 5s, 250ms)`);
  }
  const amount = Number.parseFloat(match[1]);
  const unit = match[2] ?? "s";
  return Math.round(amount * UNIT_MS[unit]);
}

/**
 * Render milliseconds the way durations appear in user-facing messages.
 *
 * @param ms - Duration in milliseconds.
 * @returns `5s`, `1.5s` or `250ms`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${ms / 1000}s`;
}
