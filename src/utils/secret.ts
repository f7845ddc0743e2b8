import { inspect } from "node:util";

const REDACTED = "SecretToken([REDACTED])";

/**
 * Registry token that never prints its value.
 *
 * Invariant: the raw value is only reachable through `expose()`.
 */
export class SecretToken {
  readonly #value: string;

  constructor(value: string) {
    this.#value = value;
  }

  /**
   * Read the raw token. Call only where the header value is built.
   *
   * @returns Raw token string.
   */
  expose(): string {
    return this.#value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}

/**
 * Wrap an optional raw token, treating empty strings as absent.
 *
 * @param raw - Token read from configuration.
 * @returns Secret wrapper or undefined.
 */
export function secretFrom(raw: string | undefined): SecretToken | undefined {
  return raw && raw.length > 0 ? new SecretToken(raw) : undefined;
}
