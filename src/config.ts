import * as dotenv from "dotenv";
import { parseDuration } from "./utils/duration.js";
import { secretFrom } from "./utils/secret.js";

dotenv.config();

/**
 * Default sparse index of crates.io.
 */
export const CRATES_IO_INDEX = "sparse+https://index.crates.io/";

/**
 * Registry selection. `NAME` undefined means crates.io.
 *
 * Invariant: `TOKEN` is only ever read through `SecretToken.expose()`.
 */
export const REGISTRY = {
  INDEX: process.env.CPW_INDEX ?? CRATES_IO_INDEX,
  NAME: process.env.CPW_REGISTRY_NAME || undefined,
  GIT_INDEX_DIR: process.env.CPW_GIT_INDEX_DIR || undefined,
  GIT_BRANCH: process.env.CPW_GIT_BRANCH ?? "master",
  TOKEN: secretFrom(process.env.CPW_REGISTRY_TOKEN)
} as const;

/**
 * Time bounds for lookups and the polling loop, in milliseconds.
 */
export const TIMEOUTS = {
  PUBLISH: parseDuration(process.env.CPW_PUBLISH_TIMEOUT ?? "30m"),
  LOOKUP: parseDuration(process.env.CPW_LOOKUP_TIMEOUT ?? "60s")
} as const;

/**
 * Parse a positive integer setting, falling back when it is unset or not a positive number.
 */
export function positiveInteger(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw ?? "", 10);
  return Number.isNaN(value) || value < 1 ? fallback : value;
}

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY` is a positive integer.
 */
export const NET = {
  CONCURRENCY: positiveInteger(process.env.CPW_HTTP_CONCURRENCY, 6),
  USER_AGENT: "crate-publish-watch/1.0.0"
} as const;
