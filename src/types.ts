import semver from "semver";

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Crate identity being checked.
 *
 * @property name - Crate name as published.
 * @property version - Canonical semantic version string.
 *
 * Invariant: created once by the caller and never mutated.
 */
export interface PackageRef {
  readonly name: string;
  readonly version: string;
}

/**
 * Build an immutable package reference.
 *
 * @param name - Crate name.
 * @param version - Canonical semantic version (`1.2.3`, `1.0.0-rc.1`, `1.0.0+build.5`).
 * @returns Frozen reference.
 * @throws Error if the name is empty or the version is not canonical.
 */
export function createPackageRef(name: string, version: string): PackageRef {
  if (name.trim().length === 0 || name !== name.trim()) {
    throw new Error(`Invalid crate name: "${name}"`);
  }
  if (version !== version.trim() || !/^\d/.test(version) || semver.parse(version) === null) {
    throw new Error(`Invalid version for ${name}: "${version}" is not a semantic version`);
  }
  return Object.freeze({ name, version });
}

/**
 * One line of an index file.
 *
 * @property version - The `vers` field, compared by exact string equality.
 * @property yanked - Whether the version was yanked; yanked versions remain published.
 * @property checksum - The `cksum` field when present.
 */
export interface CrateVersion {
  readonly version: string;
  readonly yanked: boolean;
  readonly checksum?: string;
}

/**
 * The registry's view of a crate: its published versions in index order.
 */
export interface CrateRecord {
  readonly name: string;
  readonly versions: readonly CrateVersion[];
}

/**
 * Transport-neutral HTTP response handed to the index response parser.
 */
export interface TransportResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Buffer;
}

/**
 * Transport-neutral GET request built by the sparse index.
 */
export interface IndexRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

export type HttpVersion = "2" | "1.1";
