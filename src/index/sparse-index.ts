import { AuthError, RegistryIoError } from "../errors.js";
import { debug } from "../logger.js";
import { CrateRecord, IndexRequest, PackageRef, TransportResponse } from "../types.js";
import { Deadline } from "../utils/deadline.js";
import { SecretToken } from "../utils/secret.js";
import { fetchSparseMetadata } from "../negotiator.js";
import type { IndexAccessor } from "./accessor.js";
import { crateIndexPath } from "./paths.js";
import { isVersionPresent, parseCrateRecord } from "./record.js";

const SPARSE_PREFIX = "sparse+";

const ABSENT_STATUSES = new Set([404, 410, 451]);

interface CachedCrate {
  readonly record: CrateRecord;
  readonly etag?: string;
  readonly lastModified?: string;
}

/**
 * Stateless description of a sparse HTTP index plus a read-through cache of
 * the last record seen per crate.
 */
export class SparseIndex {
  readonly baseUrl: string;
  private readonly cache = new Map<string, CachedCrate>();

  /**
   * @param indexUrl - Index URL, with or without the `sparse+` prefix.
   */
  constructor(indexUrl: string) {
    const url = indexUrl.startsWith(SPARSE_PREFIX) ? indexUrl.slice(SPARSE_PREFIX.length) : indexUrl;
    const parsed = new URL(url);
    if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
      throw new Error(`Unsupported sparse index URL: ${indexUrl}`);
    }
    this.baseUrl = url.endsWith("/") ? url : `${url}/`;
  }

  /**
   * Build the conditional metadata request for one crate.
   *
   * @param crateName - Crate to fetch.
   * @returns Request carrying cache validators when a previous response is cached.
   */
  makeCacheRequest(crateName: string): IndexRequest {
    const headers: Record<string, string> = {
      "cargo-protocol": "version=1",
      accept: "text/plain",
      "accept-encoding": "gzip"
    };
    const cached = this.cache.get(crateName);
    if (cached?.etag) {
      headers["if-none-match"] = cached.etag;
    } else if (cached?.lastModified) {
      headers["if-modified-since"] = cached.lastModified;
    }
    return { url: `${this.baseUrl}${crateIndexPath(crateName)}`, headers };
  }

  /**
   * Interpret a metadata response.
   *
   * @param crateName - Crate the response belongs to.
   * @param response - Transport-neutral response.
   * @returns The crate record, or undefined when the registry does not know the crate.
   * @throws ParseError for undecodable bodies, AuthError for 401/403, RegistryIoError for
   *   redirects, 5xx and statuses outside 100-599.
   */
  parseCacheResponse(crateName: string, response: TransportResponse): CrateRecord | undefined {
    const { status } = response;
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      throw new RegistryIoError(`Registry answered an invalid HTTP status ${status} for ${crateName}`, {
        package: crateName,
        registry: this.baseUrl
      });
    }
    if (status >= 200 && status < 300) {
      const record = parseCrateRecord(crateName, response.body);
      this.cache.set(crateName, {
        record,
        etag: response.headers.etag,
        lastModified: response.headers["last-modified"]
      });
      return record;
    }
    if (status === 304) {
      const cached = this.cache.get(crateName);
      if (!cached) {
        throw new RegistryIoError(`Registry answered 304 for ${crateName} without a cached entry`, {
          package: crateName,
          registry: this.baseUrl
        });
      }
      debug(`Index entry for ${crateName} not modified`);
      return cached.record;
    }
    if (status >= 300 && status < 400) {
      const target = response.headers.location ?? "an unknown location";
      throw new RegistryIoError(`Registry redirected ${crateName} with HTTP ${status} to ${target}`, {
        package: crateName,
        registry: this.baseUrl
      });
    }
    if (status === 401 || status === 403) {
      throw new AuthError(`Registry rejected credentials (HTTP ${status}) for ${crateName}`, {
        package: crateName,
        registry: this.baseUrl
      });
    }
    if (status >= 500) {
      throw new RegistryIoError(`Registry answered HTTP ${status} for ${crateName}`, {
        package: crateName,
        registry: this.baseUrl
      });
    }
    if (!ABSENT_STATUSES.has(status)) {
      debug(`Treating HTTP ${status} for ${crateName} as not found`);
    }
    this.cache.delete(crateName);
    return undefined;
  }
}

export class SparseIndexAccessor implements IndexAccessor {
  constructor(private readonly index: SparseIndex) {}

  async lookup(pkg: PackageRef, token: SecretToken | undefined, deadline: Deadline): Promise<boolean> {
    const record = await fetchSparseMetadata(this.index, pkg.name, token, deadline);
    return isVersionPresent(record, pkg.version);
  }
}
