import * as os from "node:os";
import * as path from "node:path";
import { gitHandle, IndexHandle, sparseHandle } from "./index/accessor.js";
import { GitIndexState, SimpleGitReplica } from "./index/git-index.js";
import { SparseIndex } from "./index/sparse-index.js";
import { Deadline } from "./utils/deadline.js";
import { sha256 } from "./utils/hashing.js";

/**
 * A Cargo registry and its index. `name` undefined means crates.io.
 */
export interface CargoRegistry {
  readonly name?: string;
  readonly index: IndexHandle;
}

export interface OpenRegistryOptions {
  readonly indexUrl: string;
  readonly name?: string;
  readonly gitIndexDir?: string;
  readonly gitBranch: string;
  readonly deadline: Deadline;
}

/**
 * Default checkout directory of a git index, keyed by its remote URL.
 *
 * @param remote - Remote origin of the index.
 */
export function defaultGitIndexDir(remote: string): string {
  return path.join(os.homedir(), ".cache", "crate-publish-watch", "git", sha256(remote).slice(0, 16));
}

export function isSparseIndexUrl(indexUrl: string): boolean {
  return indexUrl.startsWith("sparse+");
}

/**
 * Resolve an index URL into a registry handle. `sparse+` URLs select the HTTP
 * index; any other URL is a git remote replicated on disk.
 *
 * @param options - Index URL, registry name and git replica settings.
 * @returns Registry with exactly one index model.
 */
export async function openRegistry(options: OpenRegistryOptions): Promise<CargoRegistry> {
  if (isSparseIndexUrl(options.indexUrl)) {
    return { name: options.name, index: sparseHandle(new SparseIndex(options.indexUrl)) };
  }
  const replica = await SimpleGitReplica.open(
    {
      location: options.gitIndexDir ?? defaultGitIndexDir(options.indexUrl),
      remote: options.indexUrl,
      branch: options.gitBranch
    },
    options.deadline
  );
  return { name: options.name, index: gitHandle(new GitIndexState(replica)) };
}
