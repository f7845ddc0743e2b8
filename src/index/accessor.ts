import { PackageRef } from "../types.js";
import { Deadline } from "../utils/deadline.js";
import { SecretToken } from "../utils/secret.js";
import { GitIndexAccessor, GitIndexState } from "./git-index.js";
import { SparseIndex, SparseIndexAccessor } from "./sparse-index.js";

/**
 * Answers whether an index currently lists a crate version.
 */
export interface IndexAccessor {
  /**
   * @param pkg - Crate name and exact version.
   * @param token - Registry token, used by indexes that authenticate requests.
   * @param deadline - Bound passed down to every network call.
   * @returns True when the exact version string is listed.
   * @throws RegistryIoError, ParseError or AuthError.
   */
  lookup(pkg: PackageRef, token: SecretToken | undefined, deadline: Deadline): Promise<boolean>;
}

/**
 * Exactly one index model per handle.
 */
export type IndexHandle =
  | { readonly kind: "git"; readonly state: GitIndexState }
  | { readonly kind: "sparse"; readonly state: SparseIndex };

export function gitHandle(state: GitIndexState): IndexHandle {
  return { kind: "git", state };
}

export function sparseHandle(state: SparseIndex): IndexHandle {
  return { kind: "sparse", state };
}

export function openIndexAccessor(handle: IndexHandle): IndexAccessor {
  switch (handle.kind) {
    case "git":
      return new GitIndexAccessor(handle.state);
    case "sparse":
      return new SparseIndexAccessor(handle.state);
  }
}
