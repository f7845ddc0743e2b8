#!/usr/bin/env node
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { runCargo, cargoBinary } from "./cargo.js";
export type { CmdOutput } from "./cargo.js";
export * from "./errors.js";
export { openIndexAccessor, gitHandle, sparseHandle } from "./index/accessor.js";
export type { IndexAccessor, IndexHandle } from "./index/accessor.js";
export { GitIndexAccessor, GitIndexState, SimpleGitReplica } from "./index/git-index.js";
export type { GitReplica, SimpleGitReplicaOptions } from "./index/git-index.js";
export { SparseIndex, SparseIndexAccessor } from "./index/sparse-index.js";
export { crateIndexPath } from "./index/paths.js";
export { isVersionPresent, parseCrateRecord } from "./index/record.js";
export { fetchSparseMetadata } from "./negotiator.js";
export { isPublished, waitUntilPublished, POLL_INTERVAL_MS } from "./publication.js";
export type { WaitOptions } from "./publication.js";
export { openRegistry } from "./registry.js";
export type { CargoRegistry, OpenRegistryOptions } from "./registry.js";
export { createPackageRef } from "./types.js";
export type { CrateRecord, CrateVersion, PackageRef } from "./types.js";
export { Deadline } from "./utils/deadline.js";
export { SecretToken } from "./utils/secret.js";
