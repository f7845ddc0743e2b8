import fs from "fs-extra";
import * as path from "node:path";
import { ResetMode, simpleGit, SimpleGit } from "simple-git";
import { getErrorMessage, RegistryIoError } from "../errors.js";
import { debug, info } from "../logger.js";
import { PackageRef } from "../types.js";
import { Deadline } from "../utils/deadline.js";
import { SecretToken } from "../utils/secret.js";
import type { IndexAccessor } from "./accessor.js";
import { crateIndexPath } from "./paths.js";
import { isVersionPresent, parseCrateRecord } from "./record.js";

/**
 * Local copy of a git index that can be brought up to date with its origin.
 */
export interface GitReplica {
  readonly location: string;
  readCrateFile(crateName: string): Promise<Uint8Array | undefined>;
  refresh(deadline: Deadline): Promise<void>;
}

export interface SimpleGitReplicaOptions {
  readonly location: string;
  readonly remote: string;
  readonly branch: string;
}

/**
 * Git replica backed by a working-tree checkout driven through simple-git.
 */
export class SimpleGitReplica implements GitReplica {
  readonly location: string;
  readonly remote: string;
  readonly branch: string;

  constructor(options: SimpleGitReplicaOptions) {
    this.location = options.location;
    this.remote = options.remote;
    this.branch = options.branch;
  }

  /**
   * Open the replica, cloning the remote first when the directory is absent.
   *
   * @param options - Checkout location, remote URL and branch.
   * @param deadline - Bound for the initial clone.
   */
  static async open(options: SimpleGitReplicaOptions, deadline: Deadline): Promise<SimpleGitReplica> {
    const replica = new SimpleGitReplica(options);
    if (!(await fs.pathExists(path.join(options.location, ".git")))) {
      info(`Cloning index ${options.remote} into ${options.location}`);
      await fs.ensureDir(path.dirname(options.location));
      await simpleGit({ timeout: { block: blockTimeout(deadline) } }).clone(options.remote, options.location, [
        "--branch",
        options.branch,
        "--single-branch"
      ]);
    }
    return replica;
  }

  async readCrateFile(crateName: string): Promise<Uint8Array | undefined> {
    const file = path.join(this.location, crateIndexPath(crateName));
    if (!(await fs.pathExists(file))) {
      return undefined;
    }
    return fs.readFile(file);
  }

  async refresh(deadline: Deadline): Promise<void> {
    const git: SimpleGit = simpleGit({ baseDir: this.location, timeout: { block: blockTimeout(deadline) } });
    await git.fetch(this.remote, this.branch);
    await git.reset(ResetMode.HARD, ["FETCH_HEAD"]);
    debug(`Index ${this.location} reset to ${this.remote} ${this.branch}`);
  }
}

function blockTimeout(deadline: Deadline): number {
  return Math.max(1, Math.ceil(deadline.remainingMs()));
}

/**
 * Mutable state of a git index: the replica plus its refresh gate.
 *
 * Invariant: at most one refresh of the replica runs at a time; concurrent
 * callers await the refresh already in flight.
 */
export class GitIndexState {
  private inFlight: Promise<void> | undefined;

  constructor(readonly replica: GitReplica) {}

  refresh(deadline: Deadline): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.replica.refresh(deadline).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }
}

export class GitIndexAccessor implements IndexAccessor {
  constructor(private readonly state: GitIndexState) {}

  /**
   * Check the local replica, refreshing it once when the version is missing.
   *
   * @throws RegistryIoError if the refresh cannot complete.
   */
  async lookup(pkg: PackageRef, _token: SecretToken | undefined, deadline: Deadline): Promise<boolean> {
    if (await this.isInReplica(pkg)) {
      return true;
    }

    try {
      await this.state.refresh(deadline);
    } catch (error) {
      throw new RegistryIoError(
        `failed to update git index: ${getErrorMessage(error)}`,
        { package: pkg.name, version: pkg.version, registry: this.state.replica.location },
        error
      );
    }

    return this.isInReplica(pkg);
  }

  private async isInReplica(pkg: PackageRef): Promise<boolean> {
    const body = await this.state.replica.readCrateFile(pkg.name);
    if (body === undefined) {
      return false;
    }
    return isVersionPresent(parseCrateRecord(pkg.name, body), pkg.version);
  }
}
