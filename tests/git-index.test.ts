import fs from "fs-extra";
import * as os from "node:os";
import * as path from "node:path";
import { simpleGit } from "simple-git";
import { afterEach, describe, expect, it, vi } from "vitest";
import { RegistryIoError } from "../src/errors.js";
import { GitIndexAccessor, GitIndexState, SimpleGitReplica } from "../src/index/git-index.js";
import { createPackageRef } from "../src/types.js";
import { Deadline } from "../src/utils/deadline.js";
import { FakeReplica, indexLine } from "./fake-replica.js";

const pkg = createPackageRef("demo-crate", "2.1.0");

describe("GitIndexAccessor", () => {
  it("answers from the local replica without refreshing", async () => {
    const replica = new FakeReplica();
    replica.local.set("demo-crate", indexLine("demo-crate", "2.1.0"));

    const present = await new GitIndexAccessor(new GitIndexState(replica)).lookup(pkg, undefined, Deadline.after(1000));

    expect(present).toBe(true);
    expect(replica.refreshCalls).toBe(0);
  });

  it("refreshes and finds a version the origin already has", async () => {
    const replica = new FakeReplica();
    replica.local.set("demo-crate", indexLine("demo-crate", "2.0.0"));
    replica.remote.set("demo-crate", indexLine("demo-crate", "2.0.0") + indexLine("demo-crate", "2.1.0"));

    const present = await new GitIndexAccessor(new GitIndexState(replica)).lookup(pkg, undefined, Deadline.after(1000));

    expect(present).toBe(true);
    expect(replica.refreshCalls).toBe(1);
  });

  it("keeps answering false while the origin lacks the version", async () => {
    const replica = new FakeReplica();
    const accessor = new GitIndexAccessor(new GitIndexState(replica));

    expect(await accessor.lookup(pkg, undefined, Deadline.after(1000))).toBe(false);
    expect(await accessor.lookup(pkg, undefined, Deadline.after(1000))).toBe(false);
    expect(replica.refreshCalls).toBe(2);
  });

  it("wraps refresh failures", async () => {
    const replica = new FakeReplica();
    replica.refreshFailure = new Error("remote unreachable");

    const failure = new GitIndexAccessor(new GitIndexState(replica)).lookup(pkg, undefined, Deadline.after(1000));

    await expect(failure).rejects.toBeInstanceOf(RegistryIoError);
    await expect(failure).rejects.toThrow("failed to update git index: remote unreachable");
  });

  it("runs one refresh for concurrent lookups sharing a replica", async () => {
    const replica = new FakeReplica();
    replica.refreshDelayMs = 20;
    replica.remote.set("demo-crate", indexLine("demo-crate", "2.1.0"));
    const state = new GitIndexState(replica);

    const results = await Promise.all([
      new GitIndexAccessor(state).lookup(pkg, undefined, Deadline.after(1000)),
      new GitIndexAccessor(state).lookup(pkg, undefined, Deadline.after(1000))
    ]);

    expect(results).toEqual([true, true]);
    expect(replica.refreshCalls).toBe(1);
  });
});

describe("SimpleGitReplica", () => {
  const workspaces: string[] = [];

  afterEach(async () => {
    await Promise.all(workspaces.splice(0).map(dir => fs.remove(dir)));
  });

  async function createOrigin(): Promise<{ root: string; origin: string; publish: (content: string) => Promise<void> }> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), "cpw-git-"));
    workspaces.push(root);
    const origin = path.join(root, "origin");
    await fs.ensureDir(origin);
    const git = simpleGit(origin);
    await git.init();
    await git.raw(["symbolic-ref", "HEAD", "refs/heads/master"]);
    await git.addConfig("user.name", "Index Bot");
    await git.addConfig("user.email", "index-bot@example.test");
    await git.addConfig("commit.gpgsign", "false");

    const publish = async (content: string): Promise<void> => {
      await fs.outputFile(path.join(origin, "de", "mo", "demo-crate"), content);
      await git.add(".");
      await git.commit("Update demo-crate");
    };
    return { root, origin, publish };
  }

  it("clones the origin on first open and reads crate files from the checkout", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { root, origin, publish } = await createOrigin();
    await publish(indexLine("demo-crate", "2.0.0"));
    const location = path.join(root, "replica");

    const replica = await SimpleGitReplica.open({ location, remote: origin, branch: "master" }, Deadline.after(15_000));

    expect(await fs.pathExists(path.join(location, ".git"))).toBe(true);
    expect(Buffer.from((await replica.readCrateFile("demo-crate")) ?? []).toString("utf8")).toBe(
      indexLine("demo-crate", "2.0.0")
    );
    expect(await replica.readCrateFile("other-crate")).toBeUndefined();
  }, 20_000);

  it("refreshes the checkout and finds a version published after the clone", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { root, origin, publish } = await createOrigin();
    await publish(indexLine("demo-crate", "2.0.0"));
    const replica = await SimpleGitReplica.open(
      { location: path.join(root, "replica"), remote: origin, branch: "master" },
      Deadline.after(15_000)
    );
    const accessor = new GitIndexAccessor(new GitIndexState(replica));

    expect(await accessor.lookup(pkg, undefined, Deadline.after(15_000))).toBe(false);

    await publish(indexLine("demo-crate", "2.0.0") + indexLine("demo-crate", "2.1.0"));

    expect(await accessor.lookup(pkg, undefined, Deadline.after(15_000))).toBe(true);
  }, 20_000);

  it("reuses an existing checkout instead of cloning again", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { root, origin, publish } = await createOrigin();
    await publish(indexLine("demo-crate", "2.1.0"));
    const options = { location: path.join(root, "replica"), remote: origin, branch: "master" };
    await SimpleGitReplica.open(options, Deadline.after(15_000));
    await fs.outputFile(path.join(options.location, "local-marker"), "kept");

    await SimpleGitReplica.open(options, Deadline.after(15_000));

    expect(await fs.readFile(path.join(options.location, "local-marker"), "utf8")).toBe("kept");
  }, 20_000);
});
