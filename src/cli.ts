import { Command } from "commander";
import { REGISTRY, TIMEOUTS } from "./config.js";
import { getErrorMessage } from "./errors.js";
import { debug, error as logError, info, setLogLevel, warn } from "./logger.js";
import { isPublished, waitUntilPublished } from "./publication.js";
import { CargoRegistry, openRegistry } from "./registry.js";
import { createPackageRef } from "./types.js";
import { Deadline } from "./utils/deadline.js";
import { formatDuration, parseDuration } from "./utils/duration.js";

/**
 * Options shared by the `check` and `wait` commands.
 */
export interface WatchOptions {
  readonly index?: string;
  readonly registry?: string;
  readonly gitDir?: string;
  readonly gitBranch?: string;
  readonly timeout?: string;
  readonly lookupTimeout?: string;
  readonly logLevel?: string;
}

export interface WatchSettings {
  readonly indexUrl: string;
  readonly registryName?: string;
  readonly gitIndexDir?: string;
  readonly gitBranch: string;
  readonly totalTimeoutMs: number;
  readonly lookupTimeoutMs: number;
}

/**
 * Merge command-line options over environment configuration.
 *
 * @param options - Parsed command options.
 * @returns Settings with durations in milliseconds.
 */
export function resolveSettings(options: WatchOptions): WatchSettings {
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }
  return {
    indexUrl: options.index ?? REGISTRY.INDEX,
    registryName: options.registry ?? REGISTRY.NAME,
    gitIndexDir: options.gitDir ?? REGISTRY.GIT_INDEX_DIR,
    gitBranch: options.gitBranch ?? REGISTRY.GIT_BRANCH,
    totalTimeoutMs: options.timeout ? parseDuration(options.timeout) : TIMEOUTS.PUBLISH,
    lookupTimeoutMs: options.lookupTimeout ? parseDuration(options.lookupTimeout) : TIMEOUTS.LOOKUP
  };
}

function registryLabel(registry: CargoRegistry): string {
  return registry.name ?? "crates.io";
}

async function open(settings: WatchSettings): Promise<CargoRegistry> {
  if (!REGISTRY.TOKEN && settings.registryName) {
    warn(`No token configured for registry ${settings.registryName}; requests are sent unauthenticated.`);
  }
  return openRegistry({
    indexUrl: settings.indexUrl,
    name: settings.registryName,
    gitIndexDir: settings.gitIndexDir,
    gitBranch: settings.gitBranch,
    deadline: Deadline.after(settings.totalTimeoutMs)
  });
}

/**
 * Check mode entry point: a single bounded lookup.
 *
 * @returns Whether the version is visible; exit code 2 when it is not.
 */
export async function checkAction(name: string, version: string, options: WatchOptions): Promise<boolean> {
  const settings = resolveSettings(options);
  const pkg = createPackageRef(name, version);
  const registry = await open(settings);
  debug(`Checking ${pkg.name} ${pkg.version} on ${registryLabel(registry)} (${settings.indexUrl})`);
  const published = await isPublished(registry.index, pkg, settings.lookupTimeoutMs, REGISTRY.TOKEN);
  console.log(published ? "published" : "not published");
  if (!published) {
    process.exitCode = 2;
  }
  return published;
}

/**
 * Wait mode entry point: poll until published or the total timeout elapses.
 */
export async function waitAction(name: string, version: string, options: WatchOptions): Promise<void> {
  const settings = resolveSettings(options);
  const pkg = createPackageRef(name, version);
  const registry = await open(settings);
  debug(
    `Waiting up to ${formatDuration(settings.totalTimeoutMs)} for ${pkg.name} ${pkg.version} on ${registryLabel(registry)}`
  );
  await waitUntilPublished(
    registry.index,
    pkg,
    { totalTimeoutMs: settings.totalTimeoutMs, lookupTimeoutMs: settings.lookupTimeoutMs },
    REGISTRY.TOKEN
  );
  info(`${pkg.name} ${pkg.version} is published on ${registryLabel(registry)}.`);
}

function withWatchOptions(command: Command): Command {
  return command
    .option("--index <url>", "registry index URL (sparse+https://... or a git remote)")
    .option("--registry <name>", "registry name used in messages")
    .option("--git-dir <dir>", "local checkout of a git index")
    .option("--git-branch <branch>", "branch of a git index")
    .option("--timeout <duration>", "total time to wait, e.g. 30m")
    .option("--lookup-timeout <duration>", "time allowed for a single lookup, e.g. 60s")
    .option("--log-level <level>", "debug, info, warn or error");
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("crate-publish-watch")
    .description("Wait until a crate version is visible on a Cargo registry index")
    .version("1.0.0");

  withWatchOptions(program.command("check").description("Check once whether a crate version is published"))
    .argument("<name>", "crate name")
    .argument("<version>", "exact version")
    .action(async (name: string, version: string, options: WatchOptions) => {
      await checkAction(name, version, options);
    });

  withWatchOptions(program.command("wait").description("Poll the index until a crate version is published"))
    .argument("<name>", "crate name")
    .argument("<version>", "exact version")
    .action(async (name: string, version: string, options: WatchOptions) => waitAction(name, version, options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`crate-publish-watch failed: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  }
}
