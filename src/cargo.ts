import { spawn } from "node:child_process";
import { CargoCommandError } from "./errors.js";
import { debug } from "./logger.js";

export interface CmdOutput {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Cargo executable, overridable through the `CARGO` environment variable.
 */
export function cargoBinary(): string {
  return process.env.CARGO ?? "cargo";
}

/**
 * Run cargo in `root` and capture its output.
 *
 * @param root - Working directory.
 * @param args - Cargo arguments, e.g. `["metadata", "--format-version", "1"]`.
 * @returns Exit code with decoded stdout and stderr.
 * @throws CargoCommandError if the process cannot be started.
 */
export function runCargo(root: string, args: readonly string[]): Promise<CmdOutput> {
  debug(`cargo ${args.join(" ")}`);

  return new Promise((resolve, reject) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    const proc = spawn(cargoBinary(), [...args], {
      cwd: root,
      env: process.env,
      shell: false
    });

    proc.on("error", (err: NodeJS.ErrnoException) => {
      reject(new CargoCommandError(`cannot run cargo: ${err.message}`, err));
    });

    proc.stdout?.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });

    proc.stderr?.on("data", (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    proc.on("close", (code, signal) => {
      const stdout = Buffer.concat(stdoutChunks).toString("utf8");
      const stderr = Buffer.concat(stderrChunks).toString("utf8");
      debug(`cargo stderr: ${stderr}`);
      debug(`cargo stdout: ${stdout}`);
      resolve({
        exitCode: code ?? (signal ? -1 : 0),
        stdout,
        stderr
      });
    });
  });
}
