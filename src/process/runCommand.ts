import { spawn } from "node:child_process";
import { decode } from "iconv-lite";

export type CommandResult = {
  status: number | null;
  stdout: string;
  stderr: string;
  // Set when the process could not be started at all (missing executable, bad cwd).
  spawnError?: NodeJS.ErrnoException;
};

export type RunOptions = {
  /** iconv-lite encoding of the child's output; console tools write in the OEM code page. */
  encoding?: string;
};

export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

/**
 * Runs a command to completion with its window hidden and both output streams captured.
 * Output is decoded once, after the process exits. There is no timeout: the returned
 * promise settles only when the process exits.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  const encoding = options?.encoding ?? "utf8";

  return new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    function finish(status: number | null, spawnError?: NodeJS.ErrnoException): void {
      if (settled) {
        return;
      }
      settled = true;
      resolve({
        status,
        stdout: decode(Buffer.concat(stdout), encoding),
        stderr: decode(Buffer.concat(stderr), encoding),
        spawnError,
      });
    }

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    child.stdout.on("data", (chunk: Buffer) => {
      stdout.push(chunk);
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr.push(chunk);
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      finish(null, error);
    });

    child.on("close", (code) => {
      finish(code);
    });
  });
};

export function describeCommandFailure(result: CommandResult): string {
  if (result.spawnError) {
    return result.spawnError.message;
  }
  const detail = result.stderr.trim() || result.stdout.trim();
  return detail ? `exit ${result.status}: ${detail}` : `exit ${result.status}`;
}
