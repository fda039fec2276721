import { spawn } from "node:child_process";
import { DiffToolError } from "./errors.js";

export const DIFF_TOOL_TIMEOUT_MS = 10_000;
// Time a timed-out tool gets to exit after SIGTERM before SIGKILL.
const KILL_GRACE_MS = 2_000;

export interface DiffToolOptions {
  timeoutMs?: number | undefined;
}

/** Split a command line on whitespace; quoting is not interpreted. */
export function parseCommand(command: string): string[] {
  return command.trim().split(/\s+/).filter((part) => part !== "");
}

/**
 * Pipe `input` through an external command (a pager-less diff renderer such
 * as `delta --paging=never`) and resolve with its stdout.
 */
export function runDiffTool(
  command: string,
  input: string,
  options: DiffToolOptions = {},
): Promise<string> {
  const [program, ...args] = parseCommand(command);
  if (!program) {
    return Promise.reject(new DiffToolError("command is empty"));
  }
  const timeoutMs = options.timeoutMs ?? DIFF_TOOL_TIMEOUT_MS;

  return new Promise<string>((resolve, reject) => {
    const child = spawn(program, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let stdinError: Error | undefined;
    let settled = false;

    const settle = (err: Error | undefined) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (err) {
        reject(err);
      } else {
        resolve(Buffer.concat(stdout).toString("utf8"));
      }
    };

    // Rejects at the deadline whether or not the tool honours SIGTERM.
    const timer = setTimeout(() => {
      settle(new DiffToolError(`timed out after ${timeoutMs}ms`));
      child.kill("SIGTERM");
      const escalate = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
      }, KILL_GRACE_MS);
      escalate.unref();
      child.once("close", () => clearTimeout(escalate));
    }, timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.stdin.on("error", (err) => {
      stdinError = err;
    });

    child.on("error", (err) => {
      settle(new DiffToolError(`could not start "${program}": ${err.message}`, { cause: err }));
    });

    child.on("close", (code, signal) => {
      if (code !== 0) {
        const detail = Buffer.concat(stderr).toString("utf8").trim();
        settle(new DiffToolError(detail || (signal ? `killed by ${signal}` : `exited with code ${code}`)));
        return;
      }
      if (stdinError) {
        settle(new DiffToolError(`could not write input: ${stdinError.message}`, { cause: stdinError }));
        return;
      }
      settle(undefined);
    });

    child.stdin.end(input);
  });
}
