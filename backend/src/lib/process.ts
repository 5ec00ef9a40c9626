import { spawn, type ChildProcess } from "child_process";
import type { FastifyBaseLogger } from "fastify";
import { ProcessError } from "./errors";

const STDERR_TAIL_BYTES = 8 * 1024;

export interface RunOptions {
  timeoutMs: number;
  log: FastifyBaseLogger;
  label: string;
}

// Runs a binary without a shell and resolves with its stdout.
export function runProcess(
  command: string,
  args: string[],
  { timeoutMs, log, label }: RunOptions,
): Promise<string> {
  return new Promise((resolve, reject) => {
    log.debug({ command, args }, `[${label}] spawning`);

    // Own process group, so a timeout also reaches children that inherit our pipes
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], detached: true });
    const stdout: Buffer[] = [];
    let stderr = "";
    let settled = false;

    const settle = (error: ProcessError | null, output = "") => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (error) reject(error);
      else resolve(output);
    };

    const timer = setTimeout(() => {
      killGroup(child);
      settle(new ProcessError(command, null, stderr, `${command} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    child.stdout.on("data", (d: Buffer) => stdout.push(d));
    child.stderr.on("data", (d: Buffer) => {
      stderr = (stderr + d.toString()).slice(-STDERR_TAIL_BYTES);
    });

    child.on("error", (err) => {
      settle(new ProcessError(command, null, stderr, `${command} could not be started: ${err.message}`));
    });

    child.on("close", (code) => {
      if (code !== 0) {
        if (!settled) log.error({ command, code, stderr }, `[${label}] failed`);
        settle(new ProcessError(command, code, stderr));
        return;
      }
      settle(null, Buffer.concat(stdout).toString("utf-8"));
    });
  });
}

const killGroup = (child: ChildProcess) => {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch {
    // no group to signal; fall back to the direct child
    child.kill("SIGKILL");
  }
};
