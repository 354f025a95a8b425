import { spawn } from "node:child_process";
import { constants } from "node:os";

/** Exit status reported for a process killed by its timeout. */
export const TIMEOUT_EXIT_CODE = 124;

/** How long a killed process group gets to release its pipes. */
const KILL_GRACE_MS = 500;

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Per-stream cap in bytes; extra output is dropped and `truncated` set */
  maxBuffer?: number;
  env?: NodeJS.ProcessEnv;
}

export interface RunCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
}

/**
 * Signature shared by {@link runCommand} and the fakes tests inject in its
 * place.
 */
export type CommandRunner = (
  cmd: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<RunCommandResult>;

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (kept.length < chunk.length) this.truncated = true;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}

/** Exit status for a process ended by `signal` (128 + signal number). */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  return signal ? 128 + constants.signals[signal] : 1;
}

/**
 * Build a minimal environment for spawned processes.
 * Only exposes PATH and HOME so secrets in the parent env stay put.
 */
export function buildEnv(extra?: Record<string, string>): NodeJS.ProcessEnv {
  return {
    PATH: process.env.PATH ?? "/usr/local/bin:/usr/bin:/bin",
    HOME: process.env.HOME ?? "",
    ...extra,
  };
}

/**
 * Execute a subprocess and collect stdout/stderr without throwing on non-zero
 * exit or spawn failure.
 *
 * The child leads its own process group. On timeout the whole group gets
 * SIGKILL, so grandchildren (`bash -c "sleep 5"`) die with it, and whatever
 * output was buffered before the kill is returned.
 */
export function runCommand(
  cmd: string,
  args: readonly string[],
  options: RunCommandOptions = {},
): Promise<RunCommandResult> {
  const {
    cwd,
    timeoutMs,
    maxBuffer = 10 * 1024 * 1024,
    env = process.env,
  } = options;
  const startedAt = Date.now();

  return new Promise((resolve) => {
    const child = spawn(cmd, args, {
      cwd,
      env,
      detached: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout = new OutputBuffer(maxBuffer);
    const stderr = new OutputBuffer(maxBuffer);
    let timedOut = false;
    let settled = false;
    let graceTimer: ReturnType<typeof setTimeout> | undefined;

    const finish = (exitCode: number, spawnError?: string) => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      if (graceTimer !== undefined) clearTimeout(graceTimer);
      const errText = stderr.text();
      resolve({
        stdout: stdout.text(),
        stderr: spawnError ? (errText ? `${errText}\n${spawnError}` : spawnError) : errText,
        exitCode: timedOut ? TIMEOUT_EXIT_CODE : exitCode,
        timedOut,
        truncated: stdout.truncated || stderr.truncated,
        durationMs: Date.now() - startedAt,
      });
    };

    const killGroup = () => {
      timedOut = true;
      try {
        if (child.pid === undefined) return;
        process.kill(-child.pid, "SIGKILL");
      } catch {
        // Group already gone or not supported on this platform
        child.kill("SIGKILL");
      }
      // A grandchild that left the group may still hold the pipes open.
      graceTimer = setTimeout(() => {
        child.stdout.destroy();
        child.stderr.destroy();
        finish(TIMEOUT_EXIT_CODE);
      }, KILL_GRACE_MS);
    };

    const timer = timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(killGroup, timeoutMs)
      : undefined;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (err) => finish(127, err.message));
    child.on("close", (code, signal) => finish(code ?? signalExitCode(signal)));
  });
}
