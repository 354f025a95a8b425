import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { randomUUID } from "node:crypto";
import { signalExitCode } from "./process.js";

/** Characters kept past the cap so the end-of-command marker can still be found. */
const MARKER_WINDOW = 256;

export interface ShellSessionOptions {
  /** Shell binary (default: /bin/bash) */
  shell?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Stdout cap in bytes per command; the rest is dropped and `truncated` set */
  maxOutputBytes: number;
}

interface ShellOutput {
  stdout: string;
  stderr: string;
  truncated: boolean;
}

export type ShellRunResult =
  | (ShellOutput & { status: "done"; exitCode: number })
  | (ShellOutput & { status: "timed_out" })
  | (ShellOutput & { status: "exited"; exitCode: number });

class StreamCapture {
  private head = "";
  private tail = "";
  truncated = false;

  constructor(private readonly limit: number) {}

  reset(): void {
    this.head = "";
    this.tail = "";
    this.truncated = false;
  }

  push(chunk: string): void {
    if (this.truncated) {
      this.tail = (this.tail + chunk).slice(-MARKER_WINDOW);
      return;
    }
    this.head += chunk;
    if (this.head.length <= this.limit + MARKER_WINDOW) return;
    this.tail = this.head.slice(this.limit).slice(-MARKER_WINDOW);
    this.head = this.head.slice(0, this.limit);
    this.truncated = true;
  }

  find(pattern: RegExp): RegExpExecArray | null {
    return pattern.exec(this.truncated ? this.tail : this.head);
  }

  /** Captured text up to `match`, capped at the byte limit. */
  text(match?: RegExpExecArray | null): string {
    const end = !this.truncated && match ? match.index : this.head.length;
    const text = this.head.slice(0, end);
    if (Buffer.byteLength(text, "utf8") <= this.limit) return text;
    this.truncated = true;
    return Buffer.from(text, "utf8").subarray(0, this.limit).toString("utf8");
  }
}

/**
 * A long-lived shell fed on stdin.
 *
 * Every command is followed by a marker line on both streams carrying the
 * exit status, so state such as the working directory, exported variables and
 * shell functions carries over between calls. A command that outlives its
 * timeout takes the whole process group down with it and leaves the session
 * unusable; callers start a new one.
 */
export class ShellSession {
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly marker = `__toolbelt_done_${randomUUID().replaceAll("-", "")}__`;
  private readonly stdout: StreamCapture;
  private readonly stderr: StreamCapture;
  private exitStatus: number | undefined;
  private failure: string | undefined;
  private wake: (() => void) | undefined;
  private running = false;
  /** Timeout in seconds of the command that killed this session */
  timedOutAfter: number | undefined;

  constructor(options: ShellSessionOptions) {
    this.stdout = new StreamCapture(options.maxOutputBytes);
    this.stderr = new StreamCapture(options.maxOutputBytes);
    this.child = spawn(options.shell ?? "/bin/bash", [], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      detached: true,
      stdio: "pipe",
    });
    this.child.stdout.setEncoding("utf8");
    this.child.stderr.setEncoding("utf8");
    this.child.stdout.on("data", (chunk: string) => {
      this.stdout.push(chunk);
      this.wake?.();
    });
    this.child.stderr.on("data", (chunk: string) => {
      this.stderr.push(chunk);
      this.wake?.();
    });
    // Writes to a shell that already exited fail with EPIPE; the close event reports the exit.
    this.child.stdin.on("error", (err) => {
      this.failure ??= err.message;
    });
    this.child.on("error", (err) => {
      this.failure = err.message;
      this.exitStatus ??= 127;
      this.wake?.();
    });
    this.child.on("close", (code, signal) => {
      this.exitStatus ??= code ?? signalExitCode(signal);
      this.wake?.();
    });
  }

  /** Exit status once the shell has ended, otherwise undefined. */
  get exitCode(): number | undefined {
    return this.exitStatus;
  }

  /** Spawn or pipe error that ended the shell, if any. */
  get error(): string | undefined {
    return this.failure;
  }

  /**
   * Run one command to completion. Resolves with `timed_out` after killing
   * the session when `timeoutMs` elapses, or `exited` when the shell ends
   * before the command's marker arrives.
   */
  run(command: string, timeoutMs: number): Promise<ShellRunResult> {
    if (this.running) {
      return Promise.reject(new Error("A command is already running in this shell"));
    }
    if (this.exitStatus !== undefined) {
      return Promise.resolve({ status: "exited", exitCode: this.exitStatus, stdout: "", stderr: "", truncated: false });
    }

    this.running = true;
    this.stdout.reset();
    this.stderr.reset();
    const stdoutDone = new RegExp(`${this.marker}(\\d+)\\n`);
    const stderrDone = new RegExp(`${this.marker}\\n`);
    this.child.stdin.write(
      `{\n${command}\n} < /dev/null\necho "${this.marker}$?"\necho "${this.marker}" >&2\n`,
    );

    return new Promise((resolve) => {
      const settle = (result: ShellRunResult) => {
        clearTimeout(timer);
        this.wake = undefined;
        this.running = false;
        resolve(result);
      };

      const timer = setTimeout(() => {
        this.timedOutAfter = timeoutMs / 1000;
        this.kill();
        settle({ status: "timed_out", ...this.collect() });
      }, timeoutMs);

      this.wake = () => {
        const out = this.stdout.find(stdoutDone);
        const err = this.stderr.find(stderrDone);
        if (out && err) {
          settle({ status: "done", exitCode: Number(out[1]), ...this.collect(out, err) });
        } else if (this.exitStatus !== undefined) {
          settle({ status: "exited", exitCode: this.exitStatus, ...this.collect() });
        }
      };
      this.wake();
    });
  }

  /** SIGKILL the shell's process group. */
  kill(): void {
    if (this.exitStatus !== undefined) return;
    try {
      if (this.child.pid === undefined) return;
      process.kill(-this.child.pid, "SIGKILL");
    } catch {
      // Group already gone or not supported on this platform
      this.child.kill("SIGKILL");
    }
  }

  private collect(out?: RegExpExecArray | null, err?: RegExpExecArray | null): ShellOutput {
    const stdout = this.stdout.text(out);
    const stderr = this.stderr.text(err);
    return { stdout, stderr, truncated: this.stdout.truncated || this.stderr.truncated };
  }
}
