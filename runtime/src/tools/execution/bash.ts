/**
 * Shell command execution.
 *
 * One `/bin/bash` lives per tool instance, so `cd`, exported variables and
 * functions persist from call to call. A command that runs past its timeout
 * kills the shell; every later call fails until `restart` is passed.
 *
 * @module
 */

import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { boolParam, dispatchAction, missingParameter, nonEmptyParam, numberParam, stringParam } from "../action.js";
import { ToolErrorCodes } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import { ShellSession } from "../../utils/shell-session.js";

export interface BashToolConfig {
  logger?: Logger;
  /** Default timeout in seconds (default: 120) */
  timeoutSeconds?: number;
  /** Starting directory of the shell (default: process.cwd()) */
  cwd?: string;
  /** Per-stream output cap in bytes (default: 100000) */
  maxOutputBytes?: number;
  /** Environment for the shell (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_TIMEOUT_SECONDS = 120;
const DEFAULT_MAX_OUTPUT_BYTES = 100_000;
const TRUNCATION_MARKER = "\n[truncated]";

function stripTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}

function shellQuote(value: string): string {
  return `'${value.replaceAll("'", `'\\''`)}'`;
}

export class BashTool implements ToolAdapter {
  readonly name = "bash";
  readonly description =
    "Execute a bash command in a persistent shell. The working directory and exported " +
    "variables carry over between calls; pass restart=true to start a fresh shell. " +
    "Long-running commands should be backgrounded with output redirected to a file.";
  readonly category = "execution";
  readonly actions = ["run"] as const;
  readonly defaultAction = "run";
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly timeoutSeconds: number;
  private readonly cwd: string | undefined;
  private readonly maxOutputBytes: number;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private session: ShellSession | undefined;

  constructor(config: BashToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.timeoutSeconds = config.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.cwd = config.cwd;
    this.maxOutputBytes = config.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.env = config.env;
    this.parameters = [
      { name: "command", type: "string", description: "The bash command to execute", required: true },
      {
        name: "timeout",
        type: "number",
        description: `Timeout in seconds (default: ${this.timeoutSeconds})`,
        required: false,
        default: this.timeoutSeconds,
      },
      {
        name: "cwd",
        type: "string",
        description: "Change to this directory before running; the change persists",
        required: false,
      },
      {
        name: "restart",
        type: "boolean",
        description: "Kill the current shell and start a new one; command is ignored",
        required: false,
        default: false,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Bash", { run: (p) => this.run(p) }, action, params, this.logger);
  }

  /** Kill the shell, if one is running. */
  async dispose(): Promise<void> {
    this.session?.kill();
    this.session = undefined;
  }

  private startSession(): ShellSession {
    this.logger.debug("bash: starting shell");
    return new ShellSession({ cwd: this.cwd, env: this.env, maxOutputBytes: this.maxOutputBytes });
  }

  private async run(params: ToolParams): Promise<ToolResult> {
    if (boolParam(params, "restart") === true) {
      await this.dispose();
      this.session = this.startSession();
      return okResult("Bash session restarted");
    }

    const command = stringParam(params, "command");
    if (command === undefined || command.trim() === "") {
      return missingParameter("no command provided.");
    }

    const session = this.session ?? this.startSession();
    this.session = session;
    if (session.timedOutAfter !== undefined) {
      return errorResult(
        `timed out: bash has not returned in ${session.timedOutAfter} seconds and must be restarted`,
        ToolErrorCodes.SESSION_CLOSED,
      );
    }
    if (session.exitCode !== undefined) {
      return errorResult(
        `bash has exited with returncode ${session.exitCode} and must be restarted`,
        ToolErrorCodes.SESSION_CLOSED,
      );
    }

    const requested = numberParam(params, "timeout");
    const timeout = requested !== undefined && requested > 0 ? requested : this.timeoutSeconds;
    const cwd = nonEmptyParam(params, "cwd");
    this.logger.debug(`bash: ${command} (timeout ${timeout}s)`);

    const result = await session.run(
      cwd === undefined ? command : `cd -- ${shellQuote(cwd)} && ${command}`,
      timeout * 1000,
    );

    let stdout = stripTrailingNewline(result.stdout);
    if (result.truncated) stdout += TRUNCATION_MARKER;
    const stderr = result.stderr.trim();

    switch (result.status) {
      case "timed_out": {
        this.logger.warn(`bash: command timed out after ${timeout}s; shell killed`);
        const message = stderr
          ? `Command timed out after ${timeout} seconds\nOriginal stderr: ${stderr}`
          : `Command timed out after ${timeout} seconds`;
        return errorResult(message, ToolErrorCodes.TIMED_OUT, stdout || null);
      }
      case "exited": {
        const reason = session.error ? `: ${session.error}` : "";
        return errorResult(
          `bash has exited with returncode ${result.exitCode}${reason}`,
          ToolErrorCodes.EXECUTION_FAILED,
          stdout || null,
        );
      }
      case "done":
        if (result.exitCode !== 0) {
          return errorResult(
            stderr || `Command exited with code ${result.exitCode}`,
            ToolErrorCodes.EXECUTION_FAILED,
            stdout || null,
          );
        }
        return okResult(stdout);
    }
  }
}
