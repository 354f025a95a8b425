/**
 * JavaScript code execution in a fresh `node` child process.
 *
 * Only what the code prints is visible; return values are not captured.
 * {@link SafeCodeExecutorTool} adds a static screen for restricted modules and
 * globals and disables string code generation in the child.
 *
 * @module
 */

import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, missingParameter, numberParam, stringParam } from "../action.js";
import { ToolErrorCodes } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import type { CommandRunner } from "../../utils/process.js";
import { buildEnv, runCommand } from "../../utils/process.js";

export interface CodeExecutorConfig {
  logger?: Logger;
  /** Default timeout in seconds (default: 30) */
  timeoutSeconds?: number;
  runner?: CommandRunner;
  /** Interpreter to spawn (default: the running node binary) */
  nodePath?: string;
}

const DEFAULT_TIMEOUT_SECONDS = 30;
const ERROR_LINE = /^[A-Za-z]*Error(?: \[[A-Z_]+\])?: .*/m;

/**
 * Pick the `SomeError: message` line out of a node stack dump.
 */
export function extractErrorLine(stderr: string): string | undefined {
  return ERROR_LINE.exec(stderr)?.[0];
}

export class CodeExecutorTool implements ToolAdapter {
  readonly name: string = "code_executor";
  readonly description: string =
    "Executes a JavaScript code string with Node.js. Only console output is visible; " +
    "return values are not captured. Use console.log to see results.";
  readonly category = "execution";
  readonly actions = ["run"] as const;
  readonly defaultAction = "run";
  readonly parameters: readonly ParameterSpec[];

  protected readonly logger: Logger;
  private readonly timeoutSeconds: number;
  private readonly runner: CommandRunner;
  private readonly nodePath: string;

  constructor(config: CodeExecutorConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.timeoutSeconds = config.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.runner = config.runner ?? runCommand;
    this.nodePath = config.nodePath ?? process.execPath;
    this.parameters = [
      { name: "code", type: "string", description: "The JavaScript code to execute.", required: true },
      {
        name: "timeout",
        type: "integer",
        description: `Execution timeout in seconds. Default is ${this.timeoutSeconds}.`,
        required: false,
        default: this.timeoutSeconds,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("Code execution", { run: (p) => this.run(p) }, action, params, this.logger);
  }

  /** Return a failure to refuse the code before it runs. */
  protected screen(_code: string): ToolResult | undefined {
    return undefined;
  }

  protected nodeFlags(): string[] {
    return [];
  }

  private async run(params: ToolParams): Promise<ToolResult> {
    const code = stringParam(params, "code");
    if (code === undefined || code.trim() === "") {
      return missingParameter("code is required");
    }

    const refused = this.screen(code);
    if (refused) return refused;

    const requested = numberParam(params, "timeout");
    const timeout = requested !== undefined && requested > 0 ? requested : this.timeoutSeconds;

    const result = await this.runner(this.nodePath, [...this.nodeFlags(), "-e", code], {
      timeoutMs: timeout * 1000,
      env: buildEnv(),
    });

    if (result.timedOut) {
      return errorResult(
        `Code execution timed out after ${timeout} seconds`,
        ToolErrorCodes.TIMED_OUT,
        `Execution timeout after ${timeout} seconds`,
      );
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      return errorResult(
        extractErrorLine(stderr) ?? (stderr || `Process exited with code ${result.exitCode}`),
        ToolErrorCodes.EXECUTION_FAILED,
        result.stdout,
      );
    }

    return okResult(result.stdout || "Code executed successfully (no output)");
  }
}

// ============================================================================
// Safe variant
// ============================================================================

export const RESTRICTED_MODULES: readonly string[] = [
  "child_process",
  "cluster",
  "dgram",
  "dns",
  "fs",
  "fs/promises",
  "http",
  "http2",
  "https",
  "inspector",
  "module",
  "net",
  "os",
  "process",
  "tls",
  "v8",
  "vm",
  "worker_threads",
];

export const RESTRICTED_GLOBALS: readonly string[] = [
  "eval",
  "Function",
  "process",
  "globalThis",
  "global",
  "module",
];

const MODULE_REFERENCE = /(?:require\s*\(\s*|import\s*\(\s*|from\s+|import\s+)["'`](?:node:)?([\w/]+)["'`]/g;

const LOADER = /\b(require|import)\b/g;
const LITERAL_CALL = /^\s*\(\s*(["'`])(?:node:)?[\w/]+\1\s*\)/;

/**
 * Modules named by `require(...)`, `import(...)` or static imports.
 */
export function referencedModules(code: string): string[] {
  return [...code.matchAll(MODULE_REFERENCE)].map((match) => match[1]);
}

/**
 * First `require` or dynamic `import` whose specifier is not a plain string
 * literal, e.g. `require('f' + 's')` or `const r = require`.
 */
export function computedModuleLoad(code: string): string | undefined {
  for (const match of code.matchAll(LOADER)) {
    const rest = code.slice((match.index ?? 0) + match[0].length);
    // static `import x from '...'` and `import.meta` carry no computed specifier
    if (match[1] === "import" && !/^\s*\(/.test(rest)) continue;
    if (!LITERAL_CALL.test(rest)) return match[1];
  }
  return undefined;
}

export class SafeCodeExecutorTool extends CodeExecutorTool {
  override readonly name: string = "safe_code_executor";
  override readonly description: string =
    "Executes JavaScript with restricted modules and globals. File system, network, " +
    "child process and VM access are blocked.";

  protected override screen(code: string): ToolResult | undefined {
    for (const mod of referencedModules(code)) {
      if (RESTRICTED_MODULES.includes(mod)) {
        this.logger.warn(`safe_code_executor: blocked module ${mod}`);
        return errorResult(`Restricted module '${mod}' is not allowed`, ToolErrorCodes.DENIED);
      }
    }
    const loader = computedModuleLoad(code);
    if (loader !== undefined) {
      this.logger.warn(`safe_code_executor: blocked computed ${loader}`);
      return errorResult(`Computed module loading with '${loader}' is not allowed`, ToolErrorCodes.DENIED);
    }
    for (const name of RESTRICTED_GLOBALS) {
      if (new RegExp(`\\b${name}\\b`).test(code)) {
        this.logger.warn(`safe_code_executor: blocked global ${name}`);
        return errorResult(`Restricted global '${name}' is not allowed`, ToolErrorCodes.DENIED);
      }
    }
    return undefined;
  }

  protected override nodeFlags(): string[] {
    return ["--disallow-code-generation-from-strings"];
  }
}
