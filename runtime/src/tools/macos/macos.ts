/**
 * macOS automation through `osascript` and `screencapture`.
 *
 * UI actions address elements of the opened app's front window through
 * System Events, as `item N of (entire contents of front window)`. User
 * scripts are screened against {@link DENIED_PATTERNS} before they run.
 *
 * @module
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { boolParam, dispatchAction, intParam, invalidParameter, missingParameter, nonEmptyParam, stringParam } from "../action.js";
import { SessionGuard } from "../session.js";
import { ToolErrorCodes } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import type { CommandRunner, RunCommandResult } from "../../utils/process.js";
import { buildEnv, runCommand } from "../../utils/process.js";
import { hasKey } from "../../utils/type-guards.js";

// ============================================================================
// Security patterns
// ============================================================================

export const DENIED_PATTERNS: readonly RegExp[] = [
  /keychain/i,
  /security\s+(find|delete|add|dump)/i,
  /do\s+shell\s+script.*with\s+administrator/i,
  /System\s+Events.*keystroke/i,
  /delete\s+every/i,
];

/** The denial message for `script`, or `undefined` when it may run. */
export function checkScript(script: string): string | undefined {
  const pattern = DENIED_PATTERNS.find((p) => p.test(script));
  return pattern ? `Script denied: matches security pattern ${pattern.source}` : undefined;
}

// ============================================================================
// Helpers
// ============================================================================

export interface MacOSToolConfig {
  logger?: Logger;
  /** Per-command timeout (default: 30) */
  timeoutSeconds?: number;
  runner?: CommandRunner;
  /** Directory for screenshots (default: the OS temp dir) */
  screenshotDir?: string;
  now?: () => Date;
}

const NOT_OPEN_MESSAGE = "No app is currently open. Use 'open_app' action first.";

const SCROLL_ACTIONS = {
  up: "AXScrollUpByPage",
  down: "AXScrollDownByPage",
  left: "AXScrollLeftByPage",
  right: "AXScrollRightByPage",
} as const;

/** Quote a value as an AppleScript string literal. */
export function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function elementRef(index: number): string {
  return `item ${index} of (entire contents of front window)`;
}

function inProcess(app: string, body: string[]): string {
  return [
    'tell application "System Events"',
    `  tell process ${appleScriptString(app)}`,
    ...body.map((line) => `    ${line}`),
    "  end tell",
    "end tell",
  ].join("\n");
}

class OsascriptRunner {
  constructor(
    private readonly runner: CommandRunner,
    private readonly timeoutSeconds: number,
  ) {}

  run(cmd: string, args: readonly string[]): Promise<RunCommandResult> {
    return this.runner(cmd, args, { timeoutMs: this.timeoutSeconds * 1000, env: buildEnv() });
  }

  script(source: string): Promise<RunCommandResult> {
    return this.run("osascript", ["-e", source]);
  }

  /** Failure for a timed-out or non-zero run, prefixed with `failure` */
  check(result: RunCommandResult, failure: string): ToolResult | undefined {
    if (result.timedOut) {
      return errorResult(`Command timed out after ${this.timeoutSeconds} seconds`, ToolErrorCodes.TIMED_OUT);
    }
    if (result.exitCode !== 0) return errorResult(`${failure}: ${result.stderr.trim()}`);
    return undefined;
  }
}

// ============================================================================
// MacOSTool
// ============================================================================

export class MacOSTool implements ToolAdapter {
  readonly name = "macos";
  readonly description =
    "A tool for macOS automation. Can open apps, interact with UI elements, take screenshots, run AppleScript, " +
    "and automate macOS applications.";
  readonly category = "macos";
  readonly actions = [
    "open_app",
    "get_ui_tree",
    "click_element",
    "input_text",
    "right_click",
    "scroll",
    "run_applescript",
    "screenshot",
    "close",
  ] as const;
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly osa: OsascriptRunner;
  private readonly screenshotDir: string;
  private readonly now: () => Date;
  private readonly session = new SessionGuard("macOS", NOT_OPEN_MESSAGE);
  private currentApp: string | null = null;

  constructor(config: MacOSToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.osa = new OsascriptRunner(config.runner ?? runCommand, config.timeoutSeconds ?? 30);
    this.screenshotDir = config.screenshotDir ?? tmpdir();
    this.now = config.now ?? (() => new Date());
    this.parameters = [
      {
        name: "action",
        type: "string",
        description:
          "Action to perform: open_app, get_ui_tree, click_element, input_text, right_click, scroll, " +
          "run_applescript, screenshot, close",
        required: true,
        enum: this.actions,
      },
      { name: "app_name", type: "string", description: "Name of the app to open (required for 'open_app' action)", required: false },
      {
        name: "element_index",
        type: "integer",
        description: "Index of UI element to interact with (required for click_element, input_text, right_click, scroll actions)",
        required: false,
      },
      { name: "text", type: "string", description: "Text to input (required for 'input_text' action)", required: false },
      {
        name: "submit",
        type: "boolean",
        description: "Whether to submit after text input (for 'input_text' action)",
        required: false,
        default: false,
      },
      {
        name: "click_action",
        type: "string",
        description: "Type of click action: AXPress, AXClick, AXOpen, AXConfirm, AXShowMenu (for 'click_element' action)",
        required: false,
        default: "AXPress",
      },
      {
        name: "scroll_direction",
        type: "string",
        description: "Direction to scroll: up, down, left, right (for 'scroll' action)",
        required: false,
        default: "down",
      },
      {
        name: "script",
        type: "string",
        description: "AppleScript code to execute (required for 'run_applescript' action)",
        required: false,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "macOS",
      {
        open_app: (p) => this.openApp(p),
        get_ui_tree: () => this.withApp((app) => this.uiTree(app)),
        click_element: (p) => this.withApp((app) => this.clickElement(app, p)),
        input_text: (p) => this.withApp((app) => this.inputText(app, p)),
        right_click: (p) => this.withApp((app) => this.rightClick(app, p)),
        scroll: (p) => this.withApp((app) => this.scrollElement(app, p)),
        run_applescript: (p) => this.ungated(() => this.runAppleScript(p)),
        screenshot: () => this.ungated(() => this.screenshot()),
        close: () => this.ungated(() => this.close()),
      },
      action,
      params,
      this.logger,
    );
  }

  async dispose(): Promise<void> {
    this.currentApp = null;
    this.session.markClosed();
  }

  private async ungated(run: () => Promise<ToolResult>): Promise<ToolResult> {
    return this.session.gate(false) ?? run();
  }

  private async withApp(run: (app: string) => Promise<ToolResult>): Promise<ToolResult> {
    const blocked = this.session.gate(true);
    if (blocked) return blocked;
    if (this.currentApp === null) return errorResult(NOT_OPEN_MESSAGE, ToolErrorCodes.NOT_OPEN);
    return run(this.currentApp);
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  private async openApp(params: ToolParams): Promise<ToolResult> {
    const blocked = this.session.gate(false);
    if (blocked) return blocked;
    const app = nonEmptyParam(params, "app_name");
    if (app === undefined) return missingParameter("app_name is required for open_app action");

    const result = await this.osa.script(`tell application ${appleScriptString(app)} to activate`);
    const failed = this.osa.check(result, `Failed to open app '${app}'`);
    if (failed) return failed;

    this.currentApp = app;
    this.session.markOpen();
    this.logger.debug(`macos: opened ${app}`);
    return okResult(`Opened app '${app}' successfully using AppleScript`);
  }

  private async uiTree(app: string): Promise<ToolResult> {
    const script = inProcess(app, [
      'set output to ""',
      "set idx to 0",
      "repeat with el in (entire contents of front window)",
      "  set idx to idx + 1",
      "  try",
      '    set output to output & idx & ": " & (role of el) & " " & (description of el) & linefeed',
      "  end try",
      "end repeat",
      "return output",
    ]);
    const result = await this.osa.script(script);
    const failed = this.osa.check(result, "Failed to get UI tree");
    if (failed) return failed;
    return okResult(`UI Tree for ${app}:\n${result.stdout.trim()}`);
  }

  private async clickElement(app: string, params: ToolParams): Promise<ToolResult> {
    const index = readIndex(params, "click_element");
    if (typeof index !== "number") return index;
    const clickAction = nonEmptyParam(params, "click_action") ?? "AXPress";

    const result = await this.osa.script(
      inProcess(app, [`perform action ${appleScriptString(clickAction)} of ${elementRef(index)}`]),
    );
    const failed = this.osa.check(result, `Failed to click element ${index}`);
    return failed ?? okResult(`Successfully clicked element ${index}`);
  }

  private async inputText(app: string, params: ToolParams): Promise<ToolResult> {
    const index = intParam(params, "element_index");
    const text = stringParam(params, "text");
    if (index === undefined || !text) {
      return missingParameter("element_index and text are required for input_text action");
    }
    const lines = [`set value of ${elementRef(index)} to ${appleScriptString(text)}`];
    if (boolParam(params, "submit")) lines.push(`perform action "AXConfirm" of ${elementRef(index)}`);

    const result = await this.osa.script(inProcess(app, lines));
    const failed = this.osa.check(result, `Failed to input text into element ${index}`);
    return failed ?? okResult(`Successfully input text into element ${index}`);
  }

  private async rightClick(app: string, params: ToolParams): Promise<ToolResult> {
    const index = readIndex(params, "right_click");
    if (typeof index !== "number") return index;

    const result = await this.osa.script(inProcess(app, [`perform action "AXShowMenu" of ${elementRef(index)}`]));
    const failed = this.osa.check(result, `Failed to right-click element ${index}`);
    return failed ?? okResult(`Successfully right-clicked element ${index}`);
  }

  private async scrollElement(app: string, params: ToolParams): Promise<ToolResult> {
    const index = readIndex(params, "scroll");
    if (typeof index !== "number") return index;
    const direction = nonEmptyParam(params, "scroll_direction") ?? "down";
    if (!hasKey(SCROLL_ACTIONS, direction)) return errorResult(`Invalid scroll direction: ${direction}`);
    const axAction = SCROLL_ACTIONS[direction];

    const result = await this.osa.script(
      inProcess(app, [`perform action ${appleScriptString(axAction)} of ${elementRef(index)}`]),
    );
    const failed = this.osa.check(result, `Failed to scroll element ${index}`);
    return failed ?? okResult(`Successfully scrolled element ${index} ${direction}`);
  }

  private async runAppleScript(params: ToolParams): Promise<ToolResult> {
    return runUserScript(this.osa, params);
  }

  private async screenshot(): Promise<ToolResult> {
    const stamp = this.now().toISOString().replace(/[:.]/g, "-");
    const file = join(this.screenshotDir, `screenshot_${stamp}.png`);
    const result = await this.osa.run("screencapture", ["-x", file]);
    const failed = this.osa.check(result, "Failed to take screenshot");
    if (failed) return failed;
    return okResult(`Screenshot saved: ${file}`, { artifacts: { path: file } });
  }

  private async close(): Promise<ToolResult> {
    this.currentApp = null;
    this.session.markClosed();
    return okResult("macOS session closed successfully");
  }
}

function readIndex(params: ToolParams, action: string): number | ToolResult {
  const index = intParam(params, "element_index");
  if (index === undefined) return missingParameter(`element_index is required for ${action} action`);
  if (index < 1) return invalidParameter("element_index must be a positive integer");
  return index;
}

async function runUserScript(osa: OsascriptRunner, params: ToolParams): Promise<ToolResult> {
  const script = nonEmptyParam(params, "script");
  if (script === undefined) return missingParameter("script is required for run_applescript action");
  const denied = checkScript(script);
  if (denied) return errorResult(denied, ToolErrorCodes.DENIED);

  const result = await osa.script(script);
  const failed = osa.check(result, "AppleScript failed");
  return failed ?? okResult(`AppleScript executed successfully: ${result.stdout.trim()}`);
}

// ============================================================================
// SimpleMacOSTool
// ============================================================================

/**
 * Stateless app launching and AppleScript execution.
 */
export class SimpleMacOSTool implements ToolAdapter {
  readonly name = "simple_macos";
  readonly description =
    "A simplified macOS automation tool. Provides basic app launching and AppleScript execution.";
  readonly category = "macos";
  readonly actions = ["open_app", "run_applescript"] as const;
  readonly parameters: readonly ParameterSpec[] = [
    {
      name: "action",
      type: "string",
      description: "Action to perform: open_app, run_applescript",
      required: true,
      enum: ["open_app", "run_applescript"],
    },
    { name: "app_name", type: "string", description: "Name of the app to open (required for 'open_app' action)", required: false },
    {
      name: "script",
      type: "string",
      description: "AppleScript code to execute (required for 'run_applescript' action)",
      required: false,
    },
  ];

  private readonly logger: Logger;
  private readonly osa: OsascriptRunner;

  constructor(config: MacOSToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.osa = new OsascriptRunner(config.runner ?? runCommand, config.timeoutSeconds ?? 30);
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "Simple macOS",
      {
        open_app: (p) => this.openApp(p),
        run_applescript: (p) => runUserScript(this.osa, p),
      },
      action,
      params,
      this.logger,
    );
  }

  private async openApp(params: ToolParams): Promise<ToolResult> {
    const app = nonEmptyParam(params, "app_name");
    if (app === undefined) return missingParameter("app_name is required for open_app action");
    const result = await this.osa.script(`tell application ${appleScriptString(app)} to activate`);
    return this.osa.check(result, `Failed to open ${app}`) ?? okResult(`Successfully opened ${app}`);
  }
}
