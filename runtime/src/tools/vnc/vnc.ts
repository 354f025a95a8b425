/**
 * VNC control through the `vncdotool` command line.
 *
 * Every operation is one `vncdotool -s <connection> [-p <password>] ...` run.
 * Screen captures are written to disk and returned inline as a base64 image
 * tag.
 *
 * @module
 */

import { readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, intParam, missingParameter, nonEmptyParam, numberParam } from "../action.js";
import { SessionGuard } from "../session.js";
import { ToolErrorCodes, toErrorMessage } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";
import type { CommandRunner } from "../../utils/process.js";
import { buildEnv, runCommand } from "../../utils/process.js";

export const DEFAULT_VNC_PORT = 5900;

const NOT_CONNECTED_MESSAGE = "Not connected to VNC server. Use 'connect' action first.";
const REGION_NOTE = "(Note: vncdotool command-line doesn't support region capture, full screen captured instead)";

export const VNC_KEY_HELP = `SUPPORTED KEY MAPPINGS:
- Special keys: bsp, tab, return/enter, esc, ins, delete/del, home, end, pgup, pgdn
- Arrow keys: left, up, right, down
- Function keys: f1-f20
- Modifiers: lshift/shift, rshift, lctrl/ctrl, rctrl, lalt/alt, ralt, lmeta/meta, rmeta
- Keypad: kp0-kp9, kpenter
- Other: slash, bslash, fslash, spacebar/space/sb

KEY COMBINATIONS:
Use hyphens to combine keys: 'lctrl-c' (Ctrl+C), 'lalt-f2' (Alt+F2), 'lctrl-lalt-del' (Ctrl+Alt+Del)`;

/**
 * Server address in vncdotool form: display 0 is the bare host, ports above
 * 5900 become display numbers, anything else is an explicit `host::port`.
 */
export function buildConnectionString(host: string, port: number): string {
  if (port === DEFAULT_VNC_PORT) return host;
  if (port > DEFAULT_VNC_PORT) return `${host}:${port - DEFAULT_VNC_PORT}`;
  return `${host}::${port}`;
}

export interface ImageTagOptions {
  title: string;
  alt: string;
  data: string;
  display: string;
  includeInNextCall: string;
}

export function imageTag(options: ImageTagOptions): string {
  return (
    `<img title="${options.title}" alt="${options.alt}" src="data:image/png;base64,${options.data}" ` +
    `display="${options.display}" include_in_next_call="${options.includeInNextCall}">`
  );
}

// ============================================================================
// Command client
// ============================================================================

export interface VncTarget {
  connection: string;
  password?: string;
}

type VncRun =
  | { ok: true; stdout: string }
  | { ok: false; result: ToolResult; timedOut: boolean; stderr: string };

/**
 * Runs vncdotool commands against a target.
 */
export class VncClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly executable: string,
    private readonly logger: Logger,
  ) {}

  async run(target: VncTarget, command: readonly string[], timeoutSeconds: number): Promise<VncRun> {
    const args = ["-s", target.connection];
    if (target.password) args.push("-p", target.password);
    args.push(...command);
    this.logger.debug(`vnc: ${this.executable} -s ${target.connection} ${command.join(" ")}`);

    const result = await this.runner(this.executable, args, { timeoutMs: timeoutSeconds * 1000, env: buildEnv() });
    if (result.timedOut) {
      return {
        ok: false,
        result: errorResult(`VNC command timed out after ${timeoutSeconds} seconds`, ToolErrorCodes.TIMED_OUT),
        timedOut: true,
        stderr: "",
      };
    }
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      return {
        ok: false,
        result: errorResult(`VNC command failed: ${stderr || "Command failed"}`),
        timedOut: false,
        stderr,
      };
    }
    return { ok: true, stdout: result.stdout.trim() || "Command executed successfully" };
  }

  /** Verify a server answers by capturing a throwaway screenshot. */
  async probe(target: VncTarget, timeoutSeconds: number): Promise<ToolResult> {
    const outcome = await this.run(target, ["capture", join(tmpdir(), "vnc_connection_test.png")], timeoutSeconds);
    if (outcome.ok) return okResult(`Successfully connected to VNC server at ${target.connection}`);
    if (outcome.timedOut) {
      return errorResult(
        `Connection to VNC server timed out after ${timeoutSeconds} seconds`,
        ToolErrorCodes.TIMED_OUT,
      );
    }
    return errorResult(`Failed to connect to VNC server: ${outcome.stderr || "Connection failed"}`);
  }

  async mouseMove(target: VncTarget, x: number, y: number, timeoutSeconds: number): Promise<ToolResult> {
    const outcome = await this.run(target, ["mousemove", String(x), String(y)], timeoutSeconds);
    return outcome.ok ? okResult(`Mouse moved to (${x}, ${y})`) : outcome.result;
  }

  async mouseClick(
    target: VncTarget,
    x: number,
    y: number,
    button: number,
    timeoutSeconds: number,
  ): Promise<ToolResult> {
    const moved = await this.run(target, ["mousemove", String(x), String(y)], timeoutSeconds);
    if (!moved.ok) return moved.result;
    const clicked = await this.run(target, ["click", String(button)], timeoutSeconds);
    return clicked.ok ? okResult(`Mouse clicked at (${x}, ${y}) with button ${button}`) : clicked.result;
  }

  async keyPress(target: VncTarget, key: string, timeoutSeconds: number): Promise<ToolResult> {
    const outcome = await this.run(target, ["key", key], timeoutSeconds);
    return outcome.ok ? okResult(`Key '${key}' pressed`) : outcome.result;
  }

  async typeText(target: VncTarget, text: string, timeoutSeconds: number): Promise<ToolResult> {
    const outcome = await this.run(target, ["type", text], timeoutSeconds);
    return outcome.ok ? okResult(`Typed text: ${text}`) : outcome.result;
  }

  /**
   * Capture the screen to `filename` and return `message` followed by the
   * image tag. A capture whose file cannot be encoded still succeeds.
   */
  async capture(
    target: VncTarget,
    filename: string,
    timeoutSeconds: number,
    message: string,
    tag: Omit<ImageTagOptions, "data">,
  ): Promise<ToolResult> {
    const outcome = await this.run(target, ["capture", filename], timeoutSeconds);
    if (!outcome.ok) return outcome.result;

    let data: string;
    try {
      data = (await readFile(filename)).toString("base64");
    } catch (err) {
      const reason = toErrorMessage(err);
      this.logger.error(`Error encoding image to base64: ${reason}`);
      return okResult(`${message} (base64 encoding failed: ${reason})`, {
        code: ToolErrorCodes.ENCODING_FAILURE,
        artifacts: { path: filename },
      });
    }
    return okResult(`${message}\n${imageTag({ ...tag, data })}`, { artifacts: { path: filename, base64: data } });
  }
}

// ============================================================================
// Shared parameter specs
// ============================================================================

export interface VncToolConfig {
  logger?: Logger;
  /** vncdotool executable (default: "vncdotool") */
  executable?: string;
  /** Default per-command timeout */
  timeoutSeconds?: number;
  runner?: CommandRunner;
}

const HOST_PARAMS: readonly ParameterSpec[] = [
  { name: "host", type: "string", description: "VNC server host (required for 'connect' action)", required: false },
  {
    name: "port",
    type: "integer",
    description: "VNC server port (default: 5900)",
    required: false,
    default: DEFAULT_VNC_PORT,
  },
  { name: "password", type: "string", description: "VNC server password (optional)", required: false },
];

const POINTER_PARAMS: readonly ParameterSpec[] = [
  { name: "x", type: "integer", description: "X coordinate for mouse actions", required: false },
  { name: "y", type: "integer", description: "Y coordinate for mouse actions", required: false },
];

function readPoint(params: ToolParams, action: string): { x: number; y: number } | ToolResult {
  const x = intParam(params, "x");
  const y = intParam(params, "y");
  if (x === undefined || y === undefined) {
    return missingParameter(`x and y coordinates are required for ${action} action`);
  }
  return { x, y };
}

function isPoint(value: { x: number; y: number } | ToolResult): value is { x: number; y: number } {
  return "x" in value;
}

// ============================================================================
// VNCComputerTool
// ============================================================================

export class VNCComputerTool implements ToolAdapter {
  readonly name = "vnc_computer";
  readonly description =
    "A tool for VNC automation using command-line vncdotool. Can control mouse, keyboard, and capture " +
    `screenshots from VNC sessions.\n\n${VNC_KEY_HELP}`;
  readonly category = "vnc";
  readonly actions = [
    "connect",
    "disconnect",
    "mouse_move",
    "mouse_click",
    "key_press",
    "type_text",
    "capture_screen",
    "capture_region",
  ] as const;
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly client: VncClient;
  private readonly timeoutSeconds: number;
  private readonly session = new SessionGuard("VNC", NOT_CONNECTED_MESSAGE);
  private target: VncTarget | null = null;

  constructor(config: VncToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.client = new VncClient(config.runner ?? runCommand, config.executable ?? "vncdotool", this.logger);
    this.timeoutSeconds = config.timeoutSeconds ?? 15;
    this.parameters = [
      {
        name: "action",
        type: "string",
        description:
          "Action to perform: connect, disconnect, mouse_move, mouse_click, key_press, type_text, " +
          "capture_screen, capture_region",
        required: true,
        enum: this.actions,
      },
      ...HOST_PARAMS,
      ...POINTER_PARAMS,
      {
        name: "button",
        type: "integer",
        description: "Mouse button (1=left, 2=middle, 3=right)",
        required: false,
        default: 1,
      },
      {
        name: "key",
        type: "string",
        description: "Key to press (required for 'key_press' action), e.g. 'return', 'lalt-f2', 'lctrl-c'",
        required: false,
      },
      { name: "text", type: "string", description: "Text to type (required for 'type_text' action)", required: false },
      {
        name: "filename",
        type: "string",
        description: "Filename for screen capture (required for 'capture_screen' and 'capture_region' actions)",
        required: false,
      },
      { name: "width", type: "integer", description: "Width for region capture", required: false },
      { name: "height", type: "integer", description: "Height for region capture", required: false },
      {
        name: "timeout",
        type: "number",
        description: `Timeout for the VNC operation in seconds (default: ${this.timeoutSeconds})`,
        required: false,
        default: this.timeoutSeconds,
      },
      {
        name: "img_title",
        type: "string",
        description: "Title attribute for the base64 image tag (capture_screen and capture_region)",
        required: false,
      },
      {
        name: "img_alt",
        type: "string",
        description: "Alt text for the base64 image tag (capture_screen and capture_region)",
        required: false,
      },
      {
        name: "display",
        type: "string",
        description: "Whether to display the screenshot (capture_screen and capture_region)",
        required: false,
        default: "true",
      },
      {
        name: "include_in_next_call",
        type: "string",
        description: "Whether to include the screenshot in the next agent call (capture_screen and capture_region)",
        required: false,
        default: "true",
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "VNC",
      {
        connect: (p) => this.connect(p),
        disconnect: () => this.disconnect(),
        mouse_move: (p) => this.connected(p, (target, timeout) => this.mouseMove(target, p, timeout)),
        mouse_click: (p) => this.connected(p, (target, timeout) => this.mouseClick(target, p, timeout)),
        key_press: (p) => this.connected(p, (target, timeout) => this.keyPress(target, p, timeout)),
        type_text: (p) => this.connected(p, (target, timeout) => this.typeText(target, p, timeout)),
        capture_screen: (p) => this.connected(p, (target, timeout) => this.captureScreen(target, p, timeout)),
        capture_region: (p) => this.connected(p, (target, timeout) => this.captureRegion(target, p, timeout)),
      },
      action,
      params,
      this.logger,
    );
  }

  async dispose(): Promise<void> {
    this.target = null;
    this.session.markClosed();
  }

  private timeoutOf(params: ToolParams): number {
    const timeout = numberParam(params, "timeout");
    return timeout !== undefined && timeout > 0 ? timeout : this.timeoutSeconds;
  }

  private async connected(
    params: ToolParams,
    run: (target: VncTarget, timeoutSeconds: number) => Promise<ToolResult>,
  ): Promise<ToolResult> {
    const blocked = this.session.gate(true);
    if (blocked) return blocked;
    if (this.target === null) return errorResult(NOT_CONNECTED_MESSAGE, ToolErrorCodes.NOT_OPEN);
    return run(this.target, this.timeoutOf(params));
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  private async connect(params: ToolParams): Promise<ToolResult> {
    const blocked = this.session.gate(false);
    if (blocked) return blocked;
    const host = nonEmptyParam(params, "host");
    if (host === undefined) return missingParameter("host is required for connect action");

    const target: VncTarget = {
      connection: buildConnectionString(host, intParam(params, "port") ?? DEFAULT_VNC_PORT),
      password: nonEmptyParam(params, "password"),
    };
    const result = await this.client.probe(target, this.timeoutOf(params));
    if (result.success) {
      this.target = target;
      this.session.markOpen();
    }
    return result;
  }

  private async disconnect(): Promise<ToolResult> {
    const blocked = this.session.gate(false);
    if (blocked) return blocked;
    this.target = null;
    this.session.markClosed();
    return okResult("Successfully disconnected from VNC server");
  }

  private async mouseMove(target: VncTarget, params: ToolParams, timeout: number): Promise<ToolResult> {
    const point = readPoint(params, "mouse_move");
    if (!isPoint(point)) return point;
    return this.client.mouseMove(target, point.x, point.y, timeout);
  }

  private async mouseClick(target: VncTarget, params: ToolParams, timeout: number): Promise<ToolResult> {
    const point = readPoint(params, "mouse_click");
    if (!isPoint(point)) return point;
    return this.client.mouseClick(target, point.x, point.y, intParam(params, "button") ?? 1, timeout);
  }

  private async keyPress(target: VncTarget, params: ToolParams, timeout: number): Promise<ToolResult> {
    const key = nonEmptyParam(params, "key");
    if (key === undefined) return missingParameter("key is required for key_press action");
    return this.client.keyPress(target, key, timeout);
  }

  private async typeText(target: VncTarget, params: ToolParams, timeout: number): Promise<ToolResult> {
    const text = nonEmptyParam(params, "text");
    if (text === undefined) return missingParameter("text is required for type_text action");
    return this.client.typeText(target, text, timeout);
  }

  private async captureScreen(target: VncTarget, params: ToolParams, timeout: number): Promise<ToolResult> {
    const filename = nonEmptyParam(params, "filename");
    if (filename === undefined) return missingParameter("filename is required for capture_screen action");
    return this.client.capture(target, filename, timeout, `Screen captured and saved to ${filename}`, {
      title: nonEmptyParam(params, "img_title") ?? "VNC Screenshot",
      alt: nonEmptyParam(params, "img_alt") ?? "VNC screen capture",
      display: nonEmptyParam(params, "display") ?? "true",
      includeInNextCall: nonEmptyParam(params, "include_in_next_call") ?? "true",
    });
  }

  private async captureRegion(target: VncTarget, params: ToolParams, timeout: number): Promise<ToolResult> {
    const x = intParam(params, "x");
    const y = intParam(params, "y");
    const width = intParam(params, "width");
    const height = intParam(params, "height");
    const filename = nonEmptyParam(params, "filename");
    if (x === undefined || y === undefined || width === undefined || height === undefined || filename === undefined) {
      return missingParameter("x, y, width, height, and filename are required for capture_region action");
    }
    return this.client.capture(target, filename, timeout, `Screen captured to ${filename} ${REGION_NOTE}`, {
      title: nonEmptyParam(params, "img_title") ?? "VNC Region Screenshot",
      alt: nonEmptyParam(params, "img_alt") ?? `VNC region capture at (${x},${y}) ${width}x${height}`,
      display: nonEmptyParam(params, "display") ?? "true",
      includeInNextCall: nonEmptyParam(params, "include_in_next_call") ?? "true",
    });
  }
}

// ============================================================================
// SimpleVNCComputerTool
// ============================================================================

/**
 * Stateless VNC control: each call names its own target.
 */
export class SimpleVNCComputerTool implements ToolAdapter {
  readonly name = "simple_vnc_computer";
  readonly description = "A simplified VNC automation tool using command-line vncdotool for basic operations.";
  readonly category = "vnc";
  readonly actions = ["connect", "disconnect", "mouse_click", "key_press", "type_text"] as const;
  readonly parameters: readonly ParameterSpec[];

  private readonly logger: Logger;
  private readonly client: VncClient;

  constructor(config: VncToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.client = new VncClient(config.runner ?? runCommand, config.executable ?? "vncdotool", this.logger);
    this.parameters = [
      {
        name: "action",
        type: "string",
        description: "Action to perform: connect, disconnect, mouse_click, key_press, type_text",
        required: true,
        enum: this.actions,
      },
      ...HOST_PARAMS,
      ...POINTER_PARAMS,
      { name: "key", type: "string", description: "Key to press (required for 'key_press' action)", required: false },
      { name: "text", type: "string", description: "Text to type (required for 'type_text' action)", required: false },
      {
        name: "timeout",
        type: "number",
        description: "Timeout for the VNC operation in seconds (default: 10)",
        required: false,
        default: 10,
      },
    ];
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "Simple VNC",
      {
        connect: (p) => this.client.probe(targetOf(p), timeoutOf(p)),
        disconnect: async () => okResult("Successfully disconnected from VNC server"),
        mouse_click: async (p) => {
          const point = readPoint(p, "mouse_click");
          if (!isPoint(point)) return point;
          return this.client.mouseClick(targetOf(p), point.x, point.y, 1, timeoutOf(p));
        },
        key_press: async (p) => {
          const key = nonEmptyParam(p, "key");
          if (key === undefined) return missingParameter("key is required for key_press action");
          return this.client.keyPress(targetOf(p), key, timeoutOf(p));
        },
        type_text: async (p) => {
          const text = nonEmptyParam(p, "text");
          if (text === undefined) return missingParameter("text is required for type_text action");
          return this.client.typeText(targetOf(p), text, timeoutOf(p));
        },
      },
      action,
      params,
      this.logger,
    );
  }
}

function targetOf(params: ToolParams): VncTarget {
  return {
    connection: buildConnectionString(
      nonEmptyParam(params, "host") ?? "localhost",
      intParam(params, "port") ?? DEFAULT_VNC_PORT,
    ),
    password: nonEmptyParam(params, "password"),
  };
}

function timeoutOf(params: ToolParams): number {
  const timeout = numberParam(params, "timeout");
  return timeout !== undefined && timeout > 0 ? timeout : 10;
}
