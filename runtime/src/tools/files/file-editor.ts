/**
 * File viewing and editing with per-path undo history.
 *
 * @module
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, missingParameter, nonEmptyParam, numberListParam, stringParam } from "../action.js";
import { ToolErrorCodes } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";

export interface FileEditorConfig {
  logger?: Logger;
  /** Undo states kept per path (default: 10) */
  historyLimit?: number;
}

const DEFAULT_HISTORY_LIMIT = 10;

/** Split into lines, each keeping its line terminator. */
function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export class FileEditorTool implements ToolAdapter {
  readonly name = "file_editor";
  readonly description =
    "View, create and edit files. Commands: view (optionally a line range), create, " +
    "str_replace (exactly one occurrence), undo_edit.";
  readonly category = "files";
  readonly actions = ["view", "create", "str_replace", "undo_edit", "edit", "undo"] as const;
  readonly parameters: readonly ParameterSpec[] = [
    {
      name: "action",
      type: "string",
      description: "Command to execute: view, create, str_replace, undo_edit",
      required: true,
      enum: ["view", "create", "str_replace", "undo_edit", "edit", "undo"],
    },
    { name: "path", type: "string", description: "Absolute path to file or directory", required: true },
    { name: "file_text", type: "string", description: "Required for 'create'. Content of the file", required: false },
    { name: "old_str", type: "string", description: "Required for 'str_replace'. String to be replaced", required: false },
    { name: "new_str", type: "string", description: "Required for 'str_replace'. Replacement string", required: false },
    {
      name: "view_range",
      type: "string",
      description: "Optional for 'view'. Range of lines to view, e.g. '[1, 50]'",
      required: false,
    },
  ];

  private readonly logger: Logger;
  private readonly historyLimit: number;
  private readonly history = new Map<string, string[]>();

  constructor(config: FileEditorConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.historyLimit = config.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    const withPath = (handler: (path: string, p: ToolParams) => Promise<ToolResult>) => (p: ToolParams) => {
      const path = nonEmptyParam(p, "path");
      return path === undefined ? Promise.resolve(missingParameter("path is required")) : handler(resolve(path), p);
    };
    const replace = withPath((path, p) => this.strReplace(path, p));
    const undo = withPath((path) => this.undoEdit(path));
    return dispatchAction(
      "File editor",
      {
        view: withPath((path, p) => this.view(path, p)),
        create: withPath((path, p) => this.create(path, p)),
        str_replace: replace,
        undo_edit: undo,
        edit: replace,
        undo,
      },
      action,
      params,
      this.logger,
    );
  }

  /** Number of undo states held for `path`. */
  historyDepth(path: string): number {
    return this.history.get(resolve(path))?.length ?? 0;
  }

  private async view(path: string, params: ToolParams): Promise<ToolResult> {
    if (!existsSync(path)) return errorResult(`File not found: ${path}`, ToolErrorCodes.NOT_FOUND);

    let lines = splitLinesKeepEnds(await readFile(path, "utf-8"));
    let firstLine = 1;
    let header = `Here's the result of running \`view\` on ${path}:\n`;

    const range = numberListParam(params, "view_range");
    if (range && range.length === 2) {
      const start = Math.max(1, range[0]);
      const end = Math.min(lines.length, range[1]);
      lines = lines.slice(start - 1, end);
      firstLine = start;
      header = `Here's the result of running \`view\` on ${path} (lines ${start}-${end}):\n`;
    }

    const body = lines.map((line, i) => `${String(firstLine + i).padStart(6)}|${line}`).join("");
    return okResult(header + body);
  }

  private async create(path: string, params: ToolParams): Promise<ToolResult> {
    const fileText = stringParam(params, "file_text");
    if (fileText === undefined) return missingParameter("file_text is required for create command");
    if (existsSync(path)) {
      return errorResult(`File already exists: ${path}. Use str_replace to edit.`);
    }
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, fileText, "utf-8");
    this.logger.debug(`file_editor: created ${path}`);
    return okResult(`File created successfully at ${path}`);
  }

  private async strReplace(path: string, params: ToolParams): Promise<ToolResult> {
    const oldStr = stringParam(params, "old_str");
    const newStr = stringParam(params, "new_str");
    if (oldStr === undefined || oldStr === "" || newStr === undefined) {
      return missingParameter("old_str and new_str are required for str_replace command");
    }
    if (!existsSync(path)) return errorResult(`File not found: ${path}`, ToolErrorCodes.NOT_FOUND);

    const content = await readFile(path, "utf-8");
    const count = countOccurrences(content, oldStr);
    if (count === 0) return errorResult(`String not found in file: ${oldStr}`);
    if (count > 1) return errorResult(`Multiple occurrences found (${count}). Please be more specific.`);

    this.pushHistory(path, content);
    await writeFile(path, content.replace(oldStr, () => newStr), "utf-8");
    return okResult(`String replaced successfully in ${path}`);
  }

  private async undoEdit(path: string): Promise<ToolResult> {
    const previous = this.history.get(path)?.pop();
    if (previous === undefined) return errorResult(`No previous state found for ${path}`);
    await writeFile(path, previous, "utf-8");
    return okResult(`Undid last edit to ${path}`);
  }

  private pushHistory(path: string, content: string): void {
    const states = this.history.get(path) ?? [];
    states.push(content);
    if (states.length > this.historyLimit) states.shift();
    this.history.set(path, states);
  }
}
