/**
 * Whole-file read and write tools.
 *
 * @module
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, missingParameter, nonEmptyParam, stringParam } from "../action.js";
import { ToolErrorCodes } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";

export class FileReaderTool implements ToolAdapter {
  readonly name = "file_reader";
  readonly description = "Read the full contents of a text file.";
  readonly category = "files";
  readonly actions = ["read"] as const;
  readonly defaultAction = "read";
  readonly parameters: readonly ParameterSpec[] = [
    { name: "path", type: "string", description: "Path of the file to read", required: true },
  ];

  constructor(private readonly logger: Logger = silentLogger) {}

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("File reader", { read: (p) => this.read(p) }, action, params, this.logger);
  }

  private async read(params: ToolParams): Promise<ToolResult> {
    const raw = nonEmptyParam(params, "path");
    if (raw === undefined) return missingParameter("path is required");
    const path = resolve(raw);
    if (!existsSync(path)) return errorResult(`File not found: ${path}`, ToolErrorCodes.NOT_FOUND);
    return okResult(await readFile(path, "utf-8"));
  }
}

export class FileWriterTool implements ToolAdapter {
  readonly name = "file_writer";
  readonly description = "Write text to a file, creating parent directories and replacing existing content.";
  readonly category = "files";
  readonly actions = ["write"] as const;
  readonly defaultAction = "write";
  readonly parameters: readonly ParameterSpec[] = [
    { name: "path", type: "string", description: "Path of the file to write", required: true },
    { name: "content", type: "string", description: "Text to write", required: true },
  ];

  constructor(private readonly logger: Logger = silentLogger) {}

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction("File writer", { write: (p) => this.write(p) }, action, params, this.logger);
  }

  private async write(params: ToolParams): Promise<ToolResult> {
    const raw = nonEmptyParam(params, "path");
    const content = stringParam(params, "content");
    if (raw === undefined || content === undefined) {
      return missingParameter("path and content are required");
    }
    const path = resolve(raw);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
    this.logger.debug(`file_writer: wrote ${content.length} chars to ${path}`);
    return okResult(`Successfully wrote to ${path}`);
  }
}
