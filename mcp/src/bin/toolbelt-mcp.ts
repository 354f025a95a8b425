#!/usr/bin/env node
import { Console } from 'node:console';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ToolCatalog, createLogger, loadToolkitConfig, toErrorMessage } from '@toolbelt/runtime';
import { createServer } from '../server.js';

// stdout carries the protocol
const stderrConsole = new Console({ stdout: process.stderr, stderr: process.stderr });

async function main(): Promise<void> {
  const config = await loadToolkitConfig();
  const logger = createLogger(config.logLevel, '[toolbelt-mcp]', stderrConsole);
  const catalog = await ToolCatalog.create({ config, logger });
  const toolbelt = createServer(catalog, { logger });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info(`Received ${signal}, shutting down`);
    try {
      await toolbelt.close();
    } catch (error) {
      logger.error(`Shutdown failed: ${toErrorMessage(error)}`);
      process.exitCode = 1;
    }
    process.exit();
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.stdin.on('close', () => void shutdown('stdin close'));

  await toolbelt.server.connect(new StdioServerTransport());
  logger.info(`Serving ${toolbelt.adapters.length} tool(s) over stdio`);
}

main().catch((error: unknown) => {
  stderrConsole.error(toErrorMessage(error));
  process.exitCode = 1;
});
