import { Console } from 'node:console';
import type { CliCommand, CliRunOptions, CliRuntimeContext, CliStatusCode, ParsedArgv } from './types.js';
import { ToolCatalog, TOOL_COLLECTIONS, isCollectionName } from '../tools/catalog.js';
import { resultText, splitArguments } from '../bridges/framework.js';
import { loadToolkitConfig } from '../config/loader.js';
import { createLogger, isLogLevel } from '../utils/logger.js';
import { toErrorMessage } from '../types/errors.js';

const COMMANDS: readonly CliCommand[] = ['list', 'collection', 'info', 'run', 'help'];

/** Flags consumed by the CLI itself, never passed to a tool. */
const GLOBAL_FLAGS = new Set(['config', 'log-level', 'help', 'h']);

function buildHelp(): string {
  return [
    'toolbelt <command> [options]',
    '',
    'Commands:',
    '  list [--category <c>]                 List available tool names as JSON',
    '  collection <basic|web|development|ai> List the available members of a collection',
    '  info <tool>                           Show tool info as JSON',
    '  run <tool> [action] [--param value]   Execute one tool call',
    '  help                                  Show this usage',
    '',
    'Global options:',
    '  -h, --help                            Show this usage',
    '      --config <path>                   Config file path (default: ./toolbelt.config.json)',
    '      --log-level debug|info|warn|error',
    '',
    'Examples:',
    '  toolbelt list --category web',
    '  toolbelt info bash',
    '  toolbelt run bash --command "ls -la"',
    '  toolbelt run planning create_plan --task-description "Ship the next version"',
  ].join('\n');
}

export function parseArgv(argv: string[]): ParsedArgv {
  const positional: string[] = [];
  const flags: Record<string, string | number | boolean> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--') {
      positional.push(...argv.slice(index + 1));
      break;
    }

    if (!token.startsWith('-') || token === '-') {
      positional.push(token);
      continue;
    }

    if (token === '-h') {
      flags.h = true;
      continue;
    }

    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }

    const body = token.slice(2);
    if (!body) {
      continue;
    }

    const separator = body.indexOf('=');
    if (separator >= 0) {
      flags[body.slice(0, separator)] = parseStringValue(body.slice(separator + 1));
      continue;
    }

    const next = argv[index + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags[body] = parseStringValue(next);
      index += 1;
      continue;
    }

    flags[body] = true;
  }

  return { positional, flags };
}

export function parseStringValue(raw: string): string | number | boolean {
  const lowered = raw.toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  if (/^-?\d+$/.test(raw) && raw.length <= 15) {
    return Number.parseInt(raw, 10);
  }
  return raw;
}

/** Tool parameters from flags: globals dropped, `--max-tokens` read as `max_tokens`. */
export function toolParamsFromFlags(flags: ParsedArgv['flags']): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(flags)) {
    if (GLOBAL_FLAGS.has(name)) continue;
    params[name.replaceAll('-', '_')] = value;
  }
  return params;
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function createContext(stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream): CliRuntimeContext {
  return {
    output: (text) => {
      stdout.write(`${text}\n`);
    },
    error: (text) => {
      stderr.write(`${text}\n`);
    },
  };
}

async function buildCatalog(parsed: ParsedArgv, options: CliRunOptions, stderr: NodeJS.WritableStream) {
  const configPath = parsed.flags.config;
  const config = await loadToolkitConfig({
    path: typeof configPath === 'string' ? configPath : undefined,
    env: options.env,
  });
  const requested = parsed.flags['log-level'];
  const level = isLogLevel(requested) ? requested : config.logLevel;
  const logger = createLogger(level, '[toolbelt]', new Console({ stdout: stderr, stderr }));
  return ToolCatalog.create({ config, logger });
}

export async function runCli(options: CliRunOptions = {}): Promise<CliStatusCode> {
  const argv = options.argv ?? process.argv.slice(2);
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const context = createContext(stdout, stderr);

  const parsed = parseArgv(argv);
  const [command, ...rest] = parsed.positional;

  if (command === undefined || parsed.flags.help === true || parsed.flags.h === true) {
    context.output(buildHelp());
    return 0;
  }
  if (!isCommand(command)) {
    context.error(`Unknown command: ${command}. Run "toolbelt help" for usage.`);
    return 2;
  }
  if (command === 'help') {
    context.output(buildHelp());
    return 0;
  }

  let catalog: ToolCatalog;
  try {
    catalog = options.catalog ?? (await buildCatalog(parsed, options, stderr));
  } catch (error) {
    context.error(`Error: ${toErrorMessage(error)}`);
    return 1;
  }

  switch (command) {
    case 'list':
      return listCommand(context, catalog, parsed);
    case 'collection':
      return collectionCommand(context, catalog, rest[0]);
    case 'info':
      return infoCommand(context, catalog, rest[0]);
    case 'run':
      return runCommandLine(context, catalog, rest, parsed);
  }
}

function listCommand(context: CliRuntimeContext, catalog: ToolCatalog, parsed: ParsedArgv): CliStatusCode {
  const category = parsed.flags.category;
  context.output(JSON.stringify(catalog.listTools(typeof category === 'string' ? category : undefined)));
  return 0;
}

function collectionCommand(context: CliRuntimeContext, catalog: ToolCatalog, name: string | undefined): CliStatusCode {
  if (name === undefined || !isCollectionName(name)) {
    const available = Object.keys(TOOL_COLLECTIONS).join(', ');
    context.error(
      name === undefined
        ? `Collection name is required. Available: ${available}`
        : `Unknown collection: ${name}. Available: ${available}`,
    );
    return 2;
  }
  context.output(JSON.stringify(catalog.resolveCollection(name)));
  return 0;
}

function infoCommand(context: CliRuntimeContext, catalog: ToolCatalog, name: string | undefined): CliStatusCode {
  if (name === undefined) {
    context.error('Tool name is required: toolbelt info <tool>');
    return 2;
  }
  const info = catalog.getToolInfo(name);
  if (!info.found) {
    context.error(info.error.error ?? `Tool not found: "${name}"`);
    return 2;
  }
  context.output(JSON.stringify(info.value, null, 2));
  return 0;
}

async function runCommandLine(
  context: CliRuntimeContext,
  catalog: ToolCatalog,
  rest: string[],
  parsed: ParsedArgv,
): Promise<CliStatusCode> {
  const [name, explicitAction] = rest;
  if (name === undefined) {
    context.error('Tool name is required: toolbelt run <tool> [action] [--param value ...]');
    return 2;
  }
  const lookup = catalog.createTool(name);
  if (!lookup.found) {
    context.error(lookup.error.error ?? `Tool not found: "${name}"`);
    return 2;
  }

  const adapter = lookup.value;
  try {
    const kwargs = toolParamsFromFlags(parsed.flags);
    if (explicitAction !== undefined) kwargs.action = explicitAction;
    const split = splitArguments(adapter, kwargs);
    const result = await adapter.execute(explicitAction ?? split.action, split.params);

    if (result.success) {
      context.output(resultText(result));
      return 0;
    }
    context.error(resultText(result));
    return 1;
  } finally {
    await adapter.dispose?.();
  }
}
