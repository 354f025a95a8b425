import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseArgv, runCli, toolParamsFromFlags } from './index.js';
import { ToolCatalog } from '../tools/catalog.js';

function createCapture() {
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  let out = '';
  let err = '';
  stdout.on('data', (chunk) => {
    out += chunk.toString('utf8');
  });
  stderr.on('data', (chunk) => {
    err += chunk.toString('utf8');
  });
  return {
    stdout,
    stderr,
    getOut: () => out.trim(),
    getErr: () => err.trim(),
  };
}

function coreOnlyCatalog(): Promise<ToolCatalog> {
  return ToolCatalog.create({
    probes: {
      cheerio: () => false,
      playwright: () => false,
      macos: () => false,
      vncdotool: () => false,
      llm: () => false,
    },
  });
}

describe('parseArgv', () => {
  it('splits positionals from coerced flags', () => {
    expect(parseArgv(['run', 'bash', '--command=echo hi', '--timeout', '5', '--verbose', '--dry', 'false'])).toEqual({
      positional: ['run', 'bash'],
      flags: { command: 'echo hi', timeout: 5, verbose: true, dry: false },
    });
  });

  it('keeps everything after -- as positional', () => {
    expect(parseArgv(['run', '--', '--not-a-flag'])).toEqual({ positional: ['run', '--not-a-flag'], flags: {} });
  });
});

describe('toolParamsFromFlags', () => {
  it('drops global flags and maps dashes to underscores', () => {
    expect(toolParamsFromFlags({ 'max-tokens': 5, config: 'x.json', 'log-level': 'debug', prompt: 'hi' })).toEqual({
      max_tokens: 5,
      prompt: 'hi',
    });
  });
});

describe('runCli', () => {
  let catalog: ToolCatalog;
  let dir: string;

  beforeEach(async () => {
    catalog = await coreOnlyCatalog();
    dir = await mkdtemp(join(tmpdir(), 'toolbelt-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prints usage without a command', async () => {
    const capture = createCapture();
    const code = await runCli({ argv: [], stdout: capture.stdout, stderr: capture.stderr, catalog });
    expect(code).toBe(0);
    expect(capture.getOut().split('\n')[0]).toBe('toolbelt <command> [options]');
  });

  it('shows a planning example that runs as printed', async () => {
    const help = createCapture();
    await runCli({ argv: ['help'], stdout: help.stdout, stderr: help.stderr, catalog });
    expect(help.getOut().split('\n')).toContain(
      '  toolbelt run planning create_plan --task-description "Ship the next version"',
    );

    const run = createCapture();
    const code = await runCli({
      argv: ['run', 'planning', 'create_plan', '--task-description', 'Ship the next version'],
      stdout: run.stdout,
      stderr: run.stderr,
      catalog,
    });
    expect(code).toBe(0);
    expect(run.getOut().split('\n')[0]).toBe("Created plan 'plan_1' for: Ship the next version");
  });

  it('rejects unknown commands with a usage status', async () => {
    const capture = createCapture();
    const code = await runCli({ argv: ['fly'], stdout: capture.stdout, stderr: capture.stderr, catalog });
    expect(code).toBe(2);
    expect(capture.getErr()).toBe('Unknown command: fly. Run "toolbelt help" for usage.');
  });

  it('lists available tools, optionally by category', async () => {
    const all = createCapture();
    expect(await runCli({ argv: ['list'], stdout: all.stdout, stderr: all.stderr, catalog })).toBe(0);
    expect(JSON.parse(all.getOut())).toEqual([
      'bash',
      'code_executor',
      'safe_code_executor',
      'file_editor',
      'file_reader',
      'file_writer',
      'planning',
    ]);

    const files = createCapture();
    await runCli({ argv: ['list', '--category', 'files'], stdout: files.stdout, stderr: files.stderr, catalog });
    expect(files.getOut()).toBe('["file_editor","file_reader","file_writer"]');
  });

  it('resolves collections', async () => {
    const capture = createCapture();
    expect(await runCli({ argv: ['collection', 'basic'], stdout: capture.stdout, stderr: capture.stderr, catalog })).toBe(0);
    expect(capture.getOut()).toBe('["bash","code_executor","file_editor"]');

    const bad = createCapture();
    expect(await runCli({ argv: ['collection', 'bogus'], stdout: bad.stdout, stderr: bad.stderr, catalog })).toBe(2);
    expect(bad.getErr()).toBe('Unknown collection: bogus. Available: basic, web, development, ai');
  });

  it('shows tool info and reports unknown tools', async () => {
    const capture = createCapture();
    expect(await runCli({ argv: ['info', 'file_reader'], stdout: capture.stdout, stderr: capture.stderr, catalog })).toBe(0);
    expect(JSON.parse(capture.getOut())).toEqual({
      name: 'file_reader',
      description: 'Read the full contents of a text file.',
      category: 'files',
      parameters: [{ name: 'path', type: 'string', description: 'Path of the file to read', required: true }],
      actions: ['read'],
      outputType: 'string',
    });

    const missing = createCapture();
    expect(await runCli({ argv: ['info', 'browser'], stdout: missing.stdout, stderr: missing.stderr, catalog })).toBe(2);
    expect(missing.getErr()).toBe('Tool not found: "browser"');
  });

  it('runs a tool call and prints its output', async () => {
    const path = join(dir, 'note.txt');

    const write = createCapture();
    const writeCode = await runCli({
      argv: ['run', 'file_writer', '--path', path, '--content', 'hello there'],
      stdout: write.stdout,
      stderr: write.stderr,
      catalog,
    });
    expect(writeCode).toBe(0);
    expect(write.getOut()).toBe(`Successfully wrote to ${path}`);

    const read = createCapture();
    const readCode = await runCli({
      argv: ['run', 'file_reader', 'read', `--path=${path}`],
      stdout: read.stdout,
      stderr: read.stderr,
      catalog,
    });
    expect(readCode).toBe(0);
    expect(read.getOut()).toBe('hello there');
  });

  it('exits 1 with the error text when the call fails', async () => {
    const path = join(dir, 'missing.txt');
    const capture = createCapture();
    const code = await runCli({
      argv: ['run', 'file_reader', '--path', path],
      stdout: capture.stdout,
      stderr: capture.stderr,
      catalog,
    });
    expect(code).toBe(1);
    expect(capture.getErr()).toBe(`Error: File not found: ${path}`);
  });

  it('reports an unknown action from the adapter', async () => {
    const capture = createCapture();
    const code = await runCli({
      argv: ['run', 'file_reader', 'delete', '--path', 'x'],
      stdout: capture.stdout,
      stderr: capture.stderr,
      catalog,
    });
    expect(code).toBe(1);
    expect(capture.getErr()).toBe('Error: Unknown action: delete. Available actions: read');
  });

  it('exits 1 when the config file cannot be read', async () => {
    const capture = createCapture();
    const code = await runCli({
      argv: ['list', '--config', join(dir, 'absent.json')],
      stdout: capture.stdout,
      stderr: capture.stderr,
      env: {},
    });
    expect(code).toBe(1);
    expect(capture.getErr()).toContain('Error: Failed to read config file at');
  });
});
