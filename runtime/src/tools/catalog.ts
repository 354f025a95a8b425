/**
 * Capability registry: the catalog of tools this process can offer.
 *
 * Every tool is declared statically with the feature it depends on. Feature
 * probes run once in {@link ToolCatalog.create}; their answers are frozen
 * into the descriptor table and never revisited.
 *
 * @example
 * ```typescript
 * const catalog = await ToolCatalog.create({ config, logger });
 * catalog.listTools('web');                 // ['web_search', ...]
 * const tools = catalog.createWebToolset(); // fresh adapters
 * ```
 *
 * @module
 */

import type { ParameterSpec, ToolAdapter, ToolCategory, ToolContext, ToolResult } from './types.js';
import { TOOL_CATEGORIES, errorResult } from './types.js';
import { ToolNotFoundError } from './errors.js';
import { ToolErrorCodes, toErrorMessage } from '../types/errors.js';
import type { ToolkitConfig } from '../config/schema.js';
import { defaultToolkitConfig } from '../config/schema.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { canImport } from '../utils/lazy-import.js';
import { hasExecutable } from '../utils/which.js';
import { hasKey } from '../utils/type-guards.js';
import { BashTool } from './execution/bash.js';
import { CodeExecutorTool, SafeCodeExecutorTool } from './execution/code-executor.js';
import { FileEditorTool } from './files/file-editor.js';
import { FileReaderTool, FileWriterTool } from './files/file-io.js';
import { PlanningTool } from './planning/planning.js';
import { BingSearchTool, DuckDuckGoSearchTool, GoogleSearchTool, WebSearchTool } from './web/search.js';
import { SimpleWebScraperTool, WebCrawlerTool } from './web/crawler.js';
import { BrowserTool, SimpleBrowserTool } from './browser/browser.js';
import { MacOSTool, SimpleMacOSTool } from './macos/macos.js';
import { SimpleVNCComputerTool, VNCComputerTool } from './vnc/vnc.js';
import { ChatCompletionTool, SimplePromptTool } from './ai/chat.js';

// ============================================================================
// Types
// ============================================================================

export type ToolFeature = 'core' | 'cheerio' | 'playwright' | 'macos' | 'vncdotool' | 'llm';

export const TOOL_FEATURES: readonly ToolFeature[] = ['core', 'cheerio', 'playwright', 'macos', 'vncdotool', 'llm'];

export type FeatureProbe = (context: ToolContext) => boolean | Promise<boolean>;

export type ToolFactory = (context: ToolContext) => ToolAdapter;

export interface ToolDeclaration {
  readonly name: string;
  readonly category: ToolCategory;
  readonly feature: ToolFeature;
  readonly create: ToolFactory;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly category: ToolCategory;
  readonly feature: ToolFeature;
  readonly available: boolean;
  /** Why the tool is unavailable */
  readonly reason?: string;
}

export interface UnavailableDiagnostic {
  tool: string;
  feature: ToolFeature;
  reason: string;
}

export interface ToolInfo {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: readonly ParameterSpec[];
  actions: readonly string[];
  outputType: 'string';
}

export type Lookup<T> = { found: true; value: T } | { found: false; error: ToolResult };

export type CollectionName = 'basic' | 'web' | 'development' | 'ai';

export interface ToolCatalogOptions {
  config?: ToolkitConfig;
  logger?: Logger;
  /** Replace individual feature probes */
  probes?: Partial<Record<ToolFeature, FeatureProbe>>;
  /** Called once per unavailable tool */
  onUnavailable?: (diagnostic: UnavailableDiagnostic) => void;
  /** Override the declaration list */
  declarations?: readonly ToolDeclaration[];
}

// ============================================================================
// Declarations
// ============================================================================

const LLM_PACKAGES = ['openai', '@anthropic-ai/sdk', 'ollama', '@aws-sdk/client-bedrock-runtime'];

export const DEFAULT_PROBES: Readonly<Record<ToolFeature, FeatureProbe>> = {
  core: () => true,
  cheerio: () => canImport('cheerio'),
  playwright: () => canImport('playwright'),
  macos: async () => process.platform === 'darwin' && (await hasExecutable('osascript')),
  vncdotool: ({ config }) => hasExecutable(config.vnc.executable),
  llm: async () => {
    for (const pkg of LLM_PACKAGES) {
      if (await canImport(pkg)) return true;
    }
    return false;
  },
};

function webPageConfig({ logger, config }: ToolContext) {
  return { logger, userAgent: config.web.userAgent, timeoutMs: config.web.timeoutMs };
}

function searchConfig({ logger, config }: ToolContext) {
  return { logger, ...config.web };
}

/** Every tool, in declaration order. */
export const TOOL_DECLARATIONS: readonly ToolDeclaration[] = [
  {
    name: 'bash',
    category: 'execution',
    feature: 'core',
    create: ({ logger, config }) => new BashTool({ logger, ...config.bash }),
  },
  {
    name: 'code_executor',
    category: 'execution',
    feature: 'core',
    create: ({ logger, config }) => new CodeExecutorTool({ logger, ...config.codeExecutor }),
  },
  {
    name: 'safe_code_executor',
    category: 'execution',
    feature: 'core',
    create: ({ logger, config }) => new SafeCodeExecutorTool({ logger, ...config.codeExecutor }),
  },
  {
    name: 'file_editor',
    category: 'files',
    feature: 'core',
    create: ({ logger, config }) => new FileEditorTool({ logger, ...config.files }),
  },
  { name: 'file_reader', category: 'files', feature: 'core', create: ({ logger }) => new FileReaderTool(logger) },
  { name: 'file_writer', category: 'files', feature: 'core', create: ({ logger }) => new FileWriterTool(logger) },
  { name: 'planning', category: 'planning', feature: 'core', create: ({ logger }) => new PlanningTool({ logger }) },
  { name: 'web_search', category: 'web', feature: 'cheerio', create: (ctx) => new WebSearchTool(searchConfig(ctx)) },
  {
    name: 'duckduckgo_search',
    category: 'web',
    feature: 'cheerio',
    create: (ctx) => new DuckDuckGoSearchTool(searchConfig(ctx)),
  },
  {
    name: 'google_search',
    category: 'web',
    feature: 'cheerio',
    create: (ctx) => new GoogleSearchTool(searchConfig(ctx)),
  },
  { name: 'bing_search', category: 'web', feature: 'cheerio', create: (ctx) => new BingSearchTool(searchConfig(ctx)) },
  {
    name: 'web_crawler',
    category: 'web',
    feature: 'cheerio',
    create: (ctx) => new WebCrawlerTool({ ...webPageConfig(ctx), chat: ctx.config.chat }),
  },
  {
    name: 'simple_web_scraper',
    category: 'web',
    feature: 'cheerio',
    create: (ctx) => new SimpleWebScraperTool(webPageConfig(ctx)),
  },
  {
    name: 'browser',
    category: 'browser',
    feature: 'playwright',
    create: ({ logger, config }) => new BrowserTool({ logger, ...config.browser }),
  },
  {
    name: 'simple_browser',
    category: 'browser',
    feature: 'playwright',
    create: ({ logger }) => new SimpleBrowserTool({ logger }),
  },
  {
    name: 'macos',
    category: 'macos',
    feature: 'macos',
    create: ({ logger, config }) => new MacOSTool({ logger, ...config.macos }),
  },
  {
    name: 'simple_macos',
    category: 'macos',
    feature: 'macos',
    create: ({ logger, config }) => new SimpleMacOSTool({ logger, ...config.macos }),
  },
  {
    name: 'vnc_computer',
    category: 'vnc',
    feature: 'vncdotool',
    create: ({ logger, config }) => new VNCComputerTool({ logger, ...config.vnc }),
  },
  {
    name: 'simple_vnc_computer',
    category: 'vnc',
    feature: 'vncdotool',
    create: ({ logger, config }) => new SimpleVNCComputerTool({ logger, executable: config.vnc.executable }),
  },
  {
    name: 'chat_completion',
    category: 'ai',
    feature: 'llm',
    create: ({ logger, config }) => new ChatCompletionTool({ logger, chat: config.chat }),
  },
  {
    name: 'simple_prompt',
    category: 'ai',
    feature: 'llm',
    create: ({ logger, config }) => new SimplePromptTool({ logger, chat: config.chat }),
  },
];

export const TOOL_COLLECTIONS: Readonly<Record<CollectionName, readonly string[]>> = {
  basic: ['bash', 'code_executor', 'file_editor', 'web_search', 'simple_browser'],
  web: ['web_search', 'web_crawler', 'browser', 'simple_web_scraper'],
  development: ['bash', 'code_executor', 'file_editor', 'file_reader', 'file_writer', 'web_search', 'planning'],
  ai: ['chat_completion', 'simple_prompt', 'web_search', 'planning', 'file_editor'],
};

function notFound(name: string): { found: false; error: ToolResult } {
  return { found: false, error: errorResult(`Tool not found: "${name}"`, ToolErrorCodes.NOT_FOUND) };
}

// ============================================================================
// ToolCatalog
// ============================================================================

/**
 * Availability table built once per process.
 */
export class ToolCatalog {
  private readonly descriptors: ReadonlyMap<string, ToolDescriptor>;
  private readonly factories: ReadonlyMap<string, ToolFactory>;
  private readonly context: ToolContext;

  private constructor(
    descriptors: readonly ToolDescriptor[],
    declarations: readonly ToolDeclaration[],
    context: ToolContext,
  ) {
    this.descriptors = new Map(descriptors.map((d) => [d.name, Object.freeze(d)]));
    this.factories = new Map(declarations.map((d) => [d.name, d.create]));
    this.context = context;
  }

  /**
   * Run each feature probe once and freeze the results.
   *
   * A probe that returns false or throws marks its tools unavailable.
   */
  static async create(options: ToolCatalogOptions = {}): Promise<ToolCatalog> {
    const context: ToolContext = {
      logger: options.logger ?? silentLogger,
      config: options.config ?? defaultToolkitConfig(),
    };
    const declarations = options.declarations ?? TOOL_DECLARATIONS;
    const probes = { ...DEFAULT_PROBES, ...options.probes };

    const outcomes = new Map<ToolFeature, string | undefined>();
    for (const feature of new Set(declarations.map((d) => d.feature))) {
      outcomes.set(feature, await runProbe(feature, probes[feature], context));
    }

    const descriptors = declarations.map((declaration): ToolDescriptor => {
      const reason = outcomes.get(declaration.feature);
      const base = { name: declaration.name, category: declaration.category, feature: declaration.feature };
      if (reason === undefined) return { ...base, available: true };

      context.logger.debug(`Tool "${declaration.name}" unavailable: ${reason}`);
      options.onUnavailable?.({ tool: declaration.name, feature: declaration.feature, reason });
      return { ...base, available: false, reason };
    });

    return new ToolCatalog(descriptors, declarations, context);
  }

  /** Available tool names in declaration order, optionally for one category. */
  listTools(category?: string): string[] {
    const names: string[] = [];
    for (const descriptor of this.descriptors.values()) {
      if (!descriptor.available) continue;
      if (category !== undefined && descriptor.category !== category) continue;
      names.push(descriptor.name);
    }
    return names;
  }

  /** Categories with at least one available tool. */
  categories(): ToolCategory[] {
    return TOOL_CATEGORIES.filter((category) => this.listTools(category).length > 0);
  }

  /** Every declared tool, available or not. */
  descriptorsTable(): ToolDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  getTool(name: string): Lookup<ToolDescriptor> {
    const descriptor = this.descriptors.get(name);
    return descriptor?.available ? { found: true, value: descriptor } : notFound(name);
  }

  createTool(name: string): Lookup<ToolAdapter> {
    const factory = this.availableFactory(name);
    return factory ? { found: true, value: factory(this.context) } : notFound(name);
  }

  /**
   * @throws ToolNotFoundError if the tool is undeclared or unavailable
   */
  requireTool(name: string): ToolAdapter {
    const factory = this.availableFactory(name);
    if (!factory) throw new ToolNotFoundError(name);
    return factory(this.context);
  }

  getToolInfo(name: string): Lookup<ToolInfo> {
    const lookup = this.createTool(name);
    if (!lookup.found) return lookup;
    const tool = lookup.value;
    return {
      found: true,
      value: {
        name: tool.name,
        description: tool.description,
        category: tool.category,
        parameters: tool.parameters,
        actions: tool.actions,
        outputType: 'string',
      },
    };
  }

  /** Fresh instances of the available names among `names`, in the given order. */
  createToolSuite(names?: readonly string[]): ToolAdapter[] {
    const wanted = names ?? this.listTools();
    const tools: ToolAdapter[] = [];
    for (const name of wanted) {
      const factory = this.availableFactory(name);
      if (factory) tools.push(factory(this.context));
    }
    return tools;
  }

  // ==========================================================================
  // Collections
  // ==========================================================================

  /** Declared members of a collection that are available, in declared order. */
  resolveCollection(name: CollectionName): string[] {
    return TOOL_COLLECTIONS[name].filter((tool) => this.descriptors.get(tool)?.available === true);
  }

  createCollection(name: CollectionName): ToolAdapter[] {
    return this.createToolSuite(this.resolveCollection(name));
  }

  createBasicToolset(): ToolAdapter[] {
    return this.createCollection('basic');
  }

  createWebToolset(): ToolAdapter[] {
    return this.createCollection('web');
  }

  createDevelopmentToolset(): ToolAdapter[] {
    return this.createCollection('development');
  }

  createAiToolset(): ToolAdapter[] {
    return this.createCollection('ai');
  }

  private availableFactory(name: string): ToolFactory | undefined {
    return this.descriptors.get(name)?.available ? this.factories.get(name) : undefined;
  }
}

export function isCollectionName(value: string): value is CollectionName {
  return hasKey(TOOL_COLLECTIONS, value);
}

/** Reason the feature is unavailable, or `undefined` when it is available. */
async function runProbe(feature: ToolFeature, probe: FeatureProbe, context: ToolContext): Promise<string | undefined> {
  try {
    return (await probe(context)) ? undefined : `feature probe "${feature}" returned false`;
  } catch (err) {
    return `feature probe "${feature}" failed: ${toErrorMessage(err)}`;
  }
}
