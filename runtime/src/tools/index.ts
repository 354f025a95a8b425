/**
 * Tool adapters and the capability registry.
 *
 * @module
 */

export type {
  JSONSchema,
  ParameterDefault,
  ParameterSpec,
  ParameterType,
  ToolAdapter,
  ToolCategory,
  ToolContext,
  ToolEnvelope,
  ToolParams,
  ToolResult,
  ToolResultMetadata,
} from './types.js';
export { TOOL_CATEGORIES, errorResult, okResult, resultCode, toEnvelope } from './types.js';

export { ToolNotFoundError } from './errors.js';
export { SessionGuard } from './session.js';
export type { SessionState } from './session.js';
export {
  dispatchAction,
  unknownAction,
  missingParameter,
  invalidParameter,
  stringParam,
  nonEmptyParam,
  numberParam,
  intParam,
  boolParam,
  numberListParam,
  listParam,
} from './action.js';
export type { ActionHandler } from './action.js';

export {
  ToolCatalog,
  TOOL_COLLECTIONS,
  TOOL_DECLARATIONS,
  TOOL_FEATURES,
  DEFAULT_PROBES,
  isCollectionName,
} from './catalog.js';
export type {
  CollectionName,
  FeatureProbe,
  Lookup,
  ToolCatalogOptions,
  ToolDeclaration,
  ToolDescriptor,
  ToolFactory,
  ToolFeature,
  ToolInfo,
  UnavailableDiagnostic,
} from './catalog.js';

// Execution
export { BashTool } from './execution/bash.js';
export type { BashToolConfig } from './execution/bash.js';
export { CodeExecutorTool, SafeCodeExecutorTool, RESTRICTED_MODULES, RESTRICTED_GLOBALS } from './execution/code-executor.js';
export type { CodeExecutorConfig } from './execution/code-executor.js';

// Files
export { FileEditorTool } from './files/file-editor.js';
export type { FileEditorConfig } from './files/file-editor.js';
export { FileReaderTool, FileWriterTool } from './files/file-io.js';

// Planning
export { PlanningTool, suggestBreakdown } from './planning/planning.js';
export type { Plan, PlanTask, PlanningToolConfig, TaskStatus } from './planning/planning.js';

// Web
export {
  WebSearchTool,
  DuckDuckGoSearchTool,
  GoogleSearchTool,
  BingSearchTool,
  SEARCH_ENGINES,
} from './web/search.js';
export type { SearchEngine, SearchResult, WebSearchConfig } from './web/search.js';
export { WebCrawlerTool, SimpleWebScraperTool, EXTRACTION_STRATEGIES, createProviderExtractor } from './web/crawler.js';
export type {
  ContentExtractor,
  ExtractionStrategy,
  ScrapeFormat,
  WebCrawlerConfig,
  WebPageToolConfig,
} from './web/crawler.js';

// Browser
export { BrowserTool, SimpleBrowserTool, launchChromium } from './browser/browser.js';
export type { BrowserHandle, BrowserLauncher, BrowserPage, BrowserToolConfig } from './browser/browser.js';

// macOS
export { MacOSTool, SimpleMacOSTool, DENIED_PATTERNS, checkScript } from './macos/macos.js';
export type { MacOSToolConfig } from './macos/macos.js';

// VNC
export { VNCComputerTool, SimpleVNCComputerTool, buildConnectionString, imageTag } from './vnc/vnc.js';
export type { ImageTagOptions, VncToolConfig } from './vnc/vnc.js';

// AI
export { ChatCompletionTool, SimplePromptTool } from './ai/chat.js';
export type { ChatToolConfig } from './ai/chat.js';
