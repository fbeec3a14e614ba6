import type { ToolDefinition, ToolRegistry } from './tool-registry.js';
import { evaluateExpression, formatNumber } from './expression.js';
import { executeCode, DEFAULT_EXEC_TIMEOUT } from './exec-impl.js';
import { executeFileOperation, FILE_OPERATIONS } from './file-ops-impl.js';
import { executeWebScrape } from './web-scrape-impl.js';
import { errorMessage } from '../core/errors.js';

function requireString(name: string) {
  return (params: Record<string, unknown>): { valid: boolean; error?: string } => {
    if (typeof params[name] !== 'string') {
      return { valid: false, error: `Parameter "${name}" is required and must be a string` };
    }
    return { valid: true };
  };
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local date-time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export const calculateTool: ToolDefinition = {
  name: 'calculate',
  description: 'Perform mathematical calculations. Supports +, -, *, /, //, %, **, sqrt, log, sin, cos, etc.',
  parameters: {
    type: 'object',
    properties: {
      expression: {
        type: 'string',
        description: 'The mathematical expression to evaluate',
      },
    },
    required: ['expression'],
  },
  validateParams: requireString('expression'),
  execute: (params) => {
    try {
      const value = evaluateExpression(String(params.expression));
      return `Result: ${formatNumber(value)}`;
    } catch (err) {
      return `Error calculating: ${errorMessage(err)}`;
    }
  },
};

export const currentTimeTool: ToolDefinition = {
  name: 'get_current_time',
  description: 'Get the current date and time',
  parameters: {
    type: 'object',
    properties: {},
    required: [],
  },
  execute: () => `Current date and time: ${formatLocalDateTime(new Date())}`,
};

export const searchWebTool: ToolDefinition = {
  name: 'search_web',
  description: "Search the web for information using the model's online capabilities",
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'The search query',
      },
    },
    required: ['query'],
  },
  validateParams: requireString('query'),
  // Search itself happens remotely in the model's online mode
  execute: (params) => `Searching web for: ${String(params.query)} (handled by the model's online search)`,
};

/**
 * Always-registered tools.
 */
export const builtinTools: ToolDefinition[] = [calculateTool, currentTimeTool, searchWebTool];

export function registerBuiltinTools(registry: ToolRegistry): void {
  for (const tool of builtinTools) {
    registry.register(tool);
  }
}

export interface DevToolsOptions {
  workspaceRoot: string;
  execTimeoutMs?: number;
}

export function createExecuteCodeTool(options: DevToolsOptions): ToolDefinition {
  return {
    name: 'execute_code',
    description: 'Execute a bash snippet and return its output',
    parameters: {
      type: 'object',
      properties: {
        code: { type: 'string', description: 'Code to execute' },
        language: {
          type: 'string',
          description: 'Programming language (only bash is supported)',
          default: 'bash',
        },
      },
      required: ['code'],
    },
    validateParams: requireString('code'),
    execute: (params) =>
      executeCode(String(params.code), typeof params.language === 'string' ? params.language : 'bash', {
        timeout: options.execTimeoutMs ?? DEFAULT_EXEC_TIMEOUT,
        cwd: options.workspaceRoot,
      }),
  };
}

export function createFileOperationsTool(options: DevToolsOptions): ToolDefinition {
  return {
    name: 'file_operations',
    description: 'Read, write, or list files inside the workspace',
    parameters: {
      type: 'object',
      properties: {
        operation: {
          type: 'string',
          enum: [...FILE_OPERATIONS],
          description: 'File operation to perform',
        },
        path: { type: 'string', description: 'File or directory path' },
        content: { type: 'string', description: 'Content to write (for write operation)' },
      },
      required: ['operation', 'path'],
    },
    validateParams: (params) => {
      if (typeof params.operation !== 'string') {
        return { valid: false, error: 'Parameter "operation" is required and must be a string' };
      }
      return requireString('path')(params);
    },
    execute: (params) =>
      executeFileOperation(
        String(params.operation),
        String(params.path),
        typeof params.content === 'string' ? params.content : undefined,
        options.workspaceRoot,
      ),
  };
}

export const webScrapeTool: ToolDefinition = {
  name: 'web_scrape',
  description: 'Scrape content from a web page',
  parameters: {
    type: 'object',
    properties: {
      url: { type: 'string', description: 'URL to scrape' },
      selector: { type: 'string', description: 'CSS selector (optional)' },
    },
    required: ['url'],
  },
  validateParams: (params) => {
    if (typeof params.url !== 'string') {
      return { valid: false, error: 'Parameter "url" is required and must be a string' };
    }
    try {
      new URL(params.url);
    } catch {
      return { valid: false, error: `Invalid URL: ${params.url}` };
    }
    return { valid: true };
  },
  execute: (params) =>
    executeWebScrape(String(params.url), typeof params.selector === 'string' ? params.selector : undefined),
};

/**
 * Register the development tools (code execution, file access, scraping).
 * These are opt-in; they are not part of the default registry.
 */
export function registerDevTools(registry: ToolRegistry, options: DevToolsOptions): void {
  registry.register(createExecuteCodeTool(options));
  registry.register(createFileOperationsTool(options));
  registry.register(webScrapeTool);
}
