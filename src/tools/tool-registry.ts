// Tool Registry - name -> (schema, callable), owned by one conversation loop

import { EventEmitter } from 'node:events';
import type { ToolSchema } from '../llm/types.js';
import { errorMessage } from '../core/errors.js';

export type ToolArguments = Record<string, unknown>;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>; // JSON Schema
  execute: (args: ToolArguments) => Promise<string> | string;
  validateParams?: (args: ToolArguments) => { valid: boolean; error?: string };
}

export interface ToolExecution {
  toolName: string;
  content: string;
  found: boolean;
  isError: boolean;
  durationMs: number;
}

export interface ToolEvent {
  timestamp: number;
  toolName: string;
  phase: 'start' | 'complete' | 'error';
  args?: ToolArguments;
  error?: string;
  durationMs?: number;
}

export function toolNotFoundMessage(name: string): string {
  return `Tool '${name}' not found`;
}

export class ToolRegistry extends EventEmitter {
  private tools = new Map<string, ToolDefinition>();

  /** Registering an existing name replaces the previous entry. */
  register(tool: ToolDefinition): void {
    this.tools.set(tool.name, tool);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  listAll(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  /** Tool schemas in the wire format, in registration order. */
  schemas(): ToolSchema[] {
    return this.listAll().map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  /**
   * Execute a tool by name. Never throws: unknown tools, invalid parameters
   * and tool failures all come back as textual content.
   */
  async execute(name: string, args: ToolArguments): Promise<ToolExecution> {
    const start = Date.now();

    // 1. Check tool exists
    const tool = this.tools.get(name);
    if (!tool) {
      return {
        toolName: name,
        content: toolNotFoundMessage(name),
        found: false,
        isError: true,
        durationMs: 0,
      };
    }

    // 2. Validate params
    if (tool.validateParams) {
      let validation: { valid: boolean; error?: string };
      try {
        validation = tool.validateParams(args);
      } catch (err) {
        validation = { valid: false, error: errorMessage(err) };
      }
      if (!validation.valid) {
        const error = `Invalid parameters: ${validation.error ?? 'Validation failed'}`;
        this.emitToolEvent({ toolName: name, phase: 'error', error, durationMs: 0 });
        return { toolName: name, content: error, found: true, isError: true, durationMs: 0 };
      }
    }

    // 3. Execute tool
    this.emitToolEvent({ toolName: name, phase: 'start', args });
    try {
      const content = await tool.execute(args);
      const durationMs = Date.now() - start;
      this.emitToolEvent({ toolName: name, phase: 'complete', durationMs });
      return { toolName: name, content, found: true, isError: false, durationMs };
    } catch (err) {
      const durationMs = Date.now() - start;
      const error = errorMessage(err);
      this.emitToolEvent({ toolName: name, phase: 'error', error, durationMs });
      return {
        toolName: name,
        content: `Error executing tool '${name}': ${error}`,
        found: true,
        isError: true,
        durationMs,
      };
    }
  }

  private emitToolEvent(event: Omit<ToolEvent, 'timestamp'>): void {
    const full: ToolEvent = { timestamp: Date.now(), ...event };
    this.emit(`tool:${event.phase}`, full);
    this.emit('tool:event', full);
  }
}
