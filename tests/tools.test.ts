import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ToolRegistry, type ToolDefinition, type ToolEvent } from '../src/tools/tool-registry.js';
import {
  builtinTools,
  calculateTool,
  currentTimeTool,
  formatLocalDateTime,
  registerBuiltinTools,
  registerDevTools,
  searchWebTool,
} from '../src/tools/builtin-tools.js';

function makeTool(overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    name: 'echo',
    description: 'Echo the input',
    parameters: { type: 'object', properties: { text: { type: 'string' } } },
    execute: (args) => `echo: ${String(args.text)}`,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// ToolRegistry
// ---------------------------------------------------------------------------

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
  });

  it('should register and execute a tool', async () => {
    registry.register(makeTool());

    const result = await registry.execute('echo', { text: 'hi' });

    expect(result).toMatchObject({ toolName: 'echo', content: 'echo: hi', found: true, isError: false });
  });

  it('should replace a tool registered under the same name', async () => {
    registry.register(makeTool());
    registry.register(makeTool({ description: 'second', execute: () => 'replaced' }));

    expect(registry.size).toBe(1);
    expect(registry.get('echo')?.description).toBe('second');
    expect((await registry.execute('echo', {})).content).toBe('replaced');
  });

  it('should report unknown tools without throwing', async () => {
    const result = await registry.execute('nope', {});

    expect(result).toEqual({
      toolName: 'nope',
      content: "Tool 'nope' not found",
      found: false,
      isError: true,
      durationMs: 0,
    });
  });

  it('should convert thrown errors into text', async () => {
    registry.register(
      makeTool({
        execute: () => {
          throw new Error('kaboom');
        },
      })
    );

    const result = await registry.execute('echo', {});

    expect(result.content).toBe("Error executing tool 'echo': kaboom");
    expect(result.isError).toBe(true);
  });

  it('should convert rejected promises into text', async () => {
    registry.register(makeTool({ execute: () => Promise.reject(new Error('async kaboom')) }));

    expect((await registry.execute('echo', {})).content).toBe("Error executing tool 'echo': async kaboom");
  });

  it('should run parameter validation before executing', async () => {
    const execute = vi.fn(() => 'ran');
    registry.register(
      makeTool({
        execute,
        validateParams: (args) =>
          typeof args.text === 'string' ? { valid: true } : { valid: false, error: 'text is required' },
      })
    );

    const result = await registry.execute('echo', {});

    expect(result.content).toBe('Invalid parameters: text is required');
    expect(execute).not.toHaveBeenCalled();
  });

  it('should report a throwing validator as invalid parameters', async () => {
    const execute = vi.fn(() => 'ran');
    registry.register(
      makeTool({
        execute,
        validateParams: () => {
          throw new Error('validator failed');
        },
      })
    );

    const result = await registry.execute('echo', { text: 'hi' });

    expect(result).toMatchObject({
      content: 'Invalid parameters: validator failed',
      found: true,
      isError: true,
    });
    expect(execute).not.toHaveBeenCalled();
  });

  it('should emit start and complete events', async () => {
    registry.register(makeTool());
    const events: ToolEvent[] = [];
    registry.on('tool:event', (e: ToolEvent) => events.push(e));

    await registry.execute('echo', { text: 'x' });

    expect(events.map((e) => e.phase)).toEqual(['start', 'complete']);
    expect(events[0].args).toEqual({ text: 'x' });
    expect(typeof events[1].durationMs).toBe('number');
  });

  it('should emit an error event when a tool throws', async () => {
    registry.register(makeTool({ execute: () => Promise.reject(new Error('bad')) }));
    const errors: ToolEvent[] = [];
    registry.on('tool:error', (e: ToolEvent) => errors.push(e));

    await registry.execute('echo', {});

    expect(errors).toHaveLength(1);
    expect(errors[0].error).toBe('bad');
  });

  it('should describe schemas in the wire format', () => {
    registry.register(makeTool());

    expect(registry.schemas()).toEqual([
      {
        type: 'function',
        function: {
          name: 'echo',
          description: 'Echo the input',
          parameters: { type: 'object', properties: { text: { type: 'string' } } },
        },
      },
    ]);
  });

  it('should keep registries independent', () => {
    const other = new ToolRegistry();
    registry.register(makeTool());

    expect(other.has('echo')).toBe(false);
    expect(registry.unregister('echo')).toBe(true);
    expect(registry.size).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Built-in tools
// ---------------------------------------------------------------------------

describe('built-in tools', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    registerBuiltinTools(registry);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should register calculate, get_current_time and search_web', () => {
    expect(registry.listAll().map((t) => t.name)).toEqual(['calculate', 'get_current_time', 'search_web']);
    expect(builtinTools).toEqual([calculateTool, currentTimeTool, searchWebTool]);
  });

  it('should calculate an expression', async () => {
    expect((await registry.execute('calculate', { expression: '2 + 3 * 4' })).content).toBe('Result: 14');
    expect((await registry.execute('calculate', { expression: 'sqrt(2) ** 2 > 1' })).content).toBe(
      "Error calculating: unexpected character '>' at position 13"
    );
  });

  it('should report calculation errors as text', async () => {
    expect((await registry.execute('calculate', { expression: '1/0' })).content).toBe(
      'Error calculating: division by zero'
    );
    expect((await registry.execute('calculate', { expression: 'open("x")' })).content).toBe(
      "Error calculating: unexpected character '\"' at position 5"
    );
  });

  it('should print infinity as inf', async () => {
    expect((await registry.execute('calculate', { expression: 'inf' })).content).toBe('Result: inf');
  });

  it('should require a string expression', async () => {
    expect((await registry.execute('calculate', { expression: 42 })).content).toBe(
      'Invalid parameters: Parameter "expression" is required and must be a string'
    );
  });

  it('should report the local date and time', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 5, 9, 3, 7));

    expect((await registry.execute('get_current_time', {})).content).toBe(
      'Current date and time: 2024-01-05 09:03:07'
    );
  });

  it('should acknowledge web searches', async () => {
    expect((await registry.execute('search_web', { query: 'typescript generics' })).content).toBe(
      "Searching web for: typescript generics (handled by the model's online search)"
    );
  });

  it('should format local date-times with zero padding', () => {
    expect(formatLocalDateTime(new Date(2023, 11, 31, 23, 59, 0))).toBe('2023-12-31 23:59:00');
  });
});

describe('registerDevTools', () => {
  it('should add the development tools', () => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry);
    registerDevTools(registry, { workspaceRoot: '/tmp/workspace' });

    expect(registry.listAll().map((t) => t.name)).toEqual([
      'calculate',
      'get_current_time',
      'search_web',
      'execute_code',
      'file_operations',
      'web_scrape',
    ]);
  });

  it('should validate scrape URLs', async () => {
    const registry = new ToolRegistry();
    registerDevTools(registry, { workspaceRoot: '/tmp/workspace' });

    expect((await registry.execute('web_scrape', { url: 'not a url' })).content).toBe(
      'Invalid parameters: Invalid URL: not a url'
    );
  });
});
