import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { writeFile, readFile, mkdir, rm } from 'node:fs/promises';

// Subprocesses go through the shell runner; mock it before importing exec-impl
const { mockRunShell } = vi.hoisted(() => ({ mockRunShell: vi.fn() }));
vi.mock('../src/tools/shell-runner.js', () => ({
  runShell: (...args: unknown[]) => mockRunShell(...args),
}));

import { executeCode, DEFAULT_EXEC_TIMEOUT } from '../src/tools/exec-impl.js';
import { executeFileOperation, validatePath } from '../src/tools/file-ops-impl.js';
import { executeWebScrape } from '../src/tools/web-scrape-impl.js';
import { ToolRegistry } from '../src/tools/tool-registry.js';
import { registerDevTools } from '../src/tools/builtin-tools.js';

const testDir = join(tmpdir(), 'loopwise-tools-test-' + Date.now());

beforeEach(async () => {
  await mkdir(testDir, { recursive: true });
});

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true });
});

function shellResult(fields: { stdout?: string; stderr?: string; exitCode?: number | null; timedOut?: boolean }) {
  return { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...fields };
}

// -------------------------------------------------------
// execute_code
// -------------------------------------------------------
describe('executeCode', () => {
  beforeEach(() => {
    mockRunShell.mockReset();
  });

  it('should run bash through the shell with the timeout', async () => {
    mockRunShell.mockResolvedValue(shellResult({ stdout: 'hi\n' }));

    const result = await executeCode('echo hi', 'bash', { cwd: '/tmp/ws' });

    expect(result).toBe('Output:\nhi\n\n');
    expect(mockRunShell).toHaveBeenCalledWith('echo hi', {
      timeoutMs: DEFAULT_EXEC_TIMEOUT,
      maxOutputBytes: 1024 * 1024,
      cwd: '/tmp/ws',
    });
  });

  it('should accept the language name in any case', async () => {
    mockRunShell.mockResolvedValue(shellResult({ stdout: 'ok', stderr: 'warn' }));

    expect(await executeCode('true', 'BASH')).toBe('Output:\nok\nwarn');
  });

  it('should refuse languages other than bash', async () => {
    expect(await executeCode('print(1)', 'python')).toBe("Language 'python' not supported");
    expect(mockRunShell).not.toHaveBeenCalled();
  });

  it('should report a timeout', async () => {
    mockRunShell.mockResolvedValue(shellResult({ stdout: 'partial', exitCode: null, timedOut: true }));

    expect(await executeCode('sleep 10', 'bash', { timeout: 50 })).toBe(
      'Execution error: command timed out after 50ms'
    );
  });

  it('should return output of a failing command', async () => {
    mockRunShell.mockResolvedValue(shellResult({ stdout: 'partial', stderr: 'boom', exitCode: 1 }));

    expect(await executeCode('exit 1', 'bash')).toBe('Output:\npartial\nboom');
  });

  it('should report a shell that cannot start', async () => {
    mockRunShell.mockRejectedValue(new Error('spawn /bin/sh ENOENT'));

    expect(await executeCode('ls', 'bash')).toBe('Execution error: spawn /bin/sh ENOENT');
  });

  it('should pass the configured timeout through the tool', async () => {
    mockRunShell.mockResolvedValue(shellResult({}));
    const registry = new ToolRegistry();
    registerDevTools(registry, { workspaceRoot: testDir, execTimeoutMs: 1234 });

    await registry.execute('execute_code', { code: 'pwd' });

    expect(mockRunShell).toHaveBeenCalledWith('pwd', {
      timeoutMs: 1234,
      maxOutputBytes: 1024 * 1024,
      cwd: testDir,
    });
  });
});

// -------------------------------------------------------
// file_operations
// -------------------------------------------------------
describe('validatePath', () => {
  it('should accept paths inside the workspace', () => {
    const result = validatePath('notes/a.txt', testDir);
    expect(result.valid).toBe(true);
    expect(result.resolved).toBe(join(resolve(testDir), 'notes', 'a.txt'));
  });

  it('should reject traversal segments', () => {
    expect(validatePath('../secret', testDir)).toEqual({
      valid: false,
      resolved: '',
      error: 'Path traversal detected in "../secret"',
    });
  });

  it('should reject absolute paths outside the workspace', () => {
    const result = validatePath('/etc/passwd', testDir);
    expect(result.valid).toBe(false);
    expect(result.error).toBe(`Path "/etc/passwd" resolves outside workspace root "${resolve(testDir)}"`);
  });

  it('should reject sibling directories sharing a prefix', () => {
    expect(validatePath(`${resolve(testDir)}-other/file`, testDir).valid).toBe(false);
  });
});

describe('executeFileOperation', () => {
  it('should write then read a file', async () => {
    expect(await executeFileOperation('write', 'notes/a.txt', 'hello', testDir)).toBe(
      'Successfully wrote to notes/a.txt'
    );
    expect(await readFile(join(testDir, 'notes', 'a.txt'), 'utf-8')).toBe('hello');
    expect(await executeFileOperation('read', 'notes/a.txt', undefined, testDir)).toBe('File content:\nhello');
  });

  it('should list a directory sorted', async () => {
    await writeFile(join(testDir, 'b.txt'), 'b');
    await mkdir(join(testDir, 'a-dir'));

    expect(await executeFileOperation('list', '.', undefined, testDir)).toBe('Directory contents:\na-dir\nb.txt');
  });

  it('should reject unknown operations', async () => {
    expect(await executeFileOperation('delete', 'b.txt', undefined, testDir)).toBe('Unknown operation: delete');
  });

  it('should refuse traversal', async () => {
    expect(await executeFileOperation('read', '../../etc/passwd', undefined, testDir)).toBe(
      'File operation error: Path traversal detected in "../../etc/passwd"'
    );
  });

  it('should report missing files', async () => {
    const result = await executeFileOperation('read', 'missing.txt', undefined, testDir);
    expect(result.startsWith('File operation error: ENOENT')).toBe(true);
  });
});

// -------------------------------------------------------
// web_scrape
// -------------------------------------------------------
const PAGE = [
  '<html>',
  '<head><title> Test  Page </title><script>var hidden = 1;</script></head>',
  '<body>',
  '<h1>Heading</h1>',
  '<p class="item">First   item</p>',
  '<p class="item">Second item</p>',
  '<style>.item { color: red; }</style>',
  '</body>',
  '</html>',
].join('\n');

describe('executeWebScrape', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should summarise the page title and text', async () => {
    const fetchMock = vi.fn(async () => new Response(PAGE));
    vi.stubGlobal('fetch', fetchMock);

    const result = await executeWebScrape('https://example.test/page');

    expect(result).toBe('Page title: Test Page\nText content (first 500 chars): Heading First item Second item');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should list elements matching a selector', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(PAGE)));

    expect(await executeWebScrape('https://example.test/page', '.item')).toBe(
      'Found 2 elements:\nFirst item\nSecond item'
    );
  });

  it('should truncate element text to 100 characters', async () => {
    const long = 'x'.repeat(150);
    vi.stubGlobal('fetch', vi.fn(async () => new Response(`<div class="c">${long}</div>`)));

    expect(await executeWebScrape('https://example.test', '.c')).toBe(`Found 1 elements:\n${'x'.repeat(100)}`);
  });

  it('should time out a body that never completes', async () => {
    vi.useFakeTimers();
    const cancel = vi.fn(async () => {});
    const stalled = {
      ok: true,
      status: 200,
      body: {
        getReader: () => ({
          read: () => new Promise<never>(() => {}),
          cancel,
        }),
      },
    };
    vi.stubGlobal('fetch', vi.fn(async () => stalled));

    try {
      const pending = executeWebScrape('https://example.test/slow');
      await vi.advanceTimersByTimeAsync(10_000);

      expect(await pending).toBe('Scraping error: Request timed out after 10s');
      expect(cancel).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should stop reading once the size limit is reached', async () => {
    const chunk = new TextEncoder().encode('a'.repeat(64 * 1024));
    const read = vi.fn(async () => ({ done: false, value: chunk }));
    const cancel = vi.fn(async () => {});
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => ({ ok: true, status: 200, body: { getReader: () => ({ read, cancel }) } }))
    );

    const result = await executeWebScrape('https://example.test/endless');

    expect(result).toBe(`Page title: No title\nText content (first 500 chars): ${'a'.repeat(500)}`);
    expect(read).toHaveBeenCalledTimes(16);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should report fetch failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new Error('network down'))));

    expect(await executeWebScrape('https://example.test')).toBe('Scraping error: network down');
  });
});
