// File Operations Implementation - read, write, list inside a workspace root

import { readFile, writeFile, mkdir, readdir } from 'node:fs/promises';
import { resolve, normalize, dirname, isAbsolute, sep } from 'node:path';
import { errorMessage } from '../core/errors.js';

export const FILE_OPERATIONS = ['read', 'write', 'list'] as const;
export type FileOperation = (typeof FILE_OPERATIONS)[number];

const MAX_FILE_SIZE = 5 * 1024 * 1024; // 5MB read limit

function isFileOperation(value: string): value is FileOperation {
  return FILE_OPERATIONS.some((op) => op === value);
}

/**
 * Validate that a file path is within the allowed workspace.
 * Blocks path traversal attacks (../../).
 */
export function validatePath(
  filePath: string,
  workspaceRoot?: string,
): { valid: boolean; resolved: string; error?: string } {
  const absoluteRoot = resolve(workspaceRoot ?? process.cwd());

  // Block explicit traversal patterns first
  if (filePath.split(/[\\/]/).includes('..')) {
    return {
      valid: false,
      resolved: '',
      error: `Path traversal detected in "${filePath}"`,
    };
  }

  const resolved = normalize(isAbsolute(filePath) ? filePath : resolve(absoluteRoot, filePath));

  if (resolved !== absoluteRoot && !resolved.startsWith(absoluteRoot + sep)) {
    return {
      valid: false,
      resolved,
      error: `Path "${filePath}" resolves outside workspace root "${absoluteRoot}"`,
    };
  }

  return { valid: true, resolved };
}

export async function executeFileOperation(
  operation: string,
  path: string,
  content: string | undefined,
  workspaceRoot?: string,
): Promise<string> {
  if (!isFileOperation(operation)) {
    return `Unknown operation: ${operation}`;
  }

  try {
    const validation = validatePath(path, workspaceRoot);
    if (!validation.valid) {
      throw new Error(validation.error);
    }

    switch (operation) {
      case 'read': {
        const text = await readFile(validation.resolved, 'utf-8');
        if (text.length > MAX_FILE_SIZE) {
          throw new Error(`File too large: ${text.length} bytes exceeds ${MAX_FILE_SIZE} byte limit`);
        }
        return `File content:\n${text}`;
      }
      case 'write':
        await mkdir(dirname(validation.resolved), { recursive: true });
        await writeFile(validation.resolved, content ?? '', 'utf-8');
        return `Successfully wrote to ${path}`;
      case 'list': {
        const items = await readdir(validation.resolved);
        return `Directory contents:\n${items.sort().join('\n')}`;
      }
    }
  } catch (err) {
    return `File operation error: ${errorMessage(err)}`;
  }
}
