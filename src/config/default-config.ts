import type { LoopwiseConfig } from './schema.js';

export const DEFAULT_BASE_URL = 'https://api.perplexity.ai';
export const DEFAULT_MODEL = 'llama-3.1-sonar-large-128k-online';
export const DEFAULT_DB_PATH = '.loopwise/conversations.db';

/**
 * Everything except the credential, which has no default.
 */
export function defaultConfig(cwd: string = process.cwd()): Omit<LoopwiseConfig, 'transport'> & {
  transport: Omit<LoopwiseConfig['transport'], 'apiKey'>;
} {
  return {
    transport: {
      baseUrl: DEFAULT_BASE_URL,
      model: DEFAULT_MODEL,
    },
    loop: {
      maxIterations: 10,
    },
    server: {
      host: '0.0.0.0',
      port: 8000,
    },
    persistence: {
      enabled: true,
      dbPath: DEFAULT_DB_PATH,
    },
    sessions: {
      idleTimeoutMs: 30 * 60 * 1000, // 30 minutes
    },
    tools: {
      devTools: false,
      workspaceRoot: cwd,
      execTimeoutMs: 30_000,
    },
    logging: {
      level: 'info',
    },
  };
}
