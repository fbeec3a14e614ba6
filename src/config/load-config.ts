// Config Loader - defaults, then an optional JSON file, then environment variables

import { readFileSync } from 'node:fs';
import { loopwiseConfigSchema, validateConfig, type LoopwiseConfig } from './schema.js';
import { defaultConfig } from './default-config.js';
import { ConfigurationError, errorMessage } from '../core/errors.js';

export type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  env?: Env;
  file?: string;
  cwd?: string;
}

type Section = Record<string, unknown>;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

// Unparseable values are passed through so the schema reports them
function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isNaN(n) ? value : n;
}

function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return value;
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function compact(section: Section): Section {
  return Object.fromEntries(Object.entries(section).filter(([, v]) => v !== undefined));
}

function fromEnv(env: Env): Record<keyof LoopwiseConfig, Section> {
  return {
    transport: compact({
      apiKey: envString(env.COMPLETIONS_API_KEY),
      baseUrl: envString(env.COMPLETIONS_BASE_URL),
      model: envString(env.COMPLETIONS_MODEL),
    }),
    loop: compact({
      maxIterations: envNumber(env.MAX_ITERATIONS),
      systemPrompt: envString(env.SYSTEM_PROMPT),
    }),
    server: compact({
      host: envString(env.HOST),
      port: envNumber(env.PORT),
    }),
    persistence: compact({
      enabled: envBoolean(env.PERSISTENCE_ENABLED),
      dbPath: envString(env.DB_PATH),
    }),
    sessions: compact({
      idleTimeoutMs: envNumber(env.SESSION_IDLE_TIMEOUT_MS),
    }),
    tools: compact({
      devTools: envBoolean(env.ENABLE_DEV_TOOLS),
      workspaceRoot: envString(env.WORKSPACE_ROOT),
      execTimeoutMs: envNumber(env.EXEC_TIMEOUT_MS),
    }),
    logging: compact({
      level: envString(env.LOG_LEVEL),
    }),
  };
}

function fromFile(path: string): Partial<Record<keyof LoopwiseConfig, Section>> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Failed to load config file ${path}`, [errorMessage(err)]);
  }

  const result = loopwiseConfigSchema.deepPartial().safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${path}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Resolve the process configuration. Throws ConfigurationError listing every
 * problem when the result does not validate (a missing credential included).
 */
export function loadConfig(options: LoadConfigOptions = {}): LoopwiseConfig {
  const defaults = defaultConfig(options.cwd);
  const file = options.file ? fromFile(options.file) : {};
  const env = fromEnv(options.env ?? process.env);

  const merged = {
    transport: { ...defaults.transport, ...file.transport, ...env.transport },
    loop: { ...defaults.loop, ...file.loop, ...env.loop },
    server: { ...defaults.server, ...file.server, ...env.server },
    persistence: { ...defaults.persistence, ...file.persistence, ...env.persistence },
    sessions: { ...defaults.sessions, ...file.sessions, ...env.sessions },
    tools: { ...defaults.tools, ...file.tools, ...env.tools },
    logging: { ...defaults.logging, ...file.logging, ...env.logging },
  };

  const validation = validateConfig(merged);
  if (!validation.success || !validation.data) {
    throw new ConfigurationError('Invalid configuration', validation.errors ?? []);
  }
  return validation.data;
}

/** Copy of the configuration safe to print. */
export function redactConfig(config: LoopwiseConfig): LoopwiseConfig {
  return {
    ...config,
    transport: { ...config.transport, apiKey: '[REDACTED]' },
  };
}
