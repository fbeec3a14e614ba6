import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

const transportConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'COMPLETIONS_API_KEY is required' })
    .min(1, 'COMPLETIONS_API_KEY is required'),
  baseUrl: z.string().url(),
  model: z.string().min(1),
});

const loopConfigSchema = z.object({
  maxIterations: z.number().int().positive(),
  systemPrompt: z.string().min(1).optional(),
});

const serverConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

const persistenceConfigSchema = z.object({
  enabled: z.boolean(),
  dbPath: z.string().min(1),
});

const sessionsConfigSchema = z.object({
  idleTimeoutMs: z.number().int().positive(),
});

const toolsConfigSchema = z.object({
  devTools: z.boolean(),
  workspaceRoot: z.string().min(1),
  execTimeoutMs: z.number().int().positive(),
});

const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS),
});

export const loopwiseConfigSchema = z.object({
  transport: transportConfigSchema,
  loop: loopConfigSchema,
  server: serverConfigSchema,
  persistence: persistenceConfigSchema,
  sessions: sessionsConfigSchema,
  tools: toolsConfigSchema,
  logging: loggingConfigSchema,
});

export type LoopwiseConfig = z.infer<typeof loopwiseConfigSchema>;

export function validateConfig(data: unknown): {
  success: boolean;
  data?: LoopwiseConfig;
  errors?: string[];
} {
  const result = loopwiseConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const errors = result.error.issues.map(
    (issue) => `${issue.path.join('.')}: ${issue.message}`
  );
  return { success: false, errors };
}
