// Structured (non-streaming) completion decoding

import { z } from 'zod';
import type { AssistantReply, ToolCall } from './types.js';

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(''),
  }),
});

const completionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullish(),
        tool_calls: z.array(toolCallSchema).nullish(),
      }),
      finish_reason: z.string().nullish(),
    })
  ),
});

/**
 * Decode `{choices: [{message: {role, content, tool_calls?}}]}` into the first
 * choice's reply. Returns null when the body has no usable choice.
 */
export function decodeCompletion(body: unknown): AssistantReply | null {
  const parsed = completionSchema.safeParse(body);
  if (!parsed.success || parsed.data.choices.length === 0) return null;

  const choice = parsed.data.choices[0];
  const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map((tc) => ({
    id: tc.id,
    type: 'function',
    function: { name: tc.function.name, arguments: tc.function.arguments },
  }));

  return {
    content: choice.message.content ?? '',
    toolCalls,
    ...(choice.finish_reason ? { finishReason: choice.finish_reason } : {}),
  };
}
