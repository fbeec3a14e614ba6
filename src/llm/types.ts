// Chat-completion wire types

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // raw JSON text
  };
}

export interface SystemMessage {
  role: 'system';
  content: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  tool_calls?: ToolCall[];
}

export interface ToolMessage {
  role: 'tool';
  tool_call_id: string;
  name: string;
  content: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>; // JSON Schema
  };
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
  tools?: ToolSchema[];
}

/**
 * Outcome of a transport call. Failures carry the text that is surfaced to the
 * caller as the turn result.
 */
export type TransportResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; status?: number };

export interface AssistantReply {
  content: string;
  toolCalls: ToolCall[];
  finishReason?: string;
}

export interface TransportConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}
