// Conversation Loop - bounded request -> tool dispatch -> re-request cycle

import { EventEmitter } from 'node:events';
import { readFile, writeFile } from 'node:fs/promises';
import type { Transport } from '../llm/transport.js';
import type {
  AssistantMessage,
  ChatMessage,
  CompletionRequest,
  ToolCall,
  ToolMessage,
} from '../llm/types.js';
import { decodeCompletion } from '../llm/completion.js';
import { accumulateStream } from '../llm/stream-decoder.js';
import { chatHistorySchema } from '../llm/message-schema.js';
import { ToolRegistry, type ToolArguments } from '../tools/tool-registry.js';
import { HistoryFileError, TurnInProgressError, errorMessage } from '../core/errors.js';

export const DEFAULT_MAX_ITERATIONS = 10;
export const MAX_ITERATIONS_MESSAGE = 'Max iterations reached. Ending conversation turn.';
export const NO_RESPONSE_MESSAGE = 'No response from API';

export type TurnMode = 'streaming' | 'tool_calling';

export type LoopState = 'requesting' | 'streaming_response' | 'awaiting_tool_results' | 'done';

/**
 * Legal state transitions per mode. Streaming never reaches
 * awaiting_tool_results and tool calling never streams.
 */
export const LOOP_TRANSITIONS: Record<TurnMode, Record<LoopState, readonly LoopState[]>> = {
  streaming: {
    done: ['requesting'],
    requesting: ['streaming_response', 'done'],
    streaming_response: ['done'],
    awaiting_tool_results: [],
  },
  tool_calling: {
    done: ['requesting'],
    requesting: ['awaiting_tool_results', 'done'],
    streaming_response: [],
    awaiting_tool_results: ['requesting', 'done'],
  },
};

export function canTransition(mode: TurnMode, from: LoopState, to: LoopState): boolean {
  return LOOP_TRANSITIONS[mode][from].includes(to);
}

export type LoopStepType = 'request' | 'tool_call' | 'tool_result' | 'response' | 'error';

export interface LoopStep {
  type: LoopStepType;
  iteration: number;
  timestamp: number;
  data: Record<string, unknown>;
}

export type FinishReason = 'completed' | 'max_iterations' | 'error';

export interface TurnResult {
  content: string;
  finishReason: FinishReason;
  iterations: number;
  mode: TurnMode;
  steps: LoopStep[];
}

export interface ConversationLoopConfig {
  model: string;
  maxIterations?: number;
  systemPrompt?: string;
}

export interface ConverseOptions {
  stream?: boolean;
}

type DecodedArguments = { ok: true; args: ToolArguments } | { ok: false; reason: string };

function decodeArguments(raw: string): DecodedArguments {
  if (raw.trim() === '') return { ok: true, args: {} };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, reason: errorMessage(err) };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, reason: 'arguments must be a JSON object' };
  }
  return { ok: true, args: Object.fromEntries(Object.entries(parsed)) };
}

export function invalidArgumentsMessage(name: string, reason: string): string {
  return `Error: invalid arguments for tool '${name}': ${reason}`;
}

export class ConversationLoop extends EventEmitter {
  readonly tools: ToolRegistry;
  readonly model: string;
  readonly maxIterations: number;
  private readonly transport: Transport;
  private readonly systemPrompt?: string;
  private history: ChatMessage[] = [];
  private state: LoopState = 'done';
  private mode: TurnMode = 'tool_calling';

  constructor(transport: Transport, config: ConversationLoopConfig, tools: ToolRegistry = new ToolRegistry()) {
    super();
    this.transport = transport;
    this.tools = tools;
    this.model = config.model;
    this.maxIterations = config.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.systemPrompt = config.systemPrompt;
    this.resetHistory();
  }

  getState(): LoopState {
    return this.state;
  }

  getHistory(): ChatMessage[] {
    return [...this.history];
  }

  get historyLength(): number {
    return this.history.length;
  }

  clearHistory(): void {
    if (this.state !== 'done') throw new TurnInProgressError();
    this.resetHistory();
  }

  /** Write the history to `path` as a JSON array of messages. */
  async saveHistory(path: string): Promise<void> {
    await writeFile(path, JSON.stringify(this.history, null, 2) + '\n', 'utf-8');
  }

  /**
   * Replace the history with the messages saved at `path`. The file is
   * rejected as a whole when any entry is not a valid message; the history is
   * then left as it was. Returns the number of messages loaded.
   */
  async loadHistory(path: string): Promise<number> {
    if (this.state !== 'done') throw new TurnInProgressError();

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, 'utf-8'));
    } catch (err) {
      throw new HistoryFileError(path, [errorMessage(err)]);
    }

    const result = chatHistorySchema.safeParse(parsed);
    if (!result.success) {
      throw new HistoryFileError(
        path,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    // A turn may have started while the file was read
    if (this.state !== 'done') throw new TurnInProgressError();

    this.history = [];
    for (const message of result.data) {
      this.append(message);
    }
    return this.history.length;
  }

  /**
   * Run one turn. A non-empty `userText` is appended as a user message; the
   * loop then requests completions until the model answers without tool
   * calls, the transport fails, or `maxIterations` rounds have been used.
   * Every outcome is returned as text.
   */
  async converse(userText: string, options: ConverseOptions = {}): Promise<TurnResult> {
    if (this.state !== 'done') throw new TurnInProgressError();

    const mode: TurnMode = options.stream ? 'streaming' : 'tool_calling';
    this.mode = mode;
    const steps: LoopStep[] = [];
    let iteration = 0;

    if (userText.length > 0) {
      this.append({ role: 'user', content: userText });
    }

    const finish = (content: string, finishReason: FinishReason): TurnResult => {
      if (this.state !== 'done') this.transition('done');
      return { content, finishReason, iterations: iteration, mode, steps };
    };

    try {
      while (iteration < this.maxIterations) {
        iteration++;
        this.transition('requesting');

        const request = this.buildRequest(mode === 'streaming');
        this.emitStep(steps, 'request', iteration, {
          messageCount: request.messages.length,
          toolCount: request.tools?.length ?? 0,
          stream: request.stream,
        });

        if (mode === 'streaming') {
          const opened = await this.transport.openStream(request);
          if (!opened.ok) {
            this.emitStep(steps, 'error', iteration, { error: opened.error, status: opened.status });
            return finish(opened.error, 'error');
          }

          this.transition('streaming_response');
          const text = await accumulateStream(opened.value, (token) => this.emit('token', token));
          if (text.length > 0) {
            this.append({ role: 'assistant', content: text });
          }
          this.emitStep(steps, 'response', iteration, { contentLength: text.length, streamed: true });
          return finish(text, 'completed');
        }

        const sent = await this.transport.complete(request);
        if (!sent.ok) {
          this.emitStep(steps, 'error', iteration, { error: sent.error, status: sent.status });
          return finish(sent.error, 'error');
        }

        const reply = decodeCompletion(sent.value);
        if (!reply) {
          this.emitStep(steps, 'error', iteration, { error: NO_RESPONSE_MESSAGE });
          return finish(NO_RESPONSE_MESSAGE, 'error');
        }

        if (reply.toolCalls.length > 0) {
          this.append({ role: 'assistant', content: reply.content, tool_calls: reply.toolCalls });
          this.transition('awaiting_tool_results');

          // Replies go back in the order the model emitted the calls
          for (const call of reply.toolCalls) {
            this.append(await this.dispatch(call, iteration, steps));
          }
          continue;
        }

        this.append({ role: 'assistant', content: reply.content });
        this.emitStep(steps, 'response', iteration, {
          contentLength: reply.content.length,
          finishReason: reply.finishReason,
        });
        return finish(reply.content, 'completed');
      }

      return finish(MAX_ITERATIONS_MESSAGE, 'max_iterations');
    } catch (err) {
      const content = `API Error: ${errorMessage(err)}`;
      this.emitStep(steps, 'error', iteration, { error: content });
      return finish(content, 'error');
    }
  }

  private async dispatch(call: ToolCall, iteration: number, steps: LoopStep[]): Promise<ToolMessage> {
    const name = call.function.name;
    const reply = (content: string): ToolMessage => ({
      role: 'tool',
      tool_call_id: call.id,
      name,
      content,
    });

    this.emitStep(steps, 'tool_call', iteration, {
      toolName: name,
      toolCallId: call.id,
      arguments: call.function.arguments,
    });

    const decoded = decodeArguments(call.function.arguments);
    if (!decoded.ok) {
      const content = invalidArgumentsMessage(name, decoded.reason);
      this.emitStep(steps, 'tool_result', iteration, { toolName: name, toolCallId: call.id, isError: true });
      return reply(content);
    }

    const result = await this.tools.execute(name, decoded.args);
    this.emitStep(steps, 'tool_result', iteration, {
      toolName: name,
      toolCallId: call.id,
      found: result.found,
      isError: result.isError,
      contentLength: result.content.length,
    });
    return reply(result.content);
  }

  private buildRequest(stream: boolean): CompletionRequest {
    const tools = this.tools.schemas();
    return {
      model: this.model,
      messages: [...this.history],
      stream,
      ...(tools.length > 0 ? { tools } : {}),
    };
  }

  private append(message: ChatMessage): void {
    if (message.role === 'assistant') {
      this.history.push(Object.freeze(freezeToolCalls(message)));
      return;
    }
    this.history.push(Object.freeze({ ...message }));
  }

  private resetHistory(): void {
    this.history = [];
    if (this.systemPrompt) {
      this.append({ role: 'system', content: this.systemPrompt });
    }
  }

  private transition(to: LoopState): void {
    if (!canTransition(this.mode, this.state, to)) {
      throw new Error(`Illegal loop transition ${this.state} -> ${to} in ${this.mode} mode`);
    }
    this.state = to;
    this.emit('state', to);
  }

  private emitStep(
    steps: LoopStep[],
    type: LoopStepType,
    iteration: number,
    data: Record<string, unknown>
  ): void {
    const step: LoopStep = {
      type,
      iteration,
      timestamp: Date.now(),
      data,
    };
    steps.push(step);
    this.emit('step', step);
  }
}

function freezeToolCalls(message: AssistantMessage): AssistantMessage {
  if (!message.tool_calls) return { ...message };
  return {
    ...message,
    tool_calls: message.tool_calls.map((tc) =>
      Object.freeze({ ...tc, function: Object.freeze({ ...tc.function }) })
    ),
  };
}
