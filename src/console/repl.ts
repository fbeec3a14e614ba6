// Console - interactive terminal front end over the chat service

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { v4 as uuidv4 } from 'uuid';
import type { ChatService } from '../core/chat-service.js';
import type { ChatMessage } from '../llm/types.js';
import { errorMessage } from '../core/errors.js';

export type ConsoleCommand =
  | { type: 'exit' }
  | { type: 'clear' }
  | { type: 'history' }
  | { type: 'stream' }
  | { type: 'tools' }
  | { type: 'save'; path: string }
  | { type: 'load'; path: string }
  | { type: 'empty' }
  | { type: 'message'; text: string };

const KEYWORDS: Record<string, ConsoleCommand> = {
  exit: { type: 'exit' },
  quit: { type: 'exit' },
  clear: { type: 'clear' },
  history: { type: 'history' },
  stream: { type: 'stream' },
  tools: { type: 'tools' },
};

export function parseConsoleInput(line: string): ConsoleCommand {
  const text = line.trim();
  if (text === '') return { type: 'empty' };
  const keyword = text.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(KEYWORDS, keyword)) {
    return KEYWORDS[keyword];
  }
  const file = /^(save|load)\s+(.+)$/i.exec(text);
  if (file) {
    const path = file[2].trim();
    return file[1].toLowerCase() === 'save' ? { type: 'save', path } : { type: 'load', path };
  }
  return { type: 'message', text };
}

export function formatHistoryEntry(message: ChatMessage): string {
  switch (message.role) {
    case 'assistant':
      if (message.tool_calls && message.tool_calls.length > 0) {
        const names = message.tool_calls.map((tc) => tc.function.name).join(', ');
        const prefix = message.content ? `[assistant] ${message.content} ` : '[assistant] ';
        return `${prefix}(tool calls: ${names})`;
      }
      return `[assistant] ${message.content}`;
    case 'tool':
      return `[tool:${message.name}] ${message.content}`;
    default:
      return `[${message.role}] ${message.content}`;
  }
}

export interface ConsoleOptions {
  service: ChatService;
  input: Readable;
  output: Writable;
  sessionId?: string;
  stream?: boolean;
}

export const CONSOLE_BANNER = [
  '='.repeat(60),
  'Loopwise - tool-calling chat console',
  '='.repeat(60),
  "Type 'exit' or 'quit' to end the conversation",
  "Type 'clear' to clear conversation history",
  "Type 'history' to view conversation history",
  "Type 'stream' to toggle streaming mode",
  "Type 'tools' to list available tools",
  "Type 'save <file>' or 'load <file>' to save or restore the history",
  '='.repeat(60),
];

/**
 * Read lines from `input` until `exit`/`quit` or end of input. Returns the
 * session id used for the conversation.
 */
export async function runConsole(options: ConsoleOptions): Promise<string> {
  const { service, output } = options;
  const sessionId = options.sessionId ?? uuidv4();
  let streamMode = options.stream ?? false;

  const write = (text: string) => output.write(text);
  const writeLine = (text = '') => output.write(`${text}\n`);

  for (const line of CONSOLE_BANNER) writeLine(line);
  writeLine(`Model: ${service.model}`);
  writeLine();

  const sendAndPrint = async (text: string): Promise<void> => {
    write('Agent: ');
    let streamed = false;
    try {
      const result = await service.sendMessage({
        message: text,
        sessionId,
        stream: streamMode,
        onToken: (token) => {
          streamed = true;
          write(token);
        },
      });
      // Failures and non-streamed replies arrive whole
      writeLine(streamed ? '' : result.response);
    } catch (err) {
      writeLine(`Error: ${errorMessage(err)}`);
    }
    writeLine();
  };

  const rl = createInterface({ input: options.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  try {
    for (;;) {
      write('You: ');
      const next = await lines.next();
      if (next.done) {
        writeLine();
        break;
      }

      const command = parseConsoleInput(next.value);
      switch (command.type) {
        case 'empty':
          continue;
        case 'exit':
          writeLine('Goodbye!');
          return sessionId;
        case 'clear':
          service.clearHistory(sessionId);
          writeLine('Conversation history cleared');
          continue;
        case 'history': {
          const history = service.getHistory(sessionId);
          writeLine('Conversation History:');
          if (history.length === 0) writeLine('(empty)');
          for (const message of history) writeLine(formatHistoryEntry(message));
          continue;
        }
        case 'stream':
          streamMode = !streamMode;
          writeLine(`Streaming mode: ${streamMode ? 'ON' : 'OFF'}`);
          continue;
        case 'tools':
          for (const tool of service.listTools(sessionId)) {
            writeLine(`- ${tool.name}: ${tool.description}`);
          }
          continue;
        case 'save':
          try {
            await service.saveHistory(sessionId, command.path);
            writeLine(`Conversation history saved to ${command.path}`);
          } catch (err) {
            writeLine(`Error: ${errorMessage(err)}`);
          }
          continue;
        case 'load':
          try {
            const count = await service.loadHistory(sessionId, command.path);
            writeLine(`Loaded ${count} messages from ${command.path}`);
          } catch (err) {
            writeLine(`Error: ${errorMessage(err)}`);
          }
          continue;
        case 'message':
          await sendAndPrint(command.text);
          continue;
      }
    }
  } finally {
    rl.close();
  }

  return sessionId;
}
