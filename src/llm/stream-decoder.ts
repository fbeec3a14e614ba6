// Server-sent event decoding for streamed chat completions

import { z } from 'zod';

const DATA_PREFIX = 'data: ';
const DONE_TOKEN = '[DONE]';

export type StreamEvent =
  | { type: 'content'; text: string }
  | { type: 'done' }
  | { type: 'ignored' };

const streamFragmentSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string() }).passthrough(),
      }).passthrough()
    )
    .min(1),
}).passthrough();

const IGNORED: StreamEvent = { type: 'ignored' };

/**
 * Decode one SSE line. Lines without the `data: ` prefix, malformed JSON and
 * fragments without `choices[0].delta.content` are ignored.
 */
export function decodeStreamLine(line: string): StreamEvent {
  if (!line.startsWith(DATA_PREFIX)) return IGNORED;

  const data = line.slice(DATA_PREFIX.length).trim();
  if (data === DONE_TOKEN) return { type: 'done' };

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return IGNORED;
  }

  const fragment = streamFragmentSchema.safeParse(parsed);
  if (!fragment.success) return IGNORED;

  return { type: 'content', text: fragment.data.choices[0].delta.content };
}

/**
 * Accumulate streamed content in arrival order until `[DONE]` or the end of
 * the line sequence.
 */
export async function accumulateStream(
  lines: AsyncIterable<string>,
  onToken?: (token: string) => void
): Promise<string> {
  let text = '';

  for await (const line of lines) {
    const event = decodeStreamLine(line);
    if (event.type === 'done') break;
    if (event.type === 'content') {
      text += event.text;
      onToken?.(event.text);
    }
  }

  return text;
}

/**
 * Split a byte stream into lines. Handles lines spanning chunk boundaries and
 * strips a trailing `\r`.
 */
export async function* splitLines(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8', { fatal: false });
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      yield stripCarriageReturn(buffer.slice(0, newline));
      buffer = buffer.slice(newline + 1);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer.length > 0) {
    yield stripCarriageReturn(buffer);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
