// HTTP Transport - OpenAI-compatible /chat/completions client (Perplexity by default)

import OpenAI, { APIConnectionError, APIError } from 'openai';
import { Transport } from './transport.js';
import { splitLines } from './stream-decoder.js';
import type { CompletionRequest, TransportResult } from './types.js';
import { errorMessage } from '../core/errors.js';

export interface HttpTransportConfig {
  apiKey: string;
  baseUrl: string;
}

type ResponseBody = NonNullable<Response['body']>;

type Failure = { ok: false; error: string; status?: number };

export class HttpTransport extends Transport {
  private client: OpenAI;

  constructor(config: HttpTransportConfig) {
    super();
    // No retries: a failed request ends the turn with its error text
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<TransportResult<unknown>> {
    this.emitRequest(request);
    const startTime = Date.now();

    try {
      const { data, response } = await this.client.chat.completions
        .create({ ...request, stream: false })
        .withResponse();
      this.emitResponse(request.model, response.status, Date.now() - startTime);
      return { ok: true, value: data };
    } catch (err) {
      return this.fail(request, err, startTime);
    }
  }

  /**
   * The SDK's own stream parser is bypassed: the raw body is handed to the
   * line decoder so fragments are handled the same way for every provider.
   */
  async openStream(request: CompletionRequest): Promise<TransportResult<AsyncIterable<string>>> {
    this.emitRequest(request);
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.client.chat.completions.create({ ...request, stream: true }).asResponse();
    } catch (err) {
      return this.fail(request, err, startTime);
    }

    this.emitResponse(request.model, response.status, Date.now() - startTime);
    const body = response.body;
    return { ok: true, value: splitLines(body ? readChunks(body) : emptyChunks()) };
  }

  private fail(request: CompletionRequest, err: unknown, startTime: number): Failure {
    const failure = describeFailure(err);
    if (failure.status !== undefined) {
      this.emitResponse(request.model, failure.status, Date.now() - startTime);
    }
    this.emitError(request.model, failure.error, failure.status);
    return failure;
  }
}

function describeFailure(err: unknown): Failure {
  // Connection errors are APIErrors without a status
  if (err instanceof APIConnectionError) {
    return { ok: false, error: `API Error: ${errorMessage(err.cause ?? err)}` };
  }
  if (err instanceof APIError && err.status !== undefined) {
    const prefix = `${err.status} `;
    const detail = err.message.startsWith(prefix) ? err.message.slice(prefix.length) : err.message;
    return { ok: false, error: `API Error: ${err.status} - ${detail}`, status: err.status };
  }
  return { ok: false, error: `API Error: ${errorMessage(err)}` };
}

async function* readChunks(body: ResponseBody): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    // Consumer stopped early (e.g. on [DONE]): close the connection
    if (!finished) {
      await reader.cancel();
    }
  }
}

async function* emptyChunks(): AsyncGenerator<Uint8Array> {
  // no body
}
