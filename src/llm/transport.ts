// Abstract Transport Base Class

import { EventEmitter } from 'node:events';
import type { CompletionRequest, TransportResult } from './types.js';

export interface TransportRequestEvent {
  model: string;
  messageCount: number;
  stream: boolean;
  timestamp: number;
}

export interface TransportErrorEvent {
  model: string;
  status?: number;
  error: string;
  timestamp: number;
}

export interface TransportResponseEvent {
  model: string;
  status: number;
  durationMs: number;
  timestamp: number;
}

export abstract class Transport extends EventEmitter {
  /**
   * Submit a non-streaming request. The value is the decoded JSON body; shape
   * checking happens in the completion decoder.
   */
  abstract complete(request: CompletionRequest): Promise<TransportResult<unknown>>;

  /**
   * Submit a streaming request and return the server-sent lines of the body.
   */
  abstract openStream(request: CompletionRequest): Promise<TransportResult<AsyncIterable<string>>>;

  protected emitRequest(request: CompletionRequest): void {
    this.emit('request', {
      model: request.model,
      messageCount: request.messages.length,
      stream: request.stream,
      timestamp: Date.now(),
    } satisfies TransportRequestEvent);
  }

  protected emitResponse(model: string, status: number, durationMs: number): void {
    this.emit('response', {
      model,
      status,
      durationMs,
      timestamp: Date.now(),
    } satisfies TransportResponseEvent);
  }

  protected emitError(model: string, error: string, status?: number): void {
    this.emit('transport_error', {
      model,
      status,
      error,
      timestamp: Date.now(),
    } satisfies TransportErrorEvent);
  }
}
