import { z } from 'zod';
import { BaseInferenceAdapter } from './inferenceAdapter';
import {
  errorMessage,
  UpstreamError,
  UpstreamProtocolError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../errors';
import { InferenceCompletion, InferenceMessage, InferenceOptions } from '../types';

const CompletionPayloadSchema = z.object({
  response: z.string(),
  usage: z.record(z.unknown()).nullish(),
});

interface RequestDeadline {
  signal: AbortSignal;
  timeoutMs: number;
  timedOut(): boolean;
  cancelled(): boolean;
  release(): void;
}

/**
 * One abort signal for a request, fired either by the deadline or by the
 * caller's own signal.
 */
function startDeadline(timeoutMs: number, callerSignal?: AbortSignal): RequestDeadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort();
  }, timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (callerSignal?.aborted) {
    controller.abort();
  } else {
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timeoutMs,
    timedOut: () => expired,
    cancelled: () => !expired && !!callerSignal?.aborted,
    release: () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    },
  };
}

/**
 * HTTP client for the inference service. Every request carries the shared
 * service key in `X-API-Key`.
 */
export class InferenceClient extends BaseInferenceAdapter {
  async complete(messages: InferenceMessage[], options: InferenceOptions): Promise<InferenceCompletion> {
    const requestId = options.requestId ?? `req_${Date.now()}`;
    const deadline = startDeadline(this.timeout, options.signal);
    const startTime = Date.now();

    console.log(`[InferenceClient] complete ${requestId}: ${messages.length} messages, max_tokens ${options.maxTokens}`);

    try {
      const response = await fetch(`${this.baseUrl}/inference/chat`, {
        method: 'POST',
        headers: this.headers(),
        body: this.body(messages, options),
        signal: deadline.signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        console.error(`[InferenceClient] ${requestId} upstream status ${response.status}: ${detail.slice(0, 200)}`);
        throw new UpstreamProtocolError(`Inference service error: ${response.status}`, response.status);
      }

      const payload: unknown = await response.json();
      const parsed = CompletionPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        throw new UpstreamProtocolError('Inference service returned an unexpected payload');
      }

      console.log(`[InferenceClient] complete ${requestId} finished, ${parsed.data.response.length} chars, time: ${Date.now() - startTime}ms`);
      return { response: parsed.data.response, usage: parsed.data.usage ?? {} };
    } catch (error) {
      const upstreamError = this.toUpstreamError(error, deadline);
      console.error(`[InferenceClient] complete ${requestId} failed: ${upstreamError.message}`);
      throw upstreamError;
    } finally {
      deadline.release();
    }
  }

  async *streamComplete(messages: InferenceMessage[], options: InferenceOptions): AsyncGenerator<string, void, undefined> {
    const requestId = options.requestId ?? `req_${Date.now()}`;
    // Bounded by one overall deadline for the whole stream, not per chunk.
    const deadline = startDeadline(this.streamTimeout, options.signal);
    const startTime = Date.now();
    let chunkCount = 0;

    console.log(`[InferenceClient] streamComplete ${requestId}: ${messages.length} messages`);

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/inference/chat/stream`, {
          method: 'POST',
          headers: this.headers(),
          body: this.body(messages, options),
          signal: deadline.signal,
        });
      } catch (error) {
        throw this.toUpstreamError(error, deadline);
      }

      if (!response.ok) {
        throw new UpstreamProtocolError(`Inference service error: ${response.status}`, response.status);
      }
      if (!response.body) {
        throw new UpstreamProtocolError('Inference service returned no stream body');
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();

      try {
        while (true) {
          const next = await reader.read().catch((error: unknown) => {
            throw this.toUpstreamError(error, deadline);
          });
          if (next.done) break;

          const text = decoder.decode(next.value, { stream: true });
          if (text.length > 0) {
            chunkCount++;
            yield text;
          }
        }

        const tail = decoder.decode();
        if (tail.length > 0) {
          chunkCount++;
          yield tail;
        }
        console.log(`[InferenceClient] streamComplete ${requestId} closed after ${chunkCount} chunks, time: ${Date.now() - startTime}ms`);
      } finally {
        // Runs on normal close, on error and when the consumer stops early.
        try {
          await reader.cancel();
        } catch (cancelError) {
          console.warn(`[InferenceClient] Failed to cancel reader for ${requestId}:`, errorMessage(cancelError));
        }
      }
    } catch (error) {
      const upstreamError = this.toUpstreamError(error, deadline);
      console.error(`[InferenceClient] streamComplete ${requestId} failed after ${chunkCount} chunks: ${upstreamError.message}`);
      throw upstreamError;
    } finally {
      deadline.release();
    }
  }

  private headers(): Record<string, string> {
    return {
      'X-API-Key': this.apiKey,
      'Content-Type': 'application/json',
    };
  }

  private body(messages: InferenceMessage[], options: InferenceOptions): string {
    return JSON.stringify({
      messages: messages.map(({ role, content }) => ({ role, content })),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
    });
  }

  private toUpstreamError(error: unknown, deadline: RequestDeadline): UpstreamError {
    if (error instanceof UpstreamError) {
      return error;
    }
    if (deadline.timedOut()) {
      return new UpstreamTimeoutError(`Inference service timeout after ${deadline.timeoutMs}ms`);
    }
    if (deadline.cancelled()) {
      return new UpstreamUnavailableError('Inference request cancelled');
    }
    if (error instanceof SyntaxError) {
      return new UpstreamProtocolError('Inference service returned malformed JSON');
    }
    return new UpstreamUnavailableError(`Cannot connect to inference service: ${errorMessage(error)}`);
  }
}
