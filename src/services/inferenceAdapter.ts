import { InferenceCompletion, InferenceMessage, InferenceOptions } from '../types';

export interface IInferenceAdapter {
  /**
   * Send the full history and wait for the whole reply.
   * Rejects with an UpstreamError subclass on timeout, connection failure
   * or a non-success/malformed response.
   */
  complete(messages: InferenceMessage[], options: InferenceOptions): Promise<InferenceCompletion>;

  /**
   * Stream the reply as text increments. The returned iterable is finite and
   * can be consumed once; it is never retried or reconnected here.
   */
  streamComplete(messages: InferenceMessage[], options: InferenceOptions): AsyncIterable<string>;

  /**
   * Check if the adapter is configured to reach the service
   */
  isReady(): boolean;
}

export interface InferenceAdapterSettings {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  streamTimeoutMs?: number;
}

export abstract class BaseInferenceAdapter implements IInferenceAdapter {
  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeout: number;
  protected readonly streamTimeout: number;

  constructor(settings: InferenceAdapterSettings) {
    this.apiKey = settings.apiKey;
    this.baseUrl = settings.baseUrl.replace(/\/+$/, '');
    this.timeout = settings.timeoutMs ?? 120_000;
    this.streamTimeout = settings.streamTimeoutMs ?? 180_000;
  }

  abstract complete(messages: InferenceMessage[], options: InferenceOptions): Promise<InferenceCompletion>;

  abstract streamComplete(messages: InferenceMessage[], options: InferenceOptions): AsyncIterable<string>;

  isReady(): boolean {
    return !!(this.apiKey && this.baseUrl);
  }
}
