import { ConversationMessage } from '../models/conversation';
import { AppError, errorMessage, StorageError, UpstreamUnavailableError } from '../errors';
import { ChunkChannel } from '../utils/chunkChannel';
import { TurnStateMachine } from './turnStateMachine';

export type StreamTurnOutcome =
  | { status: 'completed'; assistantMessage: ConversationMessage }
  | { status: 'empty' }
  | { status: 'failed'; error: AppError }
  | { status: 'cancelled'; assistantMessage: ConversationMessage | null };

export function streamErrorMarker(message: string): string {
  return `\n[ERROR: ${message}]`;
}

export interface StreamingTurnParams {
  sessionId: string;
  userMessage: ConversationMessage;
  machine: TurnStateMachine;
  openUpstream(signal: AbortSignal): AsyncIterable<string>;
  persistReply(content: string): Promise<ConversationMessage>;
}

/**
 * A streaming turn after its user message has been stored.
 *
 * The upstream sequence is read exactly once by an internal pump that both
 * accumulates the reply and pushes every chunk to `output`. The pump does
 * not wait for the consumer of `output`, so accumulation keeps pace with
 * upstream however slowly chunks are forwarded.
 */
export class StreamingTurn {
  readonly sessionId: string;
  readonly userMessage: ConversationMessage;
  readonly output = new ChunkChannel();
  /** Settles once the reply is stored (or deliberately not stored). Never rejects. */
  readonly completion: Promise<StreamTurnOutcome>;

  private readonly controller = new AbortController();
  private cancelled = false;
  private accumulated = '';

  constructor(private readonly params: StreamingTurnParams) {
    this.sessionId = params.sessionId;
    this.userMessage = params.userMessage;
    this.completion = this.pump();
  }

  /**
   * The caller went away: stop forwarding, abort upstream, keep what was
   * generated so far.
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.controller.abort();
  }

  get receivedText(): string {
    return this.accumulated;
  }

  private async pump(): Promise<StreamTurnOutcome> {
    const { machine } = this.params;
    machine.advance('inferring');

    try {
      for await (const chunk of this.params.openUpstream(this.controller.signal)) {
        if (this.cancelled) break;
        this.accumulated += chunk;
        this.output.push(chunk);
      }
    } catch (error) {
      if (!this.cancelled) {
        const upstreamError = error instanceof AppError ? error : new UpstreamUnavailableError(errorMessage(error));
        machine.fail(upstreamError.code);
        // Headers are already out; the only channel left is the body.
        this.output.push(streamErrorMarker(upstreamError.message));
        this.output.close();
        return { status: 'failed', error: upstreamError };
      }
    }

    if (this.cancelled) {
      return this.keepPartialReply();
    }

    if (this.accumulated.length === 0) {
      // An empty assistant message would read as a finished, silent turn.
      machine.advance('done');
      this.output.close();
      return { status: 'empty' };
    }

    machine.advance('committing');
    try {
      const assistantMessage = await this.params.persistReply(this.accumulated);
      machine.advance('done');
      return { status: 'completed', assistantMessage };
    } catch (error) {
      console.error(`[StreamingTurn] Failed to store reply for ${this.sessionId}:`, errorMessage(error));
      const storageError = new StorageError('Failed to save assistant reply');
      machine.fail(storageError.code);
      this.output.push(streamErrorMarker(storageError.message));
      return { status: 'failed', error: storageError };
    } finally {
      this.output.close();
    }
  }

  private async keepPartialReply(): Promise<StreamTurnOutcome> {
    const { machine } = this.params;
    this.output.close();

    if (this.accumulated.length === 0) {
      machine.fail('cancelled');
      return { status: 'cancelled', assistantMessage: null };
    }

    machine.advance('committing');
    try {
      const assistantMessage = await this.params.persistReply(this.accumulated);
      machine.advance('done');
      console.log(`[StreamingTurn] Client left ${this.sessionId}; kept ${this.accumulated.length} chars`);
      return { status: 'cancelled', assistantMessage };
    } catch (error) {
      // Best effort only: the caller is gone and there is nobody to report to.
      console.error(`[StreamingTurn] Could not keep partial reply for ${this.sessionId}:`, errorMessage(error));
      machine.fail('cancelled');
      return { status: 'cancelled', assistantMessage: null };
    }
  }
}
