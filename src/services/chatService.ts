import { randomUUID } from 'crypto';
import { ConversationMessage } from '../models/conversation';
import { AppError } from '../errors';
import { Identity, InferenceMessage, InferenceOptions } from '../types';
import type { AccessGuard } from './accessGuard';
import type { IConversationStore } from './conversationService';
import type { IInferenceAdapter } from './inferenceAdapter';
import { StreamingTurn } from './streamingTurn';
import { TurnStateMachine } from './turnStateMachine';

export const DEFAULT_MAX_TOKENS = 512;
export const DEFAULT_TEMPERATURE = 0.7;

export interface ChatTurnOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface BufferedTurnResult {
  session_id: string;
  user_message: ConversationMessage;
  assistant_message: ConversationMessage;
  usage: Record<string, unknown>;
}

function toInferenceMessage(message: ConversationMessage): InferenceMessage {
  return { role: message.role, content: message.content };
}

function failureCode(error: unknown): string {
  return error instanceof AppError ? error.code : 'INTERNAL_ERROR';
}

/**
 * Runs chat turns: authorize, load history, call the inference service and
 * store the result.
 *
 * Buffered turns write nothing until the reply is known and then store the
 * user message and the reply as one pair. Streaming turns store the user
 * message first, because the reply is only revealed incrementally, and
 * store the reply once the stream has closed.
 */
export class ChatService {
  constructor(
    private readonly conversations: IConversationStore,
    private readonly inference: IInferenceAdapter,
    private readonly guard: AccessGuard
  ) {}

  async sendMessage(
    identity: Identity,
    sessionId: string,
    message: string,
    options: ChatTurnOptions = {}
  ): Promise<BufferedTurnResult> {
    const requestId = `turn_${randomUUID()}`;
    const machine = new TurnStateMachine(`${requestId} buffered ${sessionId}`);

    try {
      const conversation = await this.guard.requireConversation(identity, sessionId);
      machine.advance('authorized');

      const history = await this.conversations.listMessages(conversation.id);
      // The new utterance joins the prompt only; it is stored together with the reply.
      const prompt: InferenceMessage[] = [...history.map(toInferenceMessage), { role: 'user', content: message }];
      machine.advance('history_loaded');

      machine.advance('inferring');
      const completion = await this.inference.complete(prompt, { ...this.resolveOptions(options), requestId });

      machine.advance('committing');
      const [userMessage, assistantMessage] = await this.conversations.appendMessagePair(
        conversation.id,
        message,
        completion.response
      );
      machine.advance('done');

      return {
        session_id: conversation.session_id,
        user_message: userMessage,
        assistant_message: assistantMessage,
        usage: completion.usage,
      };
    } catch (error) {
      machine.fail(failureCode(error));
      throw error;
    }
  }

  /**
   * Authorize, store the user message and load the history. The returned
   * turn is already pulling from upstream; a NotFoundError here means
   * nothing was written.
   */
  async startStreamingTurn(
    identity: Identity,
    sessionId: string,
    message: string,
    options: ChatTurnOptions = {}
  ): Promise<StreamingTurn> {
    const requestId = `turn_${randomUUID()}`;
    const machine = new TurnStateMachine(`${requestId} stream ${sessionId}`);

    try {
      const conversation = await this.guard.requireConversation(identity, sessionId);
      machine.advance('authorized');

      const userMessage = await this.conversations.appendMessage(conversation.id, 'user', message);
      const history = await this.conversations.listMessages(conversation.id);
      const prompt = history.map(toInferenceMessage);
      machine.advance('history_loaded');

      const inferenceOptions: InferenceOptions = { ...this.resolveOptions(options), requestId };

      return new StreamingTurn({
        sessionId: conversation.session_id,
        userMessage,
        machine,
        openUpstream: (signal) => this.inference.streamComplete(prompt, { ...inferenceOptions, signal }),
        persistReply: (content) => this.conversations.appendMessage(conversation.id, 'assistant', content),
      });
    } catch (error) {
      machine.fail(failureCode(error));
      throw error;
    }
  }

  private resolveOptions(options: ChatTurnOptions): Pick<InferenceOptions, 'maxTokens' | 'temperature'> {
    return {
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }
}
