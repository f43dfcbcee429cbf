import { describe, it, expect, beforeEach } from 'vitest';
import { ChatService } from '../services/chatService';
import { AccessGuard } from '../services/accessGuard';
import { NotFoundError, UpstreamProtocolError, UpstreamTimeoutError, UpstreamUnavailableError } from '../errors';
import { Identity } from '../types';
import { StreamingTurn } from '../services/streamingTurn';
import { FakeInferenceAdapter } from './helpers/fakeInference';
import { InMemoryConversationStore, InMemoryGoalStore, MemoryState } from './helpers/memoryStores';

const owner: Identity = { id: 1, email: 'owner@example.com', user_name: null };
const stranger: Identity = { id: 2, email: 'stranger@example.com', user_name: null };

async function drain(turn: StreamingTurn): Promise<string> {
  let text = '';
  for await (const chunk of turn.output) {
    text += chunk;
  }
  return text;
}

describe('ChatService', () => {
  let state: MemoryState;
  let conversations: InMemoryConversationStore;
  let inference: FakeInferenceAdapter;
  let chatService: ChatService;
  let sessionId: string;
  let conversationId: number;

  beforeEach(async () => {
    state = new MemoryState();
    conversations = new InMemoryConversationStore(state);
    inference = new FakeInferenceAdapter();
    chatService = new ChatService(conversations, inference, new AccessGuard(conversations, new InMemoryGoalStore(state)));
    const conversation = await conversations.createConversation(owner.id, 'Test', 'You are a coach.');
    sessionId = conversation.session_id;
    conversationId = conversation.id;
  });

  describe('sendMessage', () => {
    it('should store the user message and the reply as a pair', async () => {
      const result = await chatService.sendMessage(owner, sessionId, 'Hi');

      expect(result.session_id).toBe(sessionId);
      expect(result.user_message.role).toBe('user');
      expect(result.user_message.content).toBe('Hi');
      expect(result.assistant_message.role).toBe('assistant');
      expect(result.assistant_message.content).toBe('Hello!');
      expect(result.usage).toEqual({ total_tokens: 12 });

      const history = await conversations.listMessages(conversationId);
      expect(history.map((m) => m.role)).toEqual(['system', 'user', 'assistant']);
    });

    it('should send the full history with the new message last', async () => {
      await chatService.sendMessage(owner, sessionId, 'Hi');

      expect(inference.calls).toHaveLength(1);
      expect(inference.calls[0].messages).toEqual([
        { role: 'system', content: 'You are a coach.' },
        { role: 'user', content: 'Hi' },
      ]);
      expect(inference.calls[0].options.maxTokens).toBe(512);
      expect(inference.calls[0].options.temperature).toBe(0.7);
      expect(inference.calls[0].options.requestId).toMatch(/^turn_/);
    });

    it('should keep an explicit zero temperature', async () => {
      await chatService.sendMessage(owner, sessionId, 'Hi', { maxTokens: 64, temperature: 0 });

      expect(inference.calls[0].options.maxTokens).toBe(64);
      expect(inference.calls[0].options.temperature).toBe(0);
    });

    it.each([
      { failure: 'times out', error: new UpstreamTimeoutError('Inference service timeout after 10ms') },
      { failure: 'is unreachable', error: new UpstreamUnavailableError('Cannot connect to inference service: refused') },
      { failure: 'answers with an error', error: new UpstreamProtocolError('Inference service error: 500', 500) },
    ])('should write nothing when the inference service $failure', async ({ error }) => {
      inference.completeError = error;

      await expect(chatService.sendMessage(owner, sessionId, 'Hi')).rejects.toBe(error);
      expect(await conversations.countMessages(conversationId)).toBe(1);
      expect(state.messages.filter((m) => m.role !== 'system')).toEqual([]);
    });

    it('should write nothing when storing the pair fails', async () => {
      conversations.failingRoles.add('assistant');

      await expect(chatService.sendMessage(owner, sessionId, 'Hi')).rejects.toThrow('write of assistant message failed');
      expect(await conversations.countMessages(conversationId)).toBe(1);
    });

    it('should treat another user\'s conversation as missing', async () => {
      await expect(chatService.sendMessage(stranger, sessionId, 'Hi')).rejects.toBeInstanceOf(NotFoundError);
      expect(inference.calls).toHaveLength(0);
      expect(await conversations.countMessages(conversationId)).toBe(1);
    });

    it('should reject an unknown session handle', async () => {
      await expect(chatService.sendMessage(owner, 'conv-missing', 'Hi')).rejects.toThrow('Conversation not found');
    });
  });

  describe('startStreamingTurn', () => {
    it('should forward every chunk and store the concatenated reply', async () => {
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');

      expect(await drain(turn)).toBe('Hello!');
      const outcome = await turn.completion;
      expect(outcome.status).toBe('completed');

      const history = await conversations.listMessages(conversationId);
      expect(history.map((m) => [m.role, m.content])).toEqual([
        ['system', 'You are a coach.'],
        ['user', 'Hi'],
        ['assistant', 'Hello!'],
      ]);
    });

    it('should store the user message before the stream starts', async () => {
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');

      expect(turn.userMessage.content).toBe('Hi');
      await turn.completion;
      expect(inference.calls[0].mode).toBe('stream');
      expect(inference.calls[0].messages.map((m) => m.role)).toEqual(['system', 'user']);
    });

    it('should fail before writing anything for a conversation the caller does not own', async () => {
      await expect(chatService.startStreamingTurn(stranger, sessionId, 'Hi')).rejects.toBeInstanceOf(NotFoundError);
      expect(inference.calls).toHaveLength(0);
      expect(await conversations.countMessages(conversationId)).toBe(1);
    });

    it('should end the stream with an error marker and keep only the user message on upstream failure', async () => {
      inference.streamFailure = {
        afterChunks: 1,
        error: new UpstreamUnavailableError('Cannot connect to inference service: reset'),
      };
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');

      expect(await drain(turn)).toBe('Hel\n[ERROR: Cannot connect to inference service: reset]');
      const outcome = await turn.completion;
      expect(outcome.status).toBe('failed');

      const history = await conversations.listMessages(conversationId);
      expect(history.map((m) => m.role)).toEqual(['system', 'user']);
    });

    it('should not store an assistant message for an empty stream', async () => {
      inference.chunks = [];
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');

      expect(await drain(turn)).toBe('');
      expect((await turn.completion).status).toBe('empty');
      expect(await conversations.countMessages(conversationId)).toBe(2);
    });

    it('should report a failed reply write in-band', async () => {
      conversations.failingRoles.add('assistant');
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');

      expect(await drain(turn)).toBe('Hello!\n[ERROR: Failed to save assistant reply]');
      const outcome = await turn.completion;
      expect(outcome.status).toBe('failed');
      if (outcome.status === 'failed') {
        expect(outcome.error.code).toBe('DATABASE_ERROR');
      }
    });

    it('should keep the partial reply when the caller cancels', async () => {
      inference.chunks = ['Partial', ' never sent'];
      inference.stallAfterChunks = 1;
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');

      for await (const chunk of turn.output) {
        expect(chunk).toBe('Partial');
        break;
      }
      turn.cancel();

      const outcome = await turn.completion;
      expect(outcome.status).toBe('cancelled');
      if (outcome.status === 'cancelled') {
        expect(outcome.assistantMessage?.content).toBe('Partial');
      }
      const history = await conversations.listMessages(conversationId);
      expect(history.map((m) => m.content)).toEqual(['You are a coach.', 'Hi', 'Partial']);
    });

    it('should store nothing more when cancelled before any chunk', async () => {
      inference.stallAfterChunks = 0;
      const turn = await chatService.startStreamingTurn(owner, sessionId, 'Hi');
      turn.cancel();

      const outcome = await turn.completion;
      expect(outcome).toEqual({ status: 'cancelled', assistantMessage: null });
      expect(await conversations.countMessages(conversationId)).toBe(2);
    });
  });
});
