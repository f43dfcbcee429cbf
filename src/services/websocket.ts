import { Server, Socket } from 'socket.io';
import { z } from 'zod';
import { AppError, errorMessage } from '../errors';
import { ChatRequestSchema } from '../schemas';
import {
  AssistantDeltaPayload,
  AssistantFinalPayload,
  ChatErrorPayload,
  ChatSocketPayload,
  Identity,
} from '../types';
import type { AuthService } from './authService';
import type { ChatService } from './chatService';
import type { StreamingTurn } from './streamingTurn';

interface ClientToServerEvents {
  chat_message: (payload: ChatSocketPayload) => void;
}

interface ServerToClientEvents {
  assistant_delta: (payload: AssistantDeltaPayload) => void;
  assistant_final: (payload: AssistantFinalPayload) => void;
  chat_error: (payload: ChatErrorPayload) => void;
}

type InterServerEvents = Record<string, never>;

interface SocketData {
  identity?: Identity;
}

export type ChatServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
type ChatSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

/** Where a socket turn reports its progress. */
export interface ChatEventSink {
  delta(payload: AssistantDeltaPayload): void;
  final(payload: AssistantFinalPayload): void;
  error(payload: ChatErrorPayload): void;
}

const ChatSocketSchema = ChatRequestSchema.extend({
  session_id: z.string().min(1),
});

function socketSink(socket: ChatSocket): ChatEventSink {
  return {
    delta: (payload) => socket.emit('assistant_delta', payload),
    final: (payload) => socket.emit('assistant_final', payload),
    error: (payload) => socket.emit('chat_error', payload),
  };
}

/**
 * Streaming chat over Socket.IO. Each `chat_message` runs one streaming
 * turn; chunks go out as `assistant_delta` and the stored reply as
 * `assistant_final`. A disconnect cancels the socket's open turns.
 */
export class ChatSocketService {
  constructor(
    private readonly authService: AuthService,
    private readonly chatService: ChatService
  ) {}

  attach(io: ChatServer): void {
    io.use(async (socket, next) => {
      try {
        socket.data.identity = await this.authenticateHandshake(socket.handshake.auth.token);
        next();
      } catch (error) {
        console.log(`[WebSocket] Rejected handshake from ${socket.id}: ${errorMessage(error)}`);
        next(new Error(errorMessage(error)));
      }
    });

    io.on('connection', (socket) => {
      const identity = socket.data.identity;
      if (!identity) {
        socket.disconnect(true);
        return;
      }
      console.log(`[WebSocket] User #${identity.id} connected: ${socket.id}`);

      const active = new Set<StreamingTurn>();
      const sink = socketSink(socket);

      socket.on('chat_message', (payload: unknown) => {
        this.runTurn(identity, payload, sink, active).catch((error: unknown) => {
          console.error(`[WebSocket] Turn crashed on ${socket.id}:`, errorMessage(error));
        });
      });

      socket.on('disconnect', (reason) => {
        console.log(`[WebSocket] ${socket.id} disconnected (${reason}), cancelling ${active.size} turn(s)`);
        for (const turn of active) {
          turn.cancel();
        }
      });
    });
  }

  async authenticateHandshake(token: unknown): Promise<Identity> {
    return this.authService.authenticate(typeof token === 'string' ? token : undefined);
  }

  /**
   * Run one streaming turn and report it to `sink`. Never rejects for
   * turn failures; they are reported as `chat_error`.
   */
  async runTurn(identity: Identity, payload: unknown, sink: ChatEventSink, active: Set<StreamingTurn>): Promise<void> {
    const parsed = ChatSocketSchema.safeParse(payload);
    if (!parsed.success) {
      sink.error({
        session_id: null,
        code: 'VALIDATION_ERROR',
        message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
      return;
    }
    const { session_id: sessionId, message, max_tokens, temperature } = parsed.data;

    let turn: StreamingTurn;
    try {
      turn = await this.chatService.startStreamingTurn(identity, sessionId, message, {
        maxTokens: max_tokens,
        temperature,
      });
    } catch (error) {
      sink.error({
        session_id: sessionId,
        code: error instanceof AppError ? error.code : 'INTERNAL_SERVER_ERROR',
        message: error instanceof AppError ? error.message : 'Internal server error',
      });
      return;
    }

    active.add(turn);
    try {
      for await (const chunk of turn.output) {
        sink.delta({ session_id: sessionId, chunk });
      }
      const outcome = await turn.completion;

      switch (outcome.status) {
        case 'completed': {
          const stored = outcome.assistantMessage;
          sink.final({
            session_id: sessionId,
            message: { id: stored.id, role: stored.role, content: stored.content, created_at: stored.created_at },
          });
          break;
        }
        case 'empty':
          sink.final({ session_id: sessionId, message: null });
          break;
        case 'failed':
          sink.error({ session_id: sessionId, code: outcome.error.code, message: outcome.error.message });
          break;
        case 'cancelled':
          // Nobody left to tell.
          break;
      }
    } finally {
      active.delete(turn);
    }
  }
}
