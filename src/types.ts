// Server-side types for the coaching chat backend

export type MessageRole = 'system' | 'user' | 'assistant';

export interface InferenceMessage {
  role: MessageRole;
  content: string;
}

export interface InferenceOptions {
  maxTokens: number;
  temperature: number;
  requestId?: string;
  // Aborting this signal cancels the upstream request.
  signal?: AbortSignal;
}

export interface InferenceCompletion {
  response: string;
  usage: Record<string, unknown>;
}

/**
 * The authenticated caller, as resolved by the identity gate.
 */
export interface Identity {
  id: number;
  email: string;
  user_name: string | null;
}

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  user_id: number;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: unknown;
  };
}

// Socket.IO payloads
export interface ChatSocketPayload {
  session_id: string;
  message: string;
  max_tokens?: number;
  temperature?: number;
}

export interface AssistantDeltaPayload {
  session_id: string;
  chunk: string;
}

export interface AssistantFinalPayload {
  session_id: string;
  message: {
    id: number;
    role: MessageRole;
    content: string;
    created_at: Date;
  } | null;
}

export interface ChatErrorPayload {
  session_id: string | null;
  code: string;
  message: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: Identity;
    }
  }
}
