import { MessageRole } from '../types';

export interface Conversation {
  id: number;
  user_id: number;
  // External handle; the numeric id never leaves the server as a lookup key.
  session_id: string;
  title: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface ConversationSummary extends Conversation {
  message_count: number;
}

export interface ConversationMessage {
  id: number;
  conversation_id: number;
  role: MessageRole;
  content: string;
  keywords: string[] | null;
  created_at: Date;
}
