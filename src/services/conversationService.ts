import { randomUUID } from 'crypto';
import { asc, desc, eq, sql } from 'drizzle-orm';
import { Conversation, ConversationMessage, ConversationSummary } from '../models/conversation';
import { conversations, ConversationRow, messages, MessageRow } from '../db/schema';
import { MessageRole } from '../types';
import type { Database, Transaction } from './db';

/**
 * Durable, per-user record of conversations and their append-only message
 * history. Messages are ordered by creation time, ties broken by insertion
 * order.
 */
export interface IConversationStore {
  /**
   * Allocate a conversation with a fresh session handle and write its
   * system message in the same transaction, so no reader ever sees the
   * conversation without it.
   */
  createConversation(userId: number, title: string | null, systemPrompt: string): Promise<ConversationSummary>;

  getBySessionId(sessionId: string): Promise<Conversation | null>;

  /** Most recently updated first. */
  listForUser(userId: number, limit: number): Promise<ConversationSummary[]>;

  countMessages(conversationId: number): Promise<number>;

  /** Append one message and advance the conversation's updated_at in one unit of work. */
  appendMessage(
    conversationId: number,
    role: MessageRole,
    content: string,
    keywords?: string[] | null
  ): Promise<ConversationMessage>;

  /**
   * Append a user message immediately followed by its assistant reply.
   * Both land or neither does.
   */
  appendMessagePair(
    conversationId: number,
    userContent: string,
    assistantContent: string
  ): Promise<[ConversationMessage, ConversationMessage]>;

  listMessages(conversationId: number): Promise<ConversationMessage[]>;

  /** Removes the conversation and every message in it. */
  deleteConversation(conversationId: number): Promise<void>;
}

export function newSessionId(): string {
  return `conv-${randomUUID().replace(/-/g, '')}`;
}

function toConversation(row: ConversationRow): Conversation {
  return {
    id: row.id,
    user_id: row.userId,
    session_id: row.sessionId,
    title: row.title,
    created_at: row.createdAt,
    updated_at: row.updatedAt,
  };
}

function toMessage(row: MessageRow): ConversationMessage {
  return {
    id: row.id,
    conversation_id: row.conversationId,
    role: row.role,
    content: row.content,
    keywords: row.keywords,
    created_at: row.createdAt,
  };
}

export class ConversationService implements IConversationStore {
  constructor(private readonly db: Database) {}

  async createConversation(userId: number, title: string | null, systemPrompt: string): Promise<ConversationSummary> {
    const startTime = Date.now();

    const created = await this.db.transaction(async (tx) => {
      const now = new Date();
      const [conversation] = await tx
        .insert(conversations)
        .values({ userId, sessionId: newSessionId(), title, createdAt: now, updatedAt: now })
        .returning();
      await tx.insert(messages).values({
        conversationId: conversation.id,
        role: 'system',
        content: systemPrompt,
        createdAt: now,
      });
      return conversation;
    });
    console.log(`[ConversationService] createConversation for user ${userId}, session ${created.sessionId}, time: ${Date.now() - startTime}ms`);

    return { ...toConversation(created), message_count: 1 };
  }

  async getBySessionId(sessionId: string): Promise<Conversation | null> {
    const [row] = await this.db
      .select()
      .from(conversations)
      .where(eq(conversations.sessionId, sessionId))
      .limit(1);
    return row ? toConversation(row) : null;
  }

  async listForUser(userId: number, limit: number): Promise<ConversationSummary[]> {
    const startTime = Date.now();

    const rows = await this.db
      .select({
        conversation: conversations,
        messageCount: sql<number>`cast(count(${messages.id}) as int)`,
      })
      .from(conversations)
      .leftJoin(messages, eq(messages.conversationId, conversations.id))
      .where(eq(conversations.userId, userId))
      .groupBy(conversations.id)
      .orderBy(desc(conversations.updatedAt))
      .limit(limit);
    console.log(`[ConversationService] listForUser ${userId}, found ${rows.length}, time: ${Date.now() - startTime}ms`);

    return rows.map((row) => ({ ...toConversation(row.conversation), message_count: row.messageCount }));
  }

  async countMessages(conversationId: number): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`cast(count(*) as int)` })
      .from(messages)
      .where(eq(messages.conversationId, conversationId));
    return row?.count ?? 0;
  }

  async appendMessage(
    conversationId: number,
    role: MessageRole,
    content: string,
    keywords: string[] | null = null
  ): Promise<ConversationMessage> {
    const created = await this.db.transaction(async (tx) => {
      const now = new Date();
      const [row] = await tx
        .insert(messages)
        .values({ conversationId, role, content, keywords, createdAt: now })
        .returning();
      await this.touch(tx, conversationId, now);
      return row;
    });
    console.log(`[ConversationService] appendMessage ${role} #${created.id} to conversation ${conversationId}`);

    return toMessage(created);
  }

  async appendMessagePair(
    conversationId: number,
    userContent: string,
    assistantContent: string
  ): Promise<[ConversationMessage, ConversationMessage]> {
    const startTime = Date.now();

    const [userRow, assistantRow] = await this.db.transaction(async (tx) => {
      const now = new Date();
      // Separate inserts so the serial ids, and with them the tie-break order, are user then assistant.
      const [userMessage] = await tx
        .insert(messages)
        .values({ conversationId, role: 'user', content: userContent, createdAt: now })
        .returning();
      const [assistantMessage] = await tx
        .insert(messages)
        .values({ conversationId, role: 'assistant', content: assistantContent, createdAt: now })
        .returning();
      await this.touch(tx, conversationId, now);
      return [userMessage, assistantMessage] as const;
    });
    console.log(`[ConversationService] appendMessagePair #${userRow.id}/#${assistantRow.id} to conversation ${conversationId}, time: ${Date.now() - startTime}ms`);

    return [toMessage(userRow), toMessage(assistantRow)];
  }

  async listMessages(conversationId: number): Promise<ConversationMessage[]> {
    const rows = await this.db
      .select()
      .from(messages)
      .where(eq(messages.conversationId, conversationId))
      .orderBy(asc(messages.createdAt), asc(messages.id));
    return rows.map(toMessage);
  }

  async deleteConversation(conversationId: number): Promise<void> {
    const startTime = Date.now();

    // Children first; the schema's ON DELETE CASCADE is not relied upon.
    await this.db.transaction(async (tx) => {
      await tx.delete(messages).where(eq(messages.conversationId, conversationId));
      await tx.delete(conversations).where(eq(conversations.id, conversationId));
    });
    console.log(`[ConversationService] deleteConversation ${conversationId}, time: ${Date.now() - startTime}ms`);
  }

  private async touch(tx: Transaction, conversationId: number, now: Date): Promise<void> {
    await tx.update(conversations).set({ updatedAt: now }).where(eq(conversations.id, conversationId));
  }
}
