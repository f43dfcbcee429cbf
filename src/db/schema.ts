import { getTableColumns, getTableName } from 'drizzle-orm';
import { boolean, index, integer, jsonb, pgTable, serial, text, timestamp, varchar } from 'drizzle-orm/pg-core';
import type { PgTable } from 'drizzle-orm/pg-core';
import type { GoalStatus } from '../models/goal';
import type { MessageRole } from '../types';

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  hashedPassword: varchar('hashed_password', { length: 255 }).notNull(),
  userName: varchar('user_name', { length: 255 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const conversations = pgTable(
  'conversations',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    sessionId: varchar('session_id', { length: 255 }).notNull().unique(),
    title: varchar('title', { length: 255 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('idx_conversations_user_id').on(table.userId),
    updatedIdx: index('idx_conversations_updated_at').on(table.updatedAt),
  })
);

export const messages = pgTable(
  'messages',
  {
    id: serial('id').primaryKey(),
    conversationId: integer('conversation_id')
      .notNull()
      .references(() => conversations.id, { onDelete: 'cascade' }),
    role: varchar('role', { length: 20 }).$type<MessageRole>().notNull(),
    content: text('content').notNull(),
    keywords: jsonb('keywords').$type<string[]>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    conversationIdx: index('idx_messages_conversation_id').on(table.conversationId, table.createdAt),
  })
);

export const goals = pgTable(
  'goals',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    title: varchar('title', { length: 255 }).notNull(),
    description: text('description'),
    targetDate: timestamp('target_date', { withTimezone: true }),
    status: varchar('status', { length: 20 }).$type<GoalStatus>().notNull().default('active'),
    streakCount: integer('streak_count').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('idx_goals_user_id').on(table.userId),
  })
);

export const goalCheckIns = pgTable(
  'goal_check_ins',
  {
    id: serial('id').primaryKey(),
    goalId: integer('goal_id')
      .notNull()
      .references(() => goals.id, { onDelete: 'cascade' }),
    checkInDate: timestamp('check_in_date', { withTimezone: true }).notNull().defaultNow(),
    progressNote: text('progress_note'),
    completed: boolean('completed').notNull().default(false),
  },
  (table) => ({
    goalIdx: index('idx_goal_check_ins_goal_id').on(table.goalId, table.checkInDate),
  })
);

export const TABLE_NAMES = ['users', 'conversations', 'messages', 'goals', 'goal_check_ins'] as const;

const TABLES: PgTable[] = [users, conversations, messages, goals, goalCheckIns];

/** Column names each table must carry, keyed by table name. */
export const EXPECTED_COLUMNS: Record<string, string[]> = Object.fromEntries(
  TABLES.map((table): [string, string[]] => [getTableName(table), Object.values(getTableColumns(table)).map((column) => column.name)])
);

export type UserRow = typeof users.$inferSelect;
export type ConversationRow = typeof conversations.$inferSelect;
export type MessageRow = typeof messages.$inferSelect;
export type GoalRow = typeof goals.$inferSelect;
export type GoalCheckInRow = typeof goalCheckIns.$inferSelect;
