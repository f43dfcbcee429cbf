import { eq, inArray } from 'drizzle-orm';
import { User } from '../models/user';
import { conversations, goalCheckIns, goals, messages, UserRow, users } from '../db/schema';
import type { Database } from './db';

export interface IUserStore {
  createUser(email: string, hashedPassword: string, userName: string | null): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  /** Removes the user with all conversations, messages, goals and check-ins. */
  deleteUser(id: number): Promise<void>;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    hashed_password: row.hashedPassword,
    user_name: row.userName,
    created_at: row.createdAt,
  };
}

export class UserService implements IUserStore {
  constructor(private readonly db: Database) {}

  async createUser(email: string, hashedPassword: string, userName: string | null): Promise<User> {
    const [row] = await this.db
      .insert(users)
      .values({ email, hashedPassword, userName })
      .returning();
    console.log(`[UserService] createUser #${row.id}`);
    return toUser(row);
  }

  async findByEmail(email: string): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, email)).limit(1);
    return row ? toUser(row) : null;
  }

  async findById(id: number): Promise<User | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    return row ? toUser(row) : null;
  }

  async deleteUser(id: number): Promise<void> {
    const startTime = Date.now();

    await this.db.transaction(async (tx) => {
      const ownedConversations = await tx
        .select({ id: conversations.id })
        .from(conversations)
        .where(eq(conversations.userId, id));
      const conversationIds = ownedConversations.map((c) => c.id);
      if (conversationIds.length > 0) {
        await tx.delete(messages).where(inArray(messages.conversationId, conversationIds));
        await tx.delete(conversations).where(inArray(conversations.id, conversationIds));
      }

      const ownedGoals = await tx.select({ id: goals.id }).from(goals).where(eq(goals.userId, id));
      const goalIds = ownedGoals.map((g) => g.id);
      if (goalIds.length > 0) {
        await tx.delete(goalCheckIns).where(inArray(goalCheckIns.goalId, goalIds));
        await tx.delete(goals).where(inArray(goals.id, goalIds));
      }

      await tx.delete(users).where(eq(users.id, id));
    });
    console.log(`[UserService] deleteUser #${id} completed, time: ${Date.now() - startTime}ms`);
  }
}
