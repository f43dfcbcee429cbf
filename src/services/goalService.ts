import { and, desc, eq, sql } from 'drizzle-orm';
import { CheckInPatch, Goal, GoalCheckIn, GoalPatch, GoalStatus, NewCheckIn, NewGoal } from '../models/goal';
import { goalCheckIns, GoalCheckInRow, GoalRow, goals } from '../db/schema';
import type { Database } from './db';

export interface IGoalStore {
  createGoal(userId: number, input: NewGoal): Promise<Goal>;
  /** Newest first, optionally filtered by status. */
  listForUser(userId: number, status?: GoalStatus): Promise<Goal[]>;
  findById(goalId: number): Promise<Goal | null>;
  updateGoal(goalId: number, patch: GoalPatch): Promise<Goal | null>;
  /** Removes the goal and its check-ins. */
  deleteGoal(goalId: number): Promise<void>;

  /**
   * Record a check-in. A completed check-in increments the goal's streak in
   * the same transaction, as a single atomic update.
   */
  createCheckIn(goalId: number, input: NewCheckIn): Promise<GoalCheckIn>;
  /** Newest first. */
  listCheckIns(goalId: number, limit: number): Promise<GoalCheckIn[]>;
  updateCheckIn(goalId: number, checkInId: number, patch: CheckInPatch): Promise<GoalCheckIn | null>;
  deleteCheckIn(goalId: number, checkInId: number): Promise<boolean>;
}

function toGoal(row: GoalRow): Goal {
  return {
    id: row.id,
    user_id: row.userId,
    title: row.title,
    description: row.description,
    target_date: row.targetDate,
    status: row.status,
    streak_count: row.streakCount,
    created_at: row.createdAt,
    updated_at: row.updatedAt,
  };
}

function toCheckIn(row: GoalCheckInRow): GoalCheckIn {
  return {
    id: row.id,
    goal_id: row.goalId,
    check_in_date: row.checkInDate,
    progress_note: row.progressNote,
    completed: row.completed,
  };
}

export class GoalService implements IGoalStore {
  constructor(private readonly db: Database) {}

  async createGoal(userId: number, input: NewGoal): Promise<Goal> {
    const [row] = await this.db
      .insert(goals)
      .values({
        userId,
        title: input.title,
        description: input.description ?? null,
        targetDate: input.target_date ?? null,
        status: 'active',
      })
      .returning();
    console.log(`[GoalService] createGoal #${row.id} for user ${userId}`);
    return toGoal(row);
  }

  async listForUser(userId: number, status?: GoalStatus): Promise<Goal[]> {
    const condition = status
      ? and(eq(goals.userId, userId), eq(goals.status, status))
      : eq(goals.userId, userId);
    const rows = await this.db.select().from(goals).where(condition).orderBy(desc(goals.createdAt), desc(goals.id));
    return rows.map(toGoal);
  }

  async findById(goalId: number): Promise<Goal | null> {
    const [row] = await this.db.select().from(goals).where(eq(goals.id, goalId)).limit(1);
    return row ? toGoal(row) : null;
  }

  async updateGoal(goalId: number, patch: GoalPatch): Promise<Goal | null> {
    const [row] = await this.db
      .update(goals)
      .set({
        ...(patch.title !== undefined ? { title: patch.title } : {}),
        ...(patch.description !== undefined ? { description: patch.description } : {}),
        ...(patch.target_date !== undefined ? { targetDate: patch.target_date } : {}),
        ...(patch.status !== undefined ? { status: patch.status } : {}),
        updatedAt: new Date(),
      })
      .where(eq(goals.id, goalId))
      .returning();
    return row ? toGoal(row) : null;
  }

  async deleteGoal(goalId: number): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(goalCheckIns).where(eq(goalCheckIns.goalId, goalId));
      await tx.delete(goals).where(eq(goals.id, goalId));
    });
    console.log(`[GoalService] deleteGoal #${goalId}`);
  }

  async createCheckIn(goalId: number, input: NewCheckIn): Promise<GoalCheckIn> {
    const startTime = Date.now();

    const created = await this.db.transaction(async (tx) => {
      const [row] = await tx
        .insert(goalCheckIns)
        .values({ goalId, progressNote: input.progress_note ?? null, completed: input.completed })
        .returning();
      if (input.completed) {
        // Incremented in SQL; concurrent check-ins must each count.
        await tx
          .update(goals)
          .set({ streakCount: sql`${goals.streakCount} + 1`, updatedAt: new Date() })
          .where(eq(goals.id, goalId));
      }
      return row;
    });
    console.log(`[GoalService] createCheckIn #${created.id} for goal ${goalId}, completed: ${created.completed}, time: ${Date.now() - startTime}ms`);

    return toCheckIn(created);
  }

  async listCheckIns(goalId: number, limit: number): Promise<GoalCheckIn[]> {
    const rows = await this.db
      .select()
      .from(goalCheckIns)
      .where(eq(goalCheckIns.goalId, goalId))
      .orderBy(desc(goalCheckIns.checkInDate), desc(goalCheckIns.id))
      .limit(limit);
    return rows.map(toCheckIn);
  }

  async updateCheckIn(goalId: number, checkInId: number, patch: CheckInPatch): Promise<GoalCheckIn | null> {
    const changes = {
      ...(patch.progress_note !== undefined ? { progressNote: patch.progress_note } : {}),
      ...(patch.completed !== undefined ? { completed: patch.completed } : {}),
    };
    const scope = and(eq(goalCheckIns.id, checkInId), eq(goalCheckIns.goalId, goalId));

    if (Object.keys(changes).length === 0) {
      const [existing] = await this.db.select().from(goalCheckIns).where(scope).limit(1);
      return existing ? toCheckIn(existing) : null;
    }

    const [row] = await this.db.update(goalCheckIns).set(changes).where(scope).returning();
    return row ? toCheckIn(row) : null;
  }

  async deleteCheckIn(goalId: number, checkInId: number): Promise<boolean> {
    const deleted = await this.db
      .delete(goalCheckIns)
      .where(and(eq(goalCheckIns.id, checkInId), eq(goalCheckIns.goalId, goalId)))
      .returning({ id: goalCheckIns.id });
    return deleted.length > 0;
  }
}
