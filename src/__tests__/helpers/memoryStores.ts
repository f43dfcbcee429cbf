import { Conversation, ConversationMessage, ConversationSummary } from '../../models/conversation';
import { CheckInPatch, Goal, GoalCheckIn, GoalPatch, GoalStatus, NewCheckIn, NewGoal } from '../../models/goal';
import { User } from '../../models/user';
import { IConversationStore, newSessionId } from '../../services/conversationService';
import { IGoalStore } from '../../services/goalService';
import { IUserStore } from '../../services/userService';
import { MessageRole } from '../../types';

const BASE_TIME = Date.UTC(2026, 0, 1);

/** Shared tables for the in-memory stores, with a clock that always moves forward. */
export class MemoryState {
  users: User[] = [];
  conversations: Conversation[] = [];
  messages: ConversationMessage[] = [];
  goals: Goal[] = [];
  checkIns: GoalCheckIn[] = [];

  private ticks = 0;
  private readonly sequences = new Map<string, number>();

  now(): Date {
    this.ticks++;
    return new Date(BASE_TIME + this.ticks * 1000);
  }

  nextId(table: string): number {
    const id = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, id);
    return id;
  }
}

export class InMemoryUserStore implements IUserStore {
  constructor(private readonly state: MemoryState) {}

  async createUser(email: string, hashedPassword: string, userName: string | null): Promise<User> {
    const user: User = {
      id: this.state.nextId('users'),
      email,
      hashed_password: hashedPassword,
      user_name: userName,
      created_at: this.state.now(),
    };
    this.state.users.push(user);
    return { ...user };
  }

  async findByEmail(email: string): Promise<User | null> {
    const user = this.state.users.find((u) => u.email === email);
    return user ? { ...user } : null;
  }

  async findById(id: number): Promise<User | null> {
    const user = this.state.users.find((u) => u.id === id);
    return user ? { ...user } : null;
  }

  async deleteUser(id: number): Promise<void> {
    const conversationIds = new Set(this.state.conversations.filter((c) => c.user_id === id).map((c) => c.id));
    const goalIds = new Set(this.state.goals.filter((g) => g.user_id === id).map((g) => g.id));
    this.state.messages = this.state.messages.filter((m) => !conversationIds.has(m.conversation_id));
    this.state.conversations = this.state.conversations.filter((c) => c.user_id !== id);
    this.state.checkIns = this.state.checkIns.filter((c) => !goalIds.has(c.goal_id));
    this.state.goals = this.state.goals.filter((g) => g.user_id !== id);
    this.state.users = this.state.users.filter((u) => u.id !== id);
  }
}

export class InMemoryConversationStore implements IConversationStore {
  /** Writes of these roles fail, leaving nothing behind. */
  readonly failingRoles = new Set<MessageRole>();

  constructor(private readonly state: MemoryState) {}

  async createConversation(userId: number, title: string | null, systemPrompt: string): Promise<ConversationSummary> {
    const now = this.state.now();
    const conversation: Conversation = {
      id: this.state.nextId('conversations'),
      user_id: userId,
      session_id: newSessionId(),
      title,
      created_at: now,
      updated_at: now,
    };
    this.state.conversations.push(conversation);
    this.insert(conversation.id, 'system', systemPrompt, now);
    return { ...conversation, message_count: 1 };
  }

  async getBySessionId(sessionId: string): Promise<Conversation | null> {
    const conversation = this.state.conversations.find((c) => c.session_id === sessionId);
    return conversation ? { ...conversation } : null;
  }

  async listForUser(userId: number, limit: number): Promise<ConversationSummary[]> {
    return this.state.conversations
      .filter((c) => c.user_id === userId)
      .sort((a, b) => b.updated_at.getTime() - a.updated_at.getTime() || b.id - a.id)
      .slice(0, limit)
      .map((c) => ({ ...c, message_count: this.count(c.id) }));
  }

  async countMessages(conversationId: number): Promise<number> {
    return this.count(conversationId);
  }

  async appendMessage(
    conversationId: number,
    role: MessageRole,
    content: string,
    keywords: string[] | null = null
  ): Promise<ConversationMessage> {
    this.checkWritable([role]);
    const now = this.state.now();
    const message = this.insert(conversationId, role, content, now, keywords);
    this.touch(conversationId, now);
    return message;
  }

  async appendMessagePair(
    conversationId: number,
    userContent: string,
    assistantContent: string
  ): Promise<[ConversationMessage, ConversationMessage]> {
    this.checkWritable(['user', 'assistant']);
    const now = this.state.now();
    const userMessage = this.insert(conversationId, 'user', userContent, now);
    const assistantMessage = this.insert(conversationId, 'assistant', assistantContent, now);
    this.touch(conversationId, now);
    return [userMessage, assistantMessage];
  }

  async listMessages(conversationId: number): Promise<ConversationMessage[]> {
    return this.state.messages
      .filter((m) => m.conversation_id === conversationId)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id - b.id)
      .map((m) => ({ ...m }));
  }

  async deleteConversation(conversationId: number): Promise<void> {
    this.state.messages = this.state.messages.filter((m) => m.conversation_id !== conversationId);
    this.state.conversations = this.state.conversations.filter((c) => c.id !== conversationId);
  }

  private checkWritable(roles: MessageRole[]): void {
    const blocked = roles.find((role) => this.failingRoles.has(role));
    if (blocked) {
      throw new Error(`write of ${blocked} message failed`);
    }
  }

  private insert(
    conversationId: number,
    role: MessageRole,
    content: string,
    createdAt: Date,
    keywords: string[] | null = null
  ): ConversationMessage {
    const message: ConversationMessage = {
      id: this.state.nextId('messages'),
      conversation_id: conversationId,
      role,
      content,
      keywords,
      created_at: createdAt,
    };
    this.state.messages.push(message);
    return { ...message };
  }

  private touch(conversationId: number, at: Date): void {
    const conversation = this.state.conversations.find((c) => c.id === conversationId);
    if (conversation) {
      conversation.updated_at = at;
    }
  }

  private count(conversationId: number): number {
    return this.state.messages.filter((m) => m.conversation_id === conversationId).length;
  }
}

export class InMemoryGoalStore implements IGoalStore {
  constructor(private readonly state: MemoryState) {}

  async createGoal(userId: number, input: NewGoal): Promise<Goal> {
    const now = this.state.now();
    const goal: Goal = {
      id: this.state.nextId('goals'),
      user_id: userId,
      title: input.title,
      description: input.description ?? null,
      target_date: input.target_date ?? null,
      status: 'active',
      streak_count: 0,
      created_at: now,
      updated_at: now,
    };
    this.state.goals.push(goal);
    return { ...goal };
  }

  async listForUser(userId: number, status?: GoalStatus): Promise<Goal[]> {
    return this.state.goals
      .filter((g) => g.user_id === userId && (!status || g.status === status))
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id)
      .map((g) => ({ ...g }));
  }

  async findById(goalId: number): Promise<Goal | null> {
    const goal = this.state.goals.find((g) => g.id === goalId);
    return goal ? { ...goal } : null;
  }

  async updateGoal(goalId: number, patch: GoalPatch): Promise<Goal | null> {
    const goal = this.state.goals.find((g) => g.id === goalId);
    if (!goal) return null;
    if (patch.title !== undefined) goal.title = patch.title;
    if (patch.description !== undefined) goal.description = patch.description;
    if (patch.target_date !== undefined) goal.target_date = patch.target_date;
    if (patch.status !== undefined) goal.status = patch.status;
    goal.updated_at = this.state.now();
    return { ...goal };
  }

  async deleteGoal(goalId: number): Promise<void> {
    this.state.checkIns = this.state.checkIns.filter((c) => c.goal_id !== goalId);
    this.state.goals = this.state.goals.filter((g) => g.id !== goalId);
  }

  async createCheckIn(goalId: number, input: NewCheckIn): Promise<GoalCheckIn> {
    const checkIn: GoalCheckIn = {
      id: this.state.nextId('checkIns'),
      goal_id: goalId,
      check_in_date: this.state.now(),
      progress_note: input.progress_note ?? null,
      completed: input.completed,
    };
    this.state.checkIns.push(checkIn);
    const goal = this.state.goals.find((g) => g.id === goalId);
    if (goal && input.completed) {
      goal.streak_count += 1;
      goal.updated_at = this.state.now();
    }
    return { ...checkIn };
  }

  async listCheckIns(goalId: number, limit: number): Promise<GoalCheckIn[]> {
    return this.state.checkIns
      .filter((c) => c.goal_id === goalId)
      .sort((a, b) => b.check_in_date.getTime() - a.check_in_date.getTime() || b.id - a.id)
      .slice(0, limit)
      .map((c) => ({ ...c }));
  }

  async updateCheckIn(goalId: number, checkInId: number, patch: CheckInPatch): Promise<GoalCheckIn | null> {
    const checkIn = this.state.checkIns.find((c) => c.id === checkInId && c.goal_id === goalId);
    if (!checkIn) return null;
    if (patch.progress_note !== undefined) checkIn.progress_note = patch.progress_note;
    if (patch.completed !== undefined) checkIn.completed = patch.completed;
    return { ...checkIn };
  }

  async deleteCheckIn(goalId: number, checkInId: number): Promise<boolean> {
    const before = this.state.checkIns.length;
    this.state.checkIns = this.state.checkIns.filter((c) => !(c.id === checkInId && c.goal_id === goalId));
    return this.state.checkIns.length < before;
  }
}
