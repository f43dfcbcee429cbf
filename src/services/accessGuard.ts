import { Conversation } from '../models/conversation';
import { Goal } from '../models/goal';
import { NotFoundError } from '../errors';
import { Identity } from '../types';
import type { IConversationStore } from './conversationService';
import type { IGoalStore } from './goalService';

export type Access<T> = { status: 'allowed'; resource: T } | { status: 'not_found' };

/**
 * Ownership check shared by every route that touches a conversation or a
 * goal. "Does not exist" and "belongs to someone else" are one outcome.
 */
export class AccessGuard {
  constructor(
    private readonly conversations: IConversationStore,
    private readonly goals: IGoalStore
  ) {}

  async authorizeConversation(identity: Identity, sessionId: string): Promise<Access<Conversation>> {
    const conversation = await this.conversations.getBySessionId(sessionId);
    if (!conversation || conversation.user_id !== identity.id) {
      return { status: 'not_found' };
    }
    return { status: 'allowed', resource: conversation };
  }

  async authorizeGoal(identity: Identity, goalId: number): Promise<Access<Goal>> {
    const goal = await this.goals.findById(goalId);
    if (!goal || goal.user_id !== identity.id) {
      return { status: 'not_found' };
    }
    return { status: 'allowed', resource: goal };
  }

  async requireConversation(identity: Identity, sessionId: string): Promise<Conversation> {
    const access = await this.authorizeConversation(identity, sessionId);
    if (access.status === 'not_found') {
      throw new NotFoundError('Conversation not found');
    }
    return access.resource;
  }

  async requireGoal(identity: Identity, goalId: number): Promise<Goal> {
    const access = await this.authorizeGoal(identity, goalId);
    if (access.status === 'not_found') {
      throw new NotFoundError('Goal not found');
    }
    return access.resource;
  }
}
