import { Router } from 'express';
import type { IConversationStore } from '../services/conversationService';
import type { AccessGuard } from '../services/accessGuard';
import type { PersonaService } from '../services/personaService';
import { currentUser } from '../middleware/auth';
import { ConversationCreateSchema, ListQuerySchema } from '../schemas';

export interface ConversationRouteDeps {
  conversations: IConversationStore;
  guard: AccessGuard;
  personas: PersonaService;
}

export function createConversationsRouter({ conversations, guard, personas }: ConversationRouteDeps): Router {
  const router: Router = Router();

  // Create new conversation, seeded with the coach's system prompt
  router.post('/', async (req, res, next) => {
    try {
      const user = currentUser(req);
      const { title } = ConversationCreateSchema.parse(req.body ?? {});
      const conversation = await conversations.createConversation(
        user.id,
        title ?? null,
        personas.getSystemPrompt()
      );
      console.log(`[Conversations] Created ${conversation.session_id} for user #${user.id}`);
      res.status(201).json(conversation);
    } catch (error) {
      next(error);
    }
  });

  // Get user's conversations
  router.get('/', async (req, res, next) => {
    try {
      const user = currentUser(req);
      const { limit } = ListQuerySchema.parse(req.query);
      const list = await conversations.listForUser(user.id, limit);
      res.json({ conversations: list, total: list.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId', async (req, res, next) => {
    try {
      const conversation = await guard.requireConversation(currentUser(req), req.params.sessionId);
      const messageCount = await conversations.countMessages(conversation.id);
      res.json({ ...conversation, message_count: messageCount });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId/messages', async (req, res, next) => {
    try {
      const conversation = await guard.requireConversation(currentUser(req), req.params.sessionId);
      res.json(await conversations.listMessages(conversation.id));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:sessionId', async (req, res, next) => {
    try {
      const conversation = await guard.requireConversation(currentUser(req), req.params.sessionId);
      await conversations.deleteConversation(conversation.id);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
