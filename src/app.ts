import express, { Express } from 'express';
import cors from 'cors';
import type { AuthService } from './services/authService';
import type { ChatService } from './services/chatService';
import type { IConversationStore } from './services/conversationService';
import type { IGoalStore } from './services/goalService';
import type { AccessGuard } from './services/accessGuard';
import type { PersonaService } from './services/personaService';
import type { IDatabaseProbe } from './services/db';
import type { IInferenceAdapter } from './services/inferenceAdapter';
import { createAuthMiddleware } from './middleware/auth';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createAuthRouter } from './routes/auth';
import { createConversationsRouter } from './routes/conversations';
import { createChatRouter } from './routes/chat';
import { createGoalsRouter } from './routes/goals';
import { createHealthRouter } from './routes/health';

export const SERVICE_NAME = 'coaching-chat-backend';
export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  authService: AuthService;
  chatService: ChatService;
  conversations: IConversationStore;
  goals: IGoalStore;
  guard: AccessGuard;
  personas: PersonaService;
  inference: IInferenceAdapter;
  databaseProbe: IDatabaseProbe;
  corsOrigins: string[] | '*';
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const requireAuth = createAuthMiddleware(deps.authService);

  app.use(
    cors({
      origin: deps.corsOrigins === '*' ? true : deps.corsOrigins,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger);

  // Public routes (no auth)
  app.get('/', (_req, res) => {
    res.json({ service: SERVICE_NAME, version: SERVICE_VERSION, status: 'running' });
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      inferenceConfigured: deps.inference.isReady(),
    });
  });

  app.use('/db', createHealthRouter(deps.databaseProbe));
  app.use('/auth', createAuthRouter(deps.authService, requireAuth));

  // Authenticated API routes
  app.use(
    '/conversations',
    requireAuth,
    createConversationsRouter({ conversations: deps.conversations, guard: deps.guard, personas: deps.personas })
  );
  app.use('/chat', requireAuth, createChatRouter(deps.chatService));
  app.use('/goals', requireAuth, createGoalsRouter(deps.goals, deps.guard));

  app.use(errorHandler);

  return app;
}
