import http from 'http';
import dotenv from 'dotenv';
import { Server } from 'socket.io';
import { loadConfig } from './config';
import { createApp } from './app';
import { applySchema, createDatabase, PostgresHealthProbe } from './services/db';
import { UserService } from './services/userService';
import { ConversationService } from './services/conversationService';
import { GoalService } from './services/goalService';
import { InferenceClient } from './services/inferenceClient';
import { PersonaService } from './services/personaService';
import { AccessGuard } from './services/accessGuard';
import { AuthService } from './services/authService';
import { ChatService } from './services/chatService';
import { ChatServer, ChatSocketService } from './services/websocket';
import { errorMessage } from './errors';

dotenv.config();

async function main(): Promise<void> {
  console.log('[Startup] Initializing server environment...');
  const config = loadConfig();

  const database = createDatabase(config.database);
  await applySchema(database.pool);

  const users = new UserService(database.db);
  const conversations = new ConversationService(database.db);
  const goals = new GoalService(database.db);
  const personas = new PersonaService();
  const inference = new InferenceClient(config.inference);
  const guard = new AccessGuard(conversations, goals);
  const authService = new AuthService(users, config.auth);
  const chatService = new ChatService(conversations, inference, guard);

  if (!inference.isReady()) {
    console.warn('[Startup] INFERENCE_API_KEY not configured; chat turns will fail upstream');
  }

  const app = createApp({
    authService,
    chatService,
    conversations,
    goals,
    guard,
    personas,
    inference,
    databaseProbe: new PostgresHealthProbe(async (text) => (await database.pool.query(text)).rows),
    corsOrigins: config.corsOrigins,
  });

  const httpServer = http.createServer(app);
  const io: ChatServer = new Server(httpServer, {
    path: '/socket.io',
    cors: {
      origin: config.corsOrigins === '*' ? true : config.corsOrigins,
      methods: ['GET', 'POST'],
      credentials: true,
    },
    transports: ['websocket', 'polling'],
    pingTimeout: 60_000,
    pingInterval: 25_000,
    maxHttpBufferSize: 1e6,
  });
  new ChatSocketService(authService, chatService).attach(io);

  httpServer.listen(config.port, () => {
    console.log(`[Startup] Server running on port ${config.port} (${config.nodeEnv})`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully`);
    io.close(() => {
      database
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[Shutdown] Failed to close database:', errorMessage(error));
          process.exit(1);
        });
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  console.error('[Startup] Fatal:', error);
  process.exit(1);
});
