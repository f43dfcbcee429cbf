import { Router } from 'express';
import type { ChatService } from '../services/chatService';
import type { StreamingTurn } from '../services/streamingTurn';
import { currentUser } from '../middleware/auth';
import { ChatRequestSchema } from '../schemas';

export function createChatRouter(chatService: ChatService): Router {
  const router: Router = Router();

  router.post('/:sessionId', async (req, res, next) => {
    const startTime = Date.now();
    try {
      const body = ChatRequestSchema.parse(req.body);
      const result = await chatService.sendMessage(currentUser(req), req.params.sessionId, body.message, {
        maxTokens: body.max_tokens,
        temperature: body.temperature,
      });
      console.log(`[Chat] Buffered turn for ${result.session_id} finished in ${Date.now() - startTime}ms`);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Streams the reply as plain text. Everything that can fail with a status
   * code (validation, auth, ownership) happens before the first byte.
   * After that, failures arrive in-band as a trailing error marker.
   */
  router.post('/:sessionId/stream', async (req, res, next) => {
    const startTime = Date.now();
    const clientGone = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        clientGone.abort();
      }
    });

    let turn: StreamingTurn;
    try {
      const body = ChatRequestSchema.parse(req.body);
      turn = await chatService.startStreamingTurn(currentUser(req), req.params.sessionId, body.message, {
        maxTokens: body.max_tokens,
        temperature: body.temperature,
      });
    } catch (error) {
      return next(error);
    }

    if (clientGone.signal.aborted) {
      turn.cancel();
      const outcome = await turn.completion;
      console.log(`[Chat] Client left ${turn.sessionId} before streaming began; turn ${outcome.status}`);
      return;
    }
    clientGone.signal.addEventListener('abort', () => turn.cancel(), { once: true });

    res.status(200);
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    try {
      for await (const chunk of turn.output) {
        if (res.destroyed) break;
        res.write(chunk);
      }
      const outcome = await turn.completion;
      console.log(
        `[Chat] Stream turn for ${turn.sessionId} ended ${outcome.status} after ${Date.now() - startTime}ms`
      );
      res.end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
