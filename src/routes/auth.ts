import { Router, RequestHandler } from 'express';
import type { AuthService } from '../services/authService';
import { currentUser } from '../middleware/auth';
import { LoginSchema, RegisterSchema } from '../schemas';

export function createAuthRouter(authService: AuthService, requireAuth: RequestHandler): Router {
  const router: Router = Router();

  router.post('/register', async (req, res, next) => {
    try {
      const body = RegisterSchema.parse(req.body);
      const profile = await authService.register(body);
      res.status(201).json(profile);
    } catch (error) {
      next(error);
    }
  });

  // Accepts JSON or the urlencoded password form.
  router.post('/login', async (req, res, next) => {
    try {
      const { email, password } = LoginSchema.parse(req.body);
      const token = await authService.login(email, password);
      res.json(token);
    } catch (error) {
      next(error);
    }
  });

  router.get('/me', requireAuth, async (req, res, next) => {
    try {
      res.json(await authService.getProfile(currentUser(req)));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/me', requireAuth, async (req, res, next) => {
    try {
      await authService.deleteAccount(currentUser(req));
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
