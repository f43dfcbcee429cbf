import { Router } from 'express';
import type { IGoalStore } from '../services/goalService';
import type { AccessGuard } from '../services/accessGuard';
import { currentUser } from '../middleware/auth';
import { NotFoundError } from '../errors';
import {
  CheckInCreateSchema,
  CheckInListQuerySchema,
  CheckInParamsSchema,
  CheckInUpdateSchema,
  GoalCreateSchema,
  GoalIdParamsSchema,
  GoalListQuerySchema,
  GoalUpdateSchema,
} from '../schemas';

export function createGoalsRouter(goals: IGoalStore, guard: AccessGuard): Router {
  const router: Router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const user = currentUser(req);
      const body = GoalCreateSchema.parse(req.body);
      res.status(201).json(await goals.createGoal(user.id, body));
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req, res, next) => {
    try {
      const { status } = GoalListQuerySchema.parse(req.query);
      const list = await goals.listForUser(currentUser(req).id, status);
      res.json({ goals: list, total: list.length });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:goalId', async (req, res, next) => {
    try {
      const { goalId } = GoalIdParamsSchema.parse(req.params);
      res.json(await guard.requireGoal(currentUser(req), goalId));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:goalId', async (req, res, next) => {
    try {
      const { goalId } = GoalIdParamsSchema.parse(req.params);
      await guard.requireGoal(currentUser(req), goalId);
      const patch = GoalUpdateSchema.parse(req.body);
      const updated = await goals.updateGoal(goalId, patch);
      if (!updated) {
        throw new NotFoundError('Goal not found');
      }
      res.json(updated);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:goalId', async (req, res, next) => {
    try {
      const { goalId } = GoalIdParamsSchema.parse(req.params);
      await guard.requireGoal(currentUser(req), goalId);
      await goals.deleteGoal(goalId);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  // Check-ins

  router.post('/:goalId/checkins', async (req, res, next) => {
    try {
      const { goalId } = GoalIdParamsSchema.parse(req.params);
      await guard.requireGoal(currentUser(req), goalId);
      const body = CheckInCreateSchema.parse(req.body ?? {});
      res.status(201).json(await goals.createCheckIn(goalId, body));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:goalId/checkins', async (req, res, next) => {
    try {
      const { goalId } = GoalIdParamsSchema.parse(req.params);
      await guard.requireGoal(currentUser(req), goalId);
      const { limit } = CheckInListQuerySchema.parse(req.query);
      const checkIns = await goals.listCheckIns(goalId, limit);
      res.json({ check_ins: checkIns, total: checkIns.length });
    } catch (error) {
      next(error);
    }
  });

  router.put('/:goalId/checkins/:checkinId', async (req, res, next) => {
    try {
      const { goalId, checkinId } = CheckInParamsSchema.parse(req.params);
      await guard.requireGoal(currentUser(req), goalId);
      const patch = CheckInUpdateSchema.parse(req.body);
      const updated = await goals.updateCheckIn(goalId, checkinId, patch);
      if (!updated) {
        throw new NotFoundError('Check-in not found');
      }
      res.json(updated);
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:goalId/checkins/:checkinId', async (req, res, next) => {
    try {
      const { goalId, checkinId } = CheckInParamsSchema.parse(req.params);
      await guard.requireGoal(currentUser(req), goalId);
      if (!(await goals.deleteCheckIn(goalId, checkinId))) {
        throw new NotFoundError('Check-in not found');
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
