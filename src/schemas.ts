import { z } from 'zod';
import { GOAL_STATUSES } from './models/goal';

export const RegisterSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(8, 'Password must be at least 8 characters'),
  user_name: z.string().trim().max(255).nullish(),
});

// JSON { email, password } or the OAuth2 password form { username, password }.
export const LoginSchema = z
  .object({
    email: z.string().optional(),
    username: z.string().optional(),
    password: z.string().min(1),
  })
  .transform((body, ctx) => {
    const email = body.email ?? body.username;
    if (!email) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'email is required', path: ['email'] });
      return z.NEVER;
    }
    return { email, password: body.password };
  });

export const ConversationCreateSchema = z.object({
  title: z.string().trim().max(255).nullish(),
});

export const ListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const ChatRequestSchema = z.object({
  message: z.string().min(1, 'message must not be empty').max(32_000),
  max_tokens: z.number().int().positive().max(8192).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export const GoalIdParamsSchema = z.object({
  goalId: z.coerce.number().int().positive(),
});

export const CheckInParamsSchema = GoalIdParamsSchema.extend({
  checkinId: z.coerce.number().int().positive(),
});

export const GoalCreateSchema = z.object({
  title: z.string().trim().min(1).max(255),
  description: z.string().nullish(),
  target_date: z.coerce.date().nullish(),
});

export const GoalUpdateSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  description: z.string().nullable().optional(),
  target_date: z.coerce.date().nullable().optional(),
  status: z.enum(GOAL_STATUSES).optional(),
});

export const GoalListQuerySchema = z.object({
  status: z.enum(GOAL_STATUSES).optional(),
});

export const CheckInCreateSchema = z.object({
  progress_note: z.string().nullish(),
  completed: z.boolean().default(false),
});

export const CheckInUpdateSchema = z.object({
  progress_note: z.string().nullable().optional(),
  completed: z.boolean().optional(),
});

export const CheckInListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(30),
});
