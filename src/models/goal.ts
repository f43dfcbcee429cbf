export const GOAL_STATUSES = ['active', 'completed', 'abandoned'] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

export interface Goal {
  id: number;
  user_id: number;
  title: string;
  description: string | null;
  target_date: Date | null;
  status: GoalStatus;
  streak_count: number;
  created_at: Date;
  updated_at: Date;
}

export interface GoalCheckIn {
  id: number;
  goal_id: number;
  check_in_date: Date;
  progress_note: string | null;
  completed: boolean;
}

export interface NewGoal {
  title: string;
  description?: string | null;
  target_date?: Date | null;
}

export interface GoalPatch {
  title?: string;
  description?: string | null;
  target_date?: Date | null;
  status?: GoalStatus;
}

export interface NewCheckIn {
  progress_note?: string | null;
  completed: boolean;
}

export interface CheckInPatch {
  progress_note?: string | null;
  completed?: boolean;
}
