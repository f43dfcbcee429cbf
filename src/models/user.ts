export interface User {
  id: number;
  email: string;
  hashed_password: string;
  user_name: string | null;
  created_at: Date;
}

export type UserProfile = Omit<User, 'hashed_password'>;

export function toUserProfile(user: User): UserProfile {
  return {
    id: user.id,
    email: user.email,
    user_name: user.user_name,
    created_at: user.created_at,
  };
}
