export const USER_ROLES = ['admin', 'judge', 'user'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export interface User {
  id: string;
  username: string;
  passwordHash: string;
  role: UserRole;
  // judge profile
  name?: string;
  organization?: string;
  judgeId?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewUser = Omit<User, 'id' | 'createdAt' | 'updatedAt'>;

export interface UserPatch {
  username?: string;
  passwordHash?: string;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export const toPublicUser = ({ passwordHash: _passwordHash, ...user }: User): PublicUser => user;
