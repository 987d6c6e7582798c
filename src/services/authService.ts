import bcrypt from 'bcrypt';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { USER_ROLES, type User, type UserRole } from '../domain/user';
import { ApiError, notFoundAsNull } from '../errors';
import type { UserStore } from '../stores/types';

export interface AuthOptions {
  jwtSecret: string;
  tokenTtlSeconds: number;
  bcryptRounds: number;
}

export interface TokenClaims {
  id: string;
  username: string;
  role: UserRole;
}

const TOKEN_ALGORITHM = 'HS256';

// Tokens issued without a role claim belong to a plain authenticated user.
const claimsSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  role: z.enum(USER_ROLES).default('user')
});

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly options: AuthOptions
  ) {}

  async login(username: string, password: string): Promise<{ user: User; token: string }> {
    const user = await notFoundAsNull(this.users.getByUsername(username));

    if (!user) {
      throw new ApiError('unauthorized', 'Invalid credentials');
    }

    const isValidPassword = await bcrypt.compare(password, user.passwordHash);
    if (!isValidPassword) {
      throw new ApiError('unauthorized', 'Invalid credentials');
    }

    const token = this.generateToken(user);
    return { user, token };
  }

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.options.bcryptRounds);
  }

  generateToken(user: Pick<User, 'id' | 'username' | 'role'>): string {
    const payload: TokenClaims = {
      id: user.id,
      username: user.username,
      role: user.role
    };
    return jwt.sign(payload, this.options.jwtSecret, {
      algorithm: TOKEN_ALGORITHM,
      expiresIn: this.options.tokenTtlSeconds
    });
  }

  verifyToken(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.jwtSecret, { algorithms: [TOKEN_ALGORITHM] });
    } catch (error) {
      throw new ApiError('unauthorized', 'Invalid or expired token', { cause: error });
    }

    const claims = claimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new ApiError('unauthorized', 'Invalid token claims');
    }
    return claims.data;
  }
}
