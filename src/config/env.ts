import { z } from 'zod';

export const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000'];

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  MONGODB_URI: z.string().default('mongodb://localhost:27017/hackathon-admin'),
  JWT_SECRET: z.string().min(16, 'must be at least 16 characters'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  CORS_ORIGINS: z.string().optional(),
  REDIS_URL: z.string().url().optional(),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  ADMIN_USERNAME: z.string().min(3).max(50).default('admin'),
  ADMIN_PASSWORD: z.string().min(6).optional(),
  REGISTRATION_NUMBER_PREFIX: z.string().default('PCCOEIGC'),
  TEAM_ID_PREFIX: z.string().default('IGC'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export interface AppConfig {
  port: number;
  host: string;
  mongodbUri: string;
  logLevel: LogLevel;
  corsOrigins: string[];
  auth: {
    jwtSecret: string;
    tokenTtlSeconds: number;
    bcryptRounds: number;
  };
  rateLimit: {
    redisUrl?: string;
    windowSeconds: number;
    maxRequests: number;
  };
  admin: {
    username: string;
    password?: string;
  };
  registration: {
    numberPrefix: string;
    teamIdPrefix: string;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const parseOrigins = (value: string | undefined) => {
  const extra = (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return [...new Set([...DEFAULT_CORS_ORIGINS, ...extra])];
};

/** Blank variables count as unset, so `REDIS_URL=` in a .env file keeps rate limiting off. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    mongodbUri: vars.MONGODB_URI,
    logLevel: vars.LOG_LEVEL,
    corsOrigins: parseOrigins(vars.CORS_ORIGINS),
    auth: {
      jwtSecret: vars.JWT_SECRET,
      tokenTtlSeconds: vars.JWT_EXPIRES_IN_SECONDS,
      bcryptRounds: vars.BCRYPT_ROUNDS
    },
    rateLimit: {
      redisUrl: vars.REDIS_URL,
      windowSeconds: vars.RATE_LIMIT_WINDOW_SECONDS,
      maxRequests: vars.RATE_LIMIT_MAX_REQUESTS
    },
    admin: {
      username: vars.ADMIN_USERNAME,
      password: vars.ADMIN_PASSWORD
    },
    registration: {
      numberPrefix: vars.REGISTRATION_NUMBER_PREFIX,
      teamIdPrefix: vars.TEAM_ID_PREFIX
    }
  };
}
