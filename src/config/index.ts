import { z } from 'zod';

const configSchema = z.object({
  database: z.object({
    type: z.enum(['sqlite', 'postgres']).default('sqlite'),
    path: z.string().default('./data/bookshelf.db'),
    url: z.string().optional(),
  }),
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
  }),
  auth: z.object({
    tokenLifetimeSeconds: z.number().int().positive().default(86400),
    passwordRounds: z.number().int().min(4).max(31).default(10),
  }),
  bootstrap: z.object({
    adminEmail: z.string().email().optional(),
    adminPassword: z.string().min(1).optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type DatabaseConfig = Config['database'];

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
  const isProduction = env.NODE_ENV === 'production';
  const databaseType = isProduction ? (env.DATABASE_TYPE || 'sqlite') : 'sqlite';

  return configSchema.parse({
    database: {
      type: databaseType,
      path: env.DATABASE_PATH || './data/bookshelf.db',
      url: databaseType === 'postgres' ? env.DATABASE_URL : undefined,
    },
    server: {
      port: parseInt(env.PORT || '3000', 10),
      host: env.HOST || '0.0.0.0',
    },
    auth: {
      tokenLifetimeSeconds: parseInt(env.TOKEN_LIFETIME_SECONDS || '86400', 10),
      passwordRounds: parseInt(env.PASSWORD_ROUNDS || '10', 10),
    },
    bootstrap: {
      adminEmail: env.ADMIN_EMAIL || undefined,
      adminPassword: env.ADMIN_PASSWORD || undefined,
    },
  });
}
