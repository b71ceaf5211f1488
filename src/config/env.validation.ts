import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().optional(),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_NAME: z.string().default('clinic'),
  DB_SSL: z.enum(['true', 'false']).default('false'),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET must be set'),

  TEXTBELT_API_KEY: z.string().optional(),
  SMS_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  OPENROUTER_API_KEY: z.string().optional(),
  CHAT_MODEL: z.string().default('google/gemini-flash-1.5'),
  CLINIC_NAME: z.string().default('the clinic'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Passed to ConfigModule.forRoot: the app refuses to boot on an invalid
 * environment, a missing signing secret included.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return parsed.data;
}
