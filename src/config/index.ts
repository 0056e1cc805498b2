import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  flow: z.object({
    executor: z.enum(['direct', 'deferred', 'pool']).default('direct'),
    poolSize: z.coerce.number().int().positive().default(8),
    allowUnlockedRendering: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),
  }),

  lock: z.object({
    stripes: z.coerce.number().int().positive().default(1000),
    timeoutMs: z.coerce.number().int().positive().optional(),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReturnType<typeof configSchema.safeParse> {
  const rawConfig = {
    nodeEnv: env.NODE_ENV,
    flow: {
      executor: env.FLOW_EXECUTOR,
      poolSize: env.FLOW_POOL_SIZE,
      allowUnlockedRendering: env.FLOW_ALLOW_UNLOCKED_RENDERING,
    },
    lock: {
      stripes: env.FLOW_LOCK_STRIPES,
      timeoutMs: env.FLOW_LOCK_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : undefined),
    },
  };

  return configSchema.safeParse(rawConfig);
}

function resolveConfig(): Config {
  const result = loadConfig();

  if (!result.success) {
    console.error('Invalid configuration:', result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = resolveConfig();
