import { config as loadEnv } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

/**
 * Carga los archivos `.env` relevantes según el `NODE_ENV` y valida las variables
 * de entorno. Centraliza la configuración de la base de datos y de la capa HTTP
 * para que ningún módulo lea `process.env` directamente.
 */
const resolveEnvFiles = (): string[] => {
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const candidates = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env'
  ];

  return candidates
    .map((fileName) => resolve(process.cwd(), fileName))
    .filter((absolutePath) => existsSync(absolutePath));
};

// Los archivos más específicos van primero y no deben ser pisados por los genéricos
resolveEnvFiles().forEach((path) => {
  loadEnv({ path });
});

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultValue)
    .transform((value) => value === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(4000),
    API_URL: z.string().url().default('http://localhost:4000'),
    CLIENT_APP_URL: z.string().url().default('http://localhost:3000'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    DATABASE_TYPE: z.enum(['better-sqlite3', 'postgres']).default('better-sqlite3'),
    DATABASE_PATH: z.string().min(1).default('data/catalog.sqlite'),
    DATABASE_URL: z.string().url().optional(),
    DATABASE_SYNCHRONIZE: booleanFlag('false'),
    DATABASE_LOGGING: booleanFlag('false'),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120)
  })
  .superRefine((value, ctx) => {
    if (value.DATABASE_TYPE === 'postgres' && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL es obligatorio cuando DATABASE_TYPE=postgres'
      });
    }
  });

/**
 * Valida un objeto de variables de entorno. Se expone aparte de `env` para poder
 * probar la validación sin depender del proceso actual.
 */
export const parseEnv = (source: NodeJS.ProcessEnv) => {
  const parsedEnv = envSchema.safeParse(source);

  if (!parsedEnv.success) {
    const formattedErrors = parsedEnv.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    throw new Error(`Variables de entorno inválidas:\n${formattedErrors}`);
  }

  return parsedEnv.data;
};

/**
 * Configuración validada del entorno de ejecución.
 */
export const env = parseEnv(process.env);

export type AppEnv = typeof env;
