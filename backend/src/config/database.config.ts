import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const DatabaseEnvSchema = z.object({
  DB_HOST: z.string().min(1),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_USERNAME: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_DATABASE: z.string().default('bms'),
  NODE_ENV: z.string().default('development'),
});

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  logging: boolean;
}

/**
 * PostgreSQL connection settings for the history writer.
 * Only read when DB_HOST is set.
 */
export function parseDatabaseConfig(
  env: Record<string, string | undefined>,
): DatabaseConfig {
  const result = DatabaseEnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid database configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    host: parsed.DB_HOST,
    port: parsed.DB_PORT,
    username: parsed.DB_USERNAME,
    password: parsed.DB_PASSWORD,
    database: parsed.DB_DATABASE,
    logging: parsed.NODE_ENV === 'development',
  };
}

export const databaseConfig = registerAs(
  'database',
  (): DatabaseConfig => parseDatabaseConfig(process.env),
);
