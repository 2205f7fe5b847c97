import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors';

let dotenvLoaded = false;

/**
 * Reads configuration from the environment (after loading `.env` once) and validates it
 * against `schema`. Invalid keys are reported together.
 */
export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  env: NodeJS.ProcessEnv = process.env
): z.output<T> {
  if (!dotenvLoaded && env === process.env) {
    loadDotenv();
    dotenvLoaded = true;
  }

  const result = schema.safeParse(env);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(`Invalid configuration: ${keys.join(', ')}`, result.error.issues);
  }
  return result.data;
}

/** Env var holding an integer, with a default when unset or empty. */
export function envInteger(defaultValue: number) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? defaultValue : Number(value)),
    z.number().int().nonnegative()
  );
}
