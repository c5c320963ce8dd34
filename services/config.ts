import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;

const envSchema = z.object({
  DISKFLASH_CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  DISKFLASH_ELEVATOR: z.string().min(1).default('pkexec'),
  DISKFLASH_LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export type Config = {
  chunkSize: number;
  elevator: string; // helper que re-lanza el worker con privilegios
  lookupTimeoutMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse({
    DISKFLASH_CHUNK_SIZE: env.DISKFLASH_CHUNK_SIZE || undefined,
    DISKFLASH_ELEVATOR: env.DISKFLASH_ELEVATOR || undefined,
    DISKFLASH_LOOKUP_TIMEOUT_MS: env.DISKFLASH_LOOKUP_TIMEOUT_MS || undefined,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(`Invalid ${field}: ${issue?.message ?? 'bad value'}`);
  }
  const c = parsed.data;
  return {
    chunkSize: c.DISKFLASH_CHUNK_SIZE,
    elevator: c.DISKFLASH_ELEVATOR,
    lookupTimeoutMs: c.DISKFLASH_LOOKUP_TIMEOUT_MS,
  };
}
