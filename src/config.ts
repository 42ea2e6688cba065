import { z } from 'zod';
import { ConfigError } from './errors';

export const clientOptionsSchema = z.object({
  host: z.string().min(1, "host is required").default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(11211),
  /** Upper bound on a single read; unset means wait forever. */
  timeoutMs: z.coerce.number().int().positive().optional(),
});

export type ClientOptions = z.infer<typeof clientOptionsSchema>;
export type ClientOptionsInput = z.input<typeof clientOptionsSchema>;

function parseOptions(raw: unknown): ClientOptions {
  const result = clientOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

export function resolveOptions(input: ClientOptionsInput = {}): ClientOptions {
  return parseOptions(input);
}

/**
 * Reads MEMWIRE_HOST, MEMWIRE_PORT and MEMWIRE_TIMEOUT_MS.
 * Unset variables fall back to the schema defaults.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): ClientOptions {
  return parseOptions({
    host: env.MEMWIRE_HOST,
    port: env.MEMWIRE_PORT,
    timeoutMs: env.MEMWIRE_TIMEOUT_MS,
  });
}
