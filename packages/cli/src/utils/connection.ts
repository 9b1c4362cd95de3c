import { z } from 'zod';
import { SettingsValidationError } from '@sentinel/shared';

export interface ConnectionOptions {
  host: string;
  port: number;
  password?: string;
}

const connectionSchema = z.object({
  host: z.string().min(1, 'host is required (--host or SENTINEL_HOST)'),
  port: z.coerce
    .number({ invalid_type_error: 'port must be a number' })
    .int()
    .min(1)
    .max(65535),
  password: z.string().min(1).optional(),
});

/** Global flags as commander hands them over, before validation. */
export type GlobalFlags = {
  host?: string;
  port?: string;
  password?: string;
};

/**
 * Merge command-line flags with SENTINEL_HOST, SENTINEL_PORT and
 * SENTINEL_PASSWORD. Flags win.
 */
export function resolveConnection(
  flags: GlobalFlags,
  env: NodeJS.ProcessEnv = process.env,
): ConnectionOptions {
  const result = connectionSchema.safeParse({
    host: flags.host ?? env.SENTINEL_HOST ?? '',
    port: flags.port ?? env.SENTINEL_PORT,
    password: flags.password ?? (env.SENTINEL_PASSWORD || undefined),
  });

  if (!result.success) {
    throw new SettingsValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return result.data;
}
