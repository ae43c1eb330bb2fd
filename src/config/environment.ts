import { isIP } from 'node:net';
import { z } from 'zod';

export const RECORDER_FORMATS = ['csv', 'jsonl'] as const;

export type RecorderFormat = (typeof RECORDER_FORMATS)[number];

/**
 * Environment schema, checked once at start-up by ConfigModule.
 */
export const environmentSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  MODEM_ADDRESS: z
    .string()
    .trim()
    .refine((value) => isIP(value) !== 0, {
      message: 'MODEM_ADDRESS must be an IPv4 or IPv6 address',
    })
    .default('192.168.100.1'),
  MODEM_SCHEME: z.enum(['http', 'https']).default('http'),
  MODEM_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RECORDER_FORMATS: z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((format) => format.trim().toLowerCase())
        .filter((format) => format.length > 0),
    )
    .pipe(z.array(z.enum(RECORDER_FORMATS))),
  RECORDER_OUTPUT_DIR: z.string().min(1).default('data'),
  RECORDER_INTERVAL_SECONDS: z.coerce.number().min(5).default(60),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * `validate` hook for ConfigModule.forRoot. Throws with every problem listed
 * so a misconfigured deployment fails before the first poll.
 */
export function validateEnvironment(config: Record<string, unknown>): Environment {
  const result = environmentSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  return result.data;
}
