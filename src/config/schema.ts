import { z } from 'zod';

/** Environment flags follow shell truthiness: unset, empty and "0" are off. */
const envFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && value !== '' && value !== '0');

export const envSchema = z
  .object({
    JMAP_SESSION_URL: z
      .string()
      .url()
      .refine(
        (url) => {
          const parsed = new URL(url);
          if (parsed.protocol === 'https:') {
            return true;
          }
          // Plain HTTP is only acceptable for a server running locally
          return (
            parsed.protocol === 'http:' &&
            (parsed.hostname === 'localhost' || parsed.hostname === '127.0.0.1')
          );
        },
        { message: 'JMAP_SESSION_URL must use HTTPS (HTTP allowed for localhost only)' }
      ),
    JMAP_AUTH_METHOD: z.enum(['basic', 'bearer']).default('basic'),
    JMAP_USERNAME: z.string().optional(),
    JMAP_PASSWORD: z.string().optional(),
    JMAP_TOKEN: z.string().optional(),
    JMAP_REQUEST_TIMEOUT: z.coerce.number().int().positive().default(30000),
    JMAP_STRICT_PROPERTIES: envFlag,
    JMAP_ACCOUNT_PRISTINE: envFlag,
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.JMAP_AUTH_METHOD === 'basic') {
      if (!env.JMAP_USERNAME) {
        ctx.addIssue({
          code: 'custom',
          path: ['JMAP_USERNAME'],
          message: 'JMAP_USERNAME is required for basic auth',
        });
      }
      if (!env.JMAP_PASSWORD) {
        ctx.addIssue({
          code: 'custom',
          path: ['JMAP_PASSWORD'],
          message: 'JMAP_PASSWORD is required for basic auth',
        });
      }
    }
    if (env.JMAP_AUTH_METHOD === 'bearer' && !env.JMAP_TOKEN) {
      ctx.addIssue({
        code: 'custom',
        path: ['JMAP_TOKEN'],
        message: 'JMAP_TOKEN is required for bearer auth',
      });
    }
  });

export type Config = z.infer<typeof envSchema>;

/**
 * Load and validate configuration from the environment.
 * @throws ZodError if the environment is incomplete or invalid
 */
export function loadConfig(): Config {
  return envSchema.parse(process.env);
}
