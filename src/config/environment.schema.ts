import { z } from 'zod';

/**
 * Lenient boolean parsing for environment flags.
 *
 * `z.coerce.boolean()` treats any non-empty string as true, so "false" would
 * enable a flag. Environment values are strings; only "true"/"1"/"yes" enable.
 */
const parseFlag = (value: boolean | string): boolean =>
  typeof value === 'boolean'
    ? value
    : ['true', '1', 'yes'].includes(value.trim().toLowerCase());

const booleanFlag = (defaultValue: boolean) =>
  z.union([z.boolean(), z.string()]).default(defaultValue).transform(parseFlag);

const optionalBooleanFlag = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform((value) => (value === undefined ? undefined : parseFlag(value)));

/**
 * API version literal accepted by configuration: "1", "1.0", "v2", "2.1"
 */
const apiVersionLiteral = z
  .string()
  .trim()
  .regex(/^v?\d+(\.\d+)?$/i, 'Must be a version such as "1.0" or "v2"');

export const EnvironmentSchema = z
  .object({
    // Server Configuration
    NODE_ENV: z
      .enum(['development', 'test', 'staging', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    // Request pipeline
    APP_DEFAULT_API_VERSION: apiVersionLiteral.default('1.0'),
    APP_VERSION_PRECEDENCE: z
      .enum(['header-first', 'path-first'])
      .default('header-first')
      .describe('Which version signal wins when both URL segment and X-Version header are present'),
    APP_CORRELATION_PLACEMENT: z
      .enum(['after-identity', 'before-identity'])
      .default('after-identity')
      .describe('Position of the correlation stage relative to the identity stage'),
    APP_REQUEST_TIMEOUT: z.coerce.number().int().min(100).max(120000).default(15000),
    APP_EXPOSE_ERROR_DETAILS: optionalBooleanFlag,

    // Mock enrichment latency
    APP_ENRICHMENT_MIN_DELAY_MS: z.coerce.number().int().min(0).max(10000).default(100),
    APP_ENRICHMENT_MAX_DELAY_MS: z.coerce.number().int().min(0).max(10000).default(500),

    // Application-level Swagger Configuration
    APP_SWAGGER_ENABLED: booleanFlag(true),
    APP_SWAGGER_SERVER_URL: z.string().url().default('http://localhost:3000'),

    // Application-level CORS Configuration
    APP_CORS_ALLOWED_ORIGINS: z
      .string()
      .default('http://localhost:3000,http://localhost:5173')
      .transform((str) => {
        if (str === '*') return ['*'];
        return str.split(',').map((origin) => origin.trim()).filter(Boolean);
      }),

    // Application-level Security Configuration
    APP_ENABLE_HELMET: booleanFlag(true),
  })
  .superRefine((config, ctx) => {
    if (config.APP_ENRICHMENT_MIN_DELAY_MS > config.APP_ENRICHMENT_MAX_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['APP_ENRICHMENT_MIN_DELAY_MS'],
        message:
          'APP_ENRICHMENT_MIN_DELAY_MS must not be greater than APP_ENRICHMENT_MAX_DELAY_MS',
      });
    }

    if (config.NODE_ENV === 'production') {
      // Stack traces and exception type names must never leave a production host
      if (config.APP_EXPOSE_ERROR_DETAILS === true) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['APP_EXPOSE_ERROR_DETAILS'],
          message:
            'APP_EXPOSE_ERROR_DETAILS=true is not allowed in production environment.',
        });
      }

      const corsOrigins = config.APP_CORS_ALLOWED_ORIGINS;
      if (corsOrigins.includes('*')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['APP_CORS_ALLOWED_ORIGINS'],
          message:
            'APP_CORS_ALLOWED_ORIGINS="*" not allowed in production environment. ' +
            'Please set APP_CORS_ALLOWED_ORIGINS to a comma-separated list of allowed domains.',
        });
      }
    }
  });

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Resolve whether error envelopes carry exception type names and stack traces.
 *
 * Explicit configuration wins; otherwise only production hides them.
 */
export function shouldExposeErrorDetails(config: Pick<Environment, 'NODE_ENV' | 'APP_EXPOSE_ERROR_DETAILS'>): boolean {
  return config.APP_EXPOSE_ERROR_DETAILS ?? config.NODE_ENV !== 'production';
}
