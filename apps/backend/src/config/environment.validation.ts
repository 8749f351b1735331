import { z } from 'zod';

import { FRAME_FORMATS, isDimensionCompatible } from '../frames/frame-format';

const optionalInt = (min: number, max?: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : undefined))
    .pipe(
      (max === undefined ? z.number().int().min(min) : z.number().int().min(min).max(max)).optional(),
    );

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z
      .string()
      .default('3000')
      .transform((val) => Number(val))
      .pipe(z.number().int().min(0).max(65535)),
    HTTP_PREFIX: z.string().default('api'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    STRUCTURED_LOGS: z
      .string()
      .optional()
      .transform((val) => (val ? val !== 'false' : true)),
    FRAME_WIDTH: optionalInt(1),
    FRAME_HEIGHT: optionalInt(1),
    FRAME_FORMAT: z.enum(['auto', ...FRAME_FORMATS] as const).optional(),
    FRAME_DEFAULT_FORMAT: z.enum(FRAME_FORMATS).optional(),
    FRAME_DETECTION_TOLERANCE: optionalInt(0),
    FRAME_MIN_BYTES: optionalInt(0),
    FRAME_RAW8_BIT_DEPTH: z
      .enum(['8', '10', '12'])
      .optional()
      .transform((val) => (val ? Number(val) : undefined)),
    CAPTURE_DIR: z.string().optional(),
    STREAM_ENABLED: z.string().optional(),
    STREAM_URL: z.string().url('STREAM_URL must be an http(s) URL').optional(),
    STREAM_CAPTURE_URL: z.string().url('STREAM_CAPTURE_URL must be an http(s) URL').optional(),
    STREAM_BOUNDARY: z.string().min(1).optional(),
    STREAM_CONNECT_TIMEOUT_MS: optionalInt(100),
    STREAM_READ_TIMEOUT_MS: optionalInt(100),
    STREAM_RECONNECT_BASE_MS: optionalInt(0),
    STREAM_RECONNECT_MAX_MS: optionalInt(0),
    STREAM_RECONNECT_JITTER: z
      .string()
      .optional()
      .transform((val) => (val ? Number(val) : undefined))
      .pipe(z.number().min(0).max(1).optional()),
    STREAM_RECONNECT_MAX_ATTEMPTS: optionalInt(0),
    CONSUMER_POLL_INTERVAL_MS: optionalInt(1, 60_000),
  })
  .superRefine((env, ctx) => {
    const format = env.FRAME_FORMAT ?? 'auto';
    const dimensions = { width: env.FRAME_WIDTH ?? 1936, height: env.FRAME_HEIGHT ?? 1100 };
    if (format !== 'auto' && !isDimensionCompatible(format, dimensions)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['FRAME_WIDTH'],
        message: `FRAME_WIDTH ${dimensions.width} does not fit the pixel grouping of ${format}`,
      });
    }
  });

export type EnvironmentVariables = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const parsed = envSchema.safeParse(config);

  if (!parsed.success) {
    const formatted = parsed.error.flatten();
    throw new Error(
      `Invalid environment configuration: ${JSON.stringify(formatted.fieldErrors, null, 2)}`,
    );
  }

  return parsed.data;
}
