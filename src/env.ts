import { config } from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_RATE_LIMIT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from './utils.js';
import { parseFormatTag } from './select.js';

const integer = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/u, 'must be a whole number')
    .transform(Number)
    .pipe(z.number().int().min(min))
    .optional()
    .transform((value) => value ?? fallback);

const envSchema = z.object({
  YANDEX_MUSIC_TOKEN: z.string().trim().optional(),
  DOWNLOAD_FORMAT: z
    .string()
    .default('mp3')
    .transform((value, ctx) => {
      const format = parseFormatTag(value);
      if (!format) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be one of flac, mp3, aac, other' });
        return z.NEVER;
      }
      return format;
    }),
  DOWNLOAD_DIR: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  DOWNLOAD_DELAY_MS: integer(DEFAULT_RATE_LIMIT_MS, 0),
  DOWNLOAD_MAX_RETRIES: integer(DEFAULT_MAX_RETRIES, 0),
  DOWNLOAD_TIMEOUT_MS: integer(DEFAULT_REQUEST_TIMEOUT_MS, 1),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates the given environment. Returns the parsed settings or a printable list of problems.
 */
export const parseEnv = (
  source: NodeJS.ProcessEnv,
): { readonly ok: true; readonly env: Env } | { readonly ok: false; readonly problems: string[] } => {
  const parsed = envSchema.safeParse(source);
  if (parsed.success) {
    return { ok: true, env: parsed.data };
  }
  return {
    ok: false,
    problems: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
};

/**
 * Loads `.env` from the working directory, then validates `process.env`; exits on invalid values.
 */
export const loadEnv = (): Env => {
  config();
  const result = parseEnv(process.env);
  if (!result.ok) {
    console.error('Invalid environment variables:');
    for (const problem of result.problems) {
      console.error(`  ${problem}`);
    }
    process.exit(1);
  }
  return result.env;
};
