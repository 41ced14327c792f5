import { z } from 'zod';

export const DEFAULT_SOURCE_URL =
  'https://raw.githubusercontent.com/shihabalter/BDIX-TESTER/refs/heads/main/bdix.txt';

const httpUrlSchema = z
  .string()
  .url()
  .refine((val) => {
    try {
      const url = new URL(val);
      return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
      return false;
    }
  }, 'url protocol must be http or https');

export const DEFAULT_TIMEOUT_SEC = 5;

// One hour; also keeps the delay far below what timers accept.
export const MAX_TIMEOUT_SEC = 3600;

const secondsSchema = z.coerce.number().positive().finite().max(MAX_TIMEOUT_SEC);

export const envSchema = z.object({
  PEERPROBE_SOURCE_URL: httpUrlSchema.default(DEFAULT_SOURCE_URL),
  PEERPROBE_DATA_DIR: z.string().min(1).optional(),
  PEERPROBE_TIMEOUT_SEC: secondsSchema.default(DEFAULT_TIMEOUT_SEC),
  PEERPROBE_CONCURRENCY: z.coerce.number().int().min(1).max(256).default(10),
  PEERPROBE_SOURCE_TIMEOUT_SEC: secondsSchema.default(10),
  // https://no-color.org: any non-empty value disables colors.
  NO_COLOR: z.string().optional(),
});

export type ParsedEnv = z.infer<typeof envSchema>;

// Accepts plain decimal input such as "5", "2.5" or ".75".
const DECIMAL_RE = /^(?:\d+(?:\.\d*)?|\.\d+)$/;

export const timeoutInputSchema = z
  .string()
  .trim()
  .regex(DECIMAL_RE, 'timeout must be a number of seconds')
  .transform(Number)
  .pipe(z.number().positive().max(MAX_TIMEOUT_SEC));
