import dotenv from 'dotenv';
import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const configSchema = z.object({
  REPORT_URL: z.string().url().default('https://dailycrime.princegeorgescountymd.gov/'),
  DATA_DIR: z.string().min(1).default('data'),
  LOG_FILE: z.string().min(1).default('logs/crime_parser.log'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DAILY_RUN_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'DAILY_RUN_TIME must be HH:MM')
    .default('06:00'),
  TIMEZONE: z.string().min(1).default('America/New_York'),
  MAX_RETRIES: positiveInt(3),
  RETRY_DELAY_SECONDS: z.coerce.number().int().nonnegative().default(60),
  REQUEST_TIMEOUT_SECONDS: positiveInt(30),
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36'
    ),
});

export type AppConfig = z.infer<typeof configSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

let cached: AppConfig | null = null;

/** Reads .env once, then validates process.env. */
export function getConfig(): AppConfig {
  if (!cached) {
    dotenv.config();
    cached = loadConfig(process.env);
  }
  return cached;
}

export function dailyRunCron(config: Pick<AppConfig, 'DAILY_RUN_TIME'>): string {
  const [hour, minute] = config.DAILY_RUN_TIME.split(':').map(Number);
  return `${minute} ${hour} * * *`;
}
