// Job configuration: environment variable parsing and validation
import { type Result, err, ok } from 'neverthrow';
import { z } from 'zod';
import { type LakeId, createLakeId } from '../core/branded-types.js';
import { ErrorCode, type ScraperError, createError } from '../core/errors.js';

const isKnownTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),

  sourceUrl: z.url(),
  sourceTimeZone: z.string().refine(isKnownTimeZone, 'Unknown IANA time zone'),
  timestampPrefix: z.string(),

  backendUrl: z.url(),
  backendPath: z.string().min(1),

  // Required at run time, checked by the pipeline before any network access
  lakeId: z.string().optional(),
  apiKey: z.string().optional(),

  telegramToken: z.string().optional(),
  telegramChatIds: z.array(z.string().min(1)),
  telegramApiUrl: z.url(),

  fetchTimeoutMs: z.number().int().positive(),
});

export type Config = z.infer<typeof configSchema>;

export interface RequiredConfig {
  lakeId: LakeId;
  apiKey: string;
}

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

export const parseChatIds = (raw: string): string[] =>
  raw
    .split(',')
    .map((chatId) => chatId.trim())
    .filter((chatId) => chatId.length > 0);

export function parseConfig(env: NodeJS.ProcessEnv = process.env): Result<Config, ScraperError> {
  const rawConfig = {
    logLevel: env.LOG_LEVEL || 'debug',

    sourceUrl: env.SOURCE_URL || 'https://www.aare-bern.ch/wasserdaten-temperatur/',
    sourceTimeZone: env.SOURCE_TIMEZONE || 'Europe/Berlin',
    timestampPrefix: env.TIMESTAMP_PREFIX || 'Last update: ',

    // cluster internal communication
    backendUrl: env.BACKEND_URL || 'http://api:80',
    backendPath: env.BACKEND_PATH || 'lake/{}/temperature',

    lakeId: emptyToUndefined(env.AARE_UUID),
    apiKey: emptyToUndefined(env.API_KEY),

    telegramToken: emptyToUndefined(env.TOKEN),
    telegramChatIds: parseChatIds(env.TELEGRAM_CHATLIST || '139656428'),
    telegramApiUrl: env.TELEGRAM_API_URL || 'https://api.telegram.org',

    fetchTimeoutMs: Number.parseInt(env.FETCH_TIMEOUT_MS || '30000', 10),
  };

  const configValidation = configSchema.safeParse(rawConfig);

  if (!configValidation.success) {
    return err(
      createError(ErrorCode.ConfigError, 'Invalid configuration', {
        issues: configValidation.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`
        ),
      })
    );
  }

  return ok(configValidation.data);
}

export function checkRequiredConfig(config: Config): Result<RequiredConfig, ScraperError> {
  if (!config.lakeId) {
    return err(createError(ErrorCode.ConfigError, 'AARE_UUID not defined'));
  }
  if (!config.apiKey) {
    return err(createError(ErrorCode.ConfigError, 'API_KEY not defined'));
  }

  return ok({ lakeId: createLakeId(config.lakeId), apiKey: config.apiKey });
}
