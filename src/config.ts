import { z } from 'zod';
import { IANAZone } from 'luxon';
import { ConfigError } from './errors.js';
import { parseTimeOfDay } from './scheduler/triggers.js';

const optionalString = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : value))
  .optional();

const envSchema = z.object({
  SLACK_BOT_TOKEN: z.string({ required_error: 'SLACK_BOT_TOKEN is required' }).trim().min(1, 'SLACK_BOT_TOKEN is required'),
  SLACK_SIGNING_SECRET: z.string({ required_error: 'SLACK_SIGNING_SECRET is required' }).trim().min(1, 'SLACK_SIGNING_SECRET is required'),
  DESTINATION_CHANNEL: z.string({ required_error: 'DESTINATION_CHANNEL is required' }).trim().min(1, 'DESTINATION_CHANNEL is required'),
  POST_TIME: z
    .string()
    .trim()
    .default('09:00')
    .refine(value => parseTimeOfDay(value) !== null, 'POST_TIME must be HH:MM (00:00–23:59)'),
  TIMEZONE: z
    .string()
    .trim()
    .default('Asia/Kolkata')
    .refine(value => IANAZone.isValidZone(value), 'TIMEZONE must be a valid IANA timezone'),
  AD_TEXT: optionalString,
  AD_LINK: optionalString,
  POST_NOW_REVIEW: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(value => value === 'true' || value === '1'),
  POLL_INTERVAL_MS: z.coerce.number().int().min(1_000).max(60_000).default(30_000),
  PORT: z.coerce.number().int().positive().default(3000),
  QUOTE_API_URL: z.string().url().default('https://zenquotes.io/api/random'),
  IMAGE_API_URL: z.string().url().default('https://image.pollinations.ai/prompt'),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
});

export interface AppConfig {
  slack: {
    botToken: string;
    signingSecret: string;
  };
  destination: string;
  defaultSchedule: {
    time: string;
    timezone: string;
  };
  ad: { text: string; link: string } | null;
  postNowReview: boolean;
  pollIntervalMs: number;
  port: number;
  quoteApiUrl: string;
  imageApiUrl: string;
  openai: { apiKey: string; model: string } | null;
}

/**
 * Reads and validates the process configuration. Throws ConfigError listing
 * every problem.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => issue.message));
  }

  const values = parsed.data;

  return {
    slack: {
      botToken: values.SLACK_BOT_TOKEN,
      signingSecret: values.SLACK_SIGNING_SECRET,
    },
    destination: values.DESTINATION_CHANNEL,
    defaultSchedule: {
      time: values.POST_TIME,
      timezone: values.TIMEZONE,
    },
    ad: values.AD_TEXT && values.AD_LINK ? { text: values.AD_TEXT, link: values.AD_LINK } : null,
    postNowReview: values.POST_NOW_REVIEW,
    pollIntervalMs: values.POLL_INTERVAL_MS,
    port: values.PORT,
    quoteApiUrl: values.QUOTE_API_URL,
    imageApiUrl: values.IMAGE_API_URL,
    openai: values.OPENAI_API_KEY ? { apiKey: values.OPENAI_API_KEY, model: values.OPENAI_MODEL } : null,
  };
}
