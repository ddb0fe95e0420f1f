/**
 * Environment configuration, validated once at startup.
 */

import { z } from 'zod';
import { Errors } from './errors.js';
import { DEFAULT_KEYWORDS, normalizeKeywords } from './keyword-matcher.js';
import { DEFAULT_PERMALINK_TEMPLATE } from './link-resolver.js';
import { DEFAULT_PAGE_LIMIT } from './thread-analyzer.js';
import {
  DEFAULT_POST_DELAY_MS,
  DEFAULT_CLEANUP_DELAY_MS,
  type ReplyLayout,
  type StatusMode,
} from './reply-sequencer.js';
import { isValidTimeZone, localTimeZone } from './timestamp-formatter.js';

const envSchema = z.object({
  SLACK_BOT_TOKEN: z.string().min(1),
  SLACK_SIGNING_SECRET: z.string().min(1),
  // Socket Mode when set, HTTP receiver otherwise
  SLACK_APP_TOKEN: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  ISSUE_KEYWORDS: z
    .string()
    .optional()
    .transform((value) => (value === undefined ? [...DEFAULT_KEYWORDS] : normalizeKeywords(value.split(','))))
    .refine((keywords) => keywords.length > 0, 'must name at least one keyword'),
  THREAD_PAGE_LIMIT: z.coerce.number().int().min(1).max(DEFAULT_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
  POST_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_POST_DELAY_MS),
  STATUS_CLEANUP_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_CLEANUP_DELAY_MS),
  STATUS_MODE: z.enum(['ephemeral', 'thread']).default('ephemeral'),
  REPLY_LAYOUT: z.enum(['per-message', 'consolidated']).default('per-message'),
  TIME_ZONE: z
    .string()
    .min(1)
    .optional()
    .refine((zone) => zone === undefined || isValidTimeZone(zone), 'unknown time zone'),
  PERMALINK_FALLBACK_TEMPLATE: z
    .string()
    .refine((template) => template.includes('{message}'), 'must contain {message}')
    .default(DEFAULT_PERMALINK_TEMPLATE),
});

export interface BotConfig {
  botToken: string;
  signingSecret: string;
  appToken?: string;
  port: number;
  keywords: string[];
  pageLimit: number;
  postDelayMs: number;
  cleanupDelayMs: number;
  statusMode: StatusMode;
  layout: ReplyLayout;
  timeZone: string;
  permalinkTemplate: string;
}

/**
 * Read and validate configuration. Throws INVALID_CONFIG naming every
 * offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  // `KEY=` in .env means unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw Errors.invalidConfig(problems.join('; '));
  }

  const vars = parsed.data;
  return {
    botToken: vars.SLACK_BOT_TOKEN,
    signingSecret: vars.SLACK_SIGNING_SECRET,
    appToken: vars.SLACK_APP_TOKEN,
    port: vars.PORT,
    keywords: vars.ISSUE_KEYWORDS,
    pageLimit: vars.THREAD_PAGE_LIMIT,
    postDelayMs: vars.POST_DELAY_MS,
    cleanupDelayMs: vars.STATUS_CLEANUP_DELAY_MS,
    statusMode: vars.STATUS_MODE,
    layout: vars.REPLY_LAYOUT,
    timeZone: vars.TIME_ZONE ?? localTimeZone(),
    permalinkTemplate: vars.PERMALINK_FALLBACK_TEMPLATE,
  };
}
