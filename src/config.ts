import dotenv from 'dotenv';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import type { Logger } from './logger.js';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration: environment first, explicit overrides on top
// ─────────────────────────────────────────────────────────────────────────────

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'));

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string().default(''),
  MISSION_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  MISSION_MAX_TOKENS: z.coerce.number().int().positive().default(2048),

  MISSION_HEADLESS: booleanFlag(true),
  MISSION_STEALTH: booleanFlag(false),
  MISSION_CDP_ENDPOINT: z.string().url().optional(),

  MISSION_DATA_DIR: z.string().optional(),

  MISSION_MAX_STEPS: z.coerce.number().int().positive().default(100),
  MISSION_HISTORY_WINDOW: z.coerce.number().int().positive().default(30),

  MISSION_ACTION_TIMEOUT_MS: millis(5_000),
  MISSION_FILL_TIMEOUT_MS: millis(10_000),
  MISSION_NAVIGATION_TIMEOUT_MS: millis(60_000),
  MISSION_USER_INPUT_TIMEOUT_MS: millis(300_000),
  MISSION_CAPTCHA_TIMEOUT_MS: millis(180_000),
  MISSION_STALE_INPUT_MS: millis(600_000),

  MISSION_SETTLE_MS: millis(2_000),
  MISSION_SCROLL_SETTLE_MS: millis(1_000),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AgentConfig {
  anthropicApiKey: string;
  model: string;
  maxTokens: number;

  headless: boolean;
  stealth: boolean;
  /** Attach to an already running Chromium instead of launching one */
  cdpEndpoint?: string;

  /** Holds jobs.db and screenshots/<jobId>/ */
  dataDir: string;

  maxSteps: number;
  historyWindow: number;

  actionTimeoutMs: number;
  fillTimeoutMs: number;
  navigationTimeoutMs: number;
  userInputTimeoutMs: number;
  captchaTimeoutMs: number;
  staleInputRequestMs: number;

  settleMs: number;
  scrollSettleMs: number;

  logLevel: string;
}

export function defaultDataDir(): string {
  return join(homedir(), '.mission-agent');
}

/**
 * Parse settings from an environment map. Each invalid value is reported and
 * replaced by its default; the remaining settings are used as given.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  logger?: Logger,
): AgentConfig {
  const parsed = envSchema.safeParse(env);
  let values: z.infer<typeof envSchema>;
  if (parsed.success) {
    values = parsed.data;
  } else {
    // Only the offending variables fall back; everything valid is kept
    const invalid = new Set(parsed.error.issues.map((issue) => String(issue.path[0])));
    logger?.warn({ issues: parsed.error.flatten().fieldErrors }, 'invalid environment values, using defaults for them');
    values = envSchema.parse(Object.fromEntries(Object.entries(env).filter(([key]) => !invalid.has(key))));
  }

  return {
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    model: values.MISSION_MODEL,
    maxTokens: values.MISSION_MAX_TOKENS,
    headless: values.MISSION_HEADLESS,
    stealth: values.MISSION_STEALTH,
    cdpEndpoint: values.MISSION_CDP_ENDPOINT,
    dataDir: values.MISSION_DATA_DIR ?? defaultDataDir(),
    maxSteps: values.MISSION_MAX_STEPS,
    historyWindow: values.MISSION_HISTORY_WINDOW,
    actionTimeoutMs: values.MISSION_ACTION_TIMEOUT_MS,
    fillTimeoutMs: values.MISSION_FILL_TIMEOUT_MS,
    navigationTimeoutMs: values.MISSION_NAVIGATION_TIMEOUT_MS,
    userInputTimeoutMs: values.MISSION_USER_INPUT_TIMEOUT_MS,
    captchaTimeoutMs: values.MISSION_CAPTCHA_TIMEOUT_MS,
    staleInputRequestMs: values.MISSION_STALE_INPUT_MS,
    settleMs: values.MISSION_SETTLE_MS,
    scrollSettleMs: values.MISSION_SCROLL_SETTLE_MS,
    logLevel: values.LOG_LEVEL,
  };
}

/** Load `.env` into process.env, then resolve settings with overrides applied */
export function resolveConfig(overrides: Partial<AgentConfig> = {}, logger?: Logger): AgentConfig {
  dotenv.config();
  return { ...loadConfig(process.env, logger), ...overrides };
}
