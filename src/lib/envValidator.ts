/**
 * Startup environment validation — fail fast on missing required vars.
 */

import { logger } from './logger';
import { isValidTimeZone } from './time';

type Env = Record<string, string | undefined>;

interface EnvRule {
  key: string;
  required: boolean;
  /** Only required in production */
  prodOnly?: boolean;
  description: string;
}

const ENV_RULES: EnvRule[] = [
  { key: 'TELEGRAM_BOT_TOKEN', required: true, description: 'Bot credential from @BotFather' },
  { key: 'CHANNEL_ID', required: true, description: 'Broadcast channel (@name or numeric id) signals are posted to' },
  { key: 'ADMIN_IDS', required: true, prodOnly: true, description: 'Comma-separated Telegram user ids allowed to operate the bot' },
  { key: 'DATA_PATH', required: false, description: 'Store file (default ./data/store.json)' }
];

export interface EnvReport {
  errors: string[];
  warnings: string[];
}

/**
 * Checks env vars against the rules. Missing prod-only vars are warnings outside production.
 * Callers decide whether errors are fatal.
 */
export function validateEnvironment(env: Env = process.env): EnvReport {
  const isProd = env.NODE_ENV === 'production';
  const warnings: string[] = [];
  const errors: string[] = [];

  for (const rule of ENV_RULES) {
    const missing = !env[rule.key]?.trim();
    if (!missing || !rule.required) continue;
    if (rule.prodOnly && !isProd) {
      warnings.push(`${rule.key} not set (${rule.description}). Required in production.`);
    } else {
      errors.push(`${rule.key} is required (${rule.description})`);
    }
  }

  const timeZone = env.TIMEZONE?.trim();
  if (timeZone && !isValidTimeZone(timeZone)) {
    errors.push(`TIMEZONE "${timeZone}" is not an IANA time zone`);
  }

  const tracker = env.TRACKER_ENABLED?.trim().toLowerCase();
  if ((tracker === '1' || tracker === 'true' || tracker === 'yes') && !env.TRACKER_BASE_URL?.trim()) {
    warnings.push('TRACKER_ENABLED is set without TRACKER_BASE_URL: buttons will point at http://localhost:8080.');
  }

  for (const w of warnings) {
    logger.warn('EnvValidator', w);
  }
  for (const e of errors) {
    logger.error('EnvValidator', e);
  }

  return { errors, warnings };
}
