/**
 * Centralized configuration for the signal desk.
 * All env vars and constants in one place; `loadConfig` takes an env map so tests can build their own.
 */

import path from 'path';

type Env = Record<string, string | undefined>;

function envStr(env: Env, key: string, fallback = ''): string {
  return (env[key] ?? fallback).trim();
}

function envNum(env: Env, key: string, fallback: number): number {
  const v = env[key];
  if (v === undefined || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function envBool(env: Env, key: string, fallback = false): boolean {
  const v = env[key]?.trim().toLowerCase();
  if (v === undefined || v === '') return fallback;
  return v === '1' || v === 'true' || v === 'yes';
}

function envList(env: Env, key: string): string[] {
  return envStr(env, key)
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export type LinkFallback = 'default' | 'reject';

export interface DeskConfig {
  nodeEnv: string;
  isProd: boolean;

  telegram: {
    botToken: string;
    /** Broadcast destination: @channel or numeric chat id */
    channelId: string;
  };

  access: {
    /** Empty list = everyone may operate the bot */
    adminIds: number[];
    /** Allow help/list/links/stats for users outside the allow-list */
    publicReadCommands: boolean;
  };

  links: {
    tradeUrlBase: string;
    fallback: LinkFallback;
    defaultLinksPath: string;
  };

  confirmation: {
    /** Lower-case names; empty = plain phrase confirmation */
    senders: string[];
    phrase: string;
    defaultSender: string;
  };

  storage: {
    dataPath: string;
  };

  /** IANA zone for timestamps and year/month partitions */
  timeZone: string;

  tracker: {
    enabled: boolean;
    port: number;
    baseUrl: string;
  };

  sheets: {
    webhookUrl: string;
    get enabled(): boolean;
  };

  template: {
    challengeUrl: string;
    leaderboardUrl: string;
  };
}

export function loadConfig(env: Env = process.env): DeskConfig {
  const cwd = process.cwd();
  const fallbackRaw = envStr(env, 'LINK_FALLBACK', 'default').toLowerCase();

  return {
    nodeEnv: envStr(env, 'NODE_ENV', 'development'),
    isProd: envStr(env, 'NODE_ENV') === 'production',

    telegram: {
      botToken: envStr(env, 'TELEGRAM_BOT_TOKEN'),
      channelId: envStr(env, 'CHANNEL_ID')
    },

    access: {
      adminIds: envList(env, 'ADMIN_IDS')
        .map((s) => Number(s))
        .filter((n) => Number.isInteger(n)),
      publicReadCommands: envBool(env, 'PUBLIC_READ_COMMANDS', false)
    },

    links: {
      tradeUrlBase: envStr(env, 'TRADE_URL_BASE', 'https://example.com/trade/'),
      fallback: fallbackRaw === 'reject' ? 'reject' : 'default',
      defaultLinksPath: envStr(env, 'DEFAULT_LINKS_PATH') || path.join(cwd, 'data', 'tickerLinks.json')
    },

    confirmation: {
      senders: envList(env, 'SENDERS').map((s) => s.toLowerCase()),
      phrase: envStr(env, 'CONFIRM_PHRASE', 'confirm').toLowerCase(),
      defaultSender: envStr(env, 'DEFAULT_SENDER', 'team').toLowerCase()
    },

    storage: {
      dataPath: envStr(env, 'DATA_PATH') || path.join(cwd, 'data', 'store.json')
    },

    timeZone: envStr(env, 'TIMEZONE', 'Asia/Kolkata'),

    tracker: {
      enabled: envBool(env, 'TRACKER_ENABLED', false),
      port: Math.max(1, Math.min(65535, envNum(env, 'TRACKER_PORT', 8080))),
      baseUrl: envStr(env, 'TRACKER_BASE_URL', 'http://localhost:8080').replace(/\/$/, '')
    },

    sheets: {
      webhookUrl: envStr(env, 'SHEETS_WEBHOOK_URL'),
      get enabled(): boolean {
        return Boolean(this.webhookUrl);
      }
    },

    template: {
      challengeUrl: envStr(env, 'CHALLENGE_URL'),
      leaderboardUrl: envStr(env, 'LEADERBOARD_URL')
    }
  };
}
