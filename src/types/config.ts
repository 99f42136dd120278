/**
 * Application configuration types
 */

import { ConfigurationError } from '../errors';

export type SepehrAuthConfig =
  | {
      scheme: 'oauth1';
      consumerKey: string;
      consumerSecret: string;
      accessToken: string;
      tokenSecret: string;
    }
  | {
      scheme: 'header';
      authorization: string;
    };

export interface AppConfig {
  sepehr: {
    apiBase: string;
    channelId: number;
    days: number;
    auth: SepehrAuthConfig;
  };
  radioQuran: {
    htmlUrl: string;
    jsonUrl: string;
    retries: number;
    retryDelayMs: number;
  };
  http: {
    timeout: number;
    userAgent: string;
  };
  output: {
    filename: string;
  };
  xmltv: {
    generatorName: string;
    /** Written as generator-info-url when set */
    generatorUrl?: string;
    lang: string;
  };
  timezone: string;
}

const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const OAUTH_VARIABLES = [
  'SEPEHR_CONSUMER_KEY',
  'SEPEHR_CONSUMER_SECRET',
  'SEPEHR_ACCESS_TOKEN',
  'SEPEHR_TOKEN_SECRET',
] as const;

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timezone = env.EPG_TIMEZONE || 'Asia/Tehran';
  assertTimeZone(timezone);

  return {
    sepehr: {
      apiBase: env.SEPEHR_API_BASE || 'https://sepehrapi.sepehrtv.ir/v3/epg/tvprogram',
      channelId: 46,
      days: parseInteger(env, 'DAYS', 7, 1, 14),
      auth: getSepehrAuth(env),
    },
    radioQuran: {
      htmlUrl: 'https://radioquran.ir/ChannelConductor/',
      jsonUrl: 'https://radioquran.ir/jsonfeeders/epg/',
      retries: parseInteger(env, 'RADIO_QURAN_RETRIES', 2, 0, 10),
      retryDelayMs: 2000,
    },
    http: {
      timeout: parseInteger(env, 'HTTP_TIMEOUT_MS', 30000, 1000, 300000),
      userAgent: USER_AGENT,
    },
    output: {
      filename: env.OUTPUT_FILE || 'epg.xml',
    },
    xmltv: {
      generatorName: 'quran-epg',
      generatorUrl: env.GENERATOR_URL?.trim() || undefined,
      lang: 'fa',
    },
    timezone,
  };
}

/**
 * Exactly one credential scheme must be configured:
 * all four OAuth1 values, or a single pre-built header.
 */
function getSepehrAuth(env: NodeJS.ProcessEnv): SepehrAuthConfig {
  const header = env.SEPEHR_AUTHORIZATION?.trim() ?? '';
  const present = OAUTH_VARIABLES.filter((name) => (env[name]?.trim() ?? '') !== '');

  if (header) {
    if (present.length > 0) {
      throw new ConfigurationError(
        `SEPEHR_AUTHORIZATION cannot be combined with ${present.join(', ')}; configure one scheme`
      );
    }
    if (/[\r\n]/.test(header)) {
      throw new ConfigurationError('SEPEHR_AUTHORIZATION must be a single line');
    }
    return { scheme: 'header', authorization: header };
  }

  if (present.length < OAUTH_VARIABLES.length) {
    const missing = OAUTH_VARIABLES.filter((name) => !present.includes(name));
    throw new ConfigurationError(
      `Sepehr credentials missing: set SEPEHR_AUTHORIZATION or ${missing.join(', ')}`
    );
  }

  return {
    scheme: 'oauth1',
    consumerKey: readTrimmed(env, 'SEPEHR_CONSUMER_KEY'),
    consumerSecret: readTrimmed(env, 'SEPEHR_CONSUMER_SECRET'),
    accessToken: readTrimmed(env, 'SEPEHR_ACCESS_TOKEN'),
    tokenSecret: readTrimmed(env, 'SEPEHR_TOKEN_SECRET'),
  };
}

function readTrimmed(env: NodeJS.ProcessEnv, name: string): string {
  return env[name]?.trim() ?? '';
}

function parseInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function assertTimeZone(timezone: string): void {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
  } catch {
    throw new ConfigurationError(`EPG_TIMEZONE is not a known time zone: "${timezone}"`);
  }
}
