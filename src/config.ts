/**
 * Environment Configuration
 * Loads .env and turns raw variables into typed settings for each entry point
 */

import path from 'path';
import * as dotenv from 'dotenv';
import { ConfigurationError } from './errors';
import { DEFAULT_CONFIG, ListenerConfig } from './listener/types';

export type Env = Record<string, string | undefined>;

export type TwilioConfig = {
  accountSid: string;
  credentials:
    | { kind: 'apiKey'; apiKey: string; apiSecret: string }
    | { kind: 'authToken'; authToken: string };
  sender:
    | { kind: 'messagingService'; messagingServiceSid: string }
    | { kind: 'from'; from: string };
};

export type ServerConfig = {
  port: number;
  host: string;
  // Unset means the API refuses every request
  apiToken?: string;
};

const TRUE_VALUES = ['1', 'true', 'True'];

/**
 * Load the first .env found in the working directory or the package root
 */
export function loadEnvFile(): string | null {
  const envPaths = [
    path.join(process.cwd(), '.env'),
    path.join(__dirname, '..', '.env'),
    path.join(__dirname, '..', '..', '.env'),
  ];

  for (const envPath of envPaths) {
    const result = dotenv.config({ path: envPath });
    if (!result.error) {
      console.log('[Config] Loaded .env from:', envPath);
      return envPath;
    }
  }
  return null;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (!value) {
    throw new ConfigurationError(name, 'is required. Set it in your .env.');
  }
  return value;
}

function numeric(env: Env, name: string, fallback: number, check: (n: number) => boolean, expected: string): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigurationError(name, `must be ${expected} (got "${raw}")`);
  }
  return value;
}

export function parseKeywords(raw: string): string[] {
  return raw
    .split(',')
    .map((k) => k.trim())
    .filter((k) => k.length > 0);
}

export function loadListenerConfig(env: Env = process.env): ListenerConfig {
  const keywordsRaw = env.KEYWORDS ?? DEFAULT_CONFIG.keywords.join(',');
  const keywords = parseKeywords(keywordsRaw);
  if (keywords.length === 0) {
    throw new ConfigurationError('KEYWORDS', 'must list at least one phrase');
  }

  const printRaw = optional(env, 'PRINT_TRANSCRIPTS');

  return {
    keywords,
    bufferSeconds: numeric(env, 'BUFFER_SECONDS', DEFAULT_CONFIG.bufferSeconds, (n) => n > 0, 'a positive number'),
    sampleRateHertz: numeric(
      env,
      'MIC_SAMPLE_RATE',
      DEFAULT_CONFIG.sampleRateHertz,
      (n) => Number.isInteger(n) && n > 0,
      'a positive integer'
    ),
    cooldownSeconds: numeric(
      env,
      'DETECTION_COOLDOWN_SECONDS',
      DEFAULT_CONFIG.cooldownSeconds,
      (n) => n >= 0,
      'zero or more'
    ),
    silenceThreshold: numeric(env, 'SILENCE_THRESHOLD', DEFAULT_CONFIG.silenceThreshold, (n) => n >= 0, 'zero or more'),
    smsApiBase: optional(env, 'SMS_API_BASE') ?? DEFAULT_CONFIG.smsApiBase,
    apiToken: required(env, 'API_TOKEN'),
    toNumber: required(env, 'TO_NUMBER'),
    message: optional(env, 'MESSAGE'),
    languageCode: optional(env, 'STT_LANGUAGE') ?? DEFAULT_CONFIG.languageCode,
    googleApiKey: optional(env, 'GOOGLE_API_KEY'),
    printTranscripts: printRaw === undefined ? DEFAULT_CONFIG.printTranscripts : TRUE_VALUES.includes(printRaw),
    requestTimeoutSeconds: numeric(
      env,
      'REQUEST_TIMEOUT_SECONDS',
      DEFAULT_CONFIG.requestTimeoutSeconds,
      (n) => n > 0,
      'a positive number'
    ),
    device: optional(env, 'MIC_DEVICE'),
  };
}

export function loadTwilioConfig(env: Env = process.env): TwilioConfig {
  const accountSid = required(env, 'TWILIO_ACCOUNT_SID');

  const apiKey = optional(env, 'TWILIO_API_KEY');
  const apiSecret = optional(env, 'TWILIO_API_SECRET');
  const authToken = optional(env, 'TWILIO_AUTH_TOKEN');

  let credentials: TwilioConfig['credentials'];
  if (apiKey && apiSecret) {
    credentials = { kind: 'apiKey', apiKey, apiSecret };
  } else if (authToken) {
    credentials = { kind: 'authToken', authToken };
  } else {
    throw new ConfigurationError('TWILIO_AUTH_TOKEN', 'or TWILIO_API_KEY/TWILIO_API_SECRET is required');
  }

  const messagingServiceSid = optional(env, 'TWILIO_MESSAGING_SERVICE_SID');
  const from = optional(env, 'TWILIO_FROM_NUMBER');

  let sender: TwilioConfig['sender'];
  if (messagingServiceSid) {
    sender = { kind: 'messagingService', messagingServiceSid };
  } else if (from) {
    sender = { kind: 'from', from };
  } else {
    throw new ConfigurationError('TWILIO_MESSAGING_SERVICE_SID', 'or TWILIO_FROM_NUMBER must be configured');
  }

  return { accountSid, credentials, sender };
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: numeric(env, 'PORT', 8000, (n) => Number.isInteger(n) && n >= 0 && n < 65536, 'a valid port'),
    host: optional(env, 'HOST') ?? '0.0.0.0',
    apiToken: optional(env, 'API_TOKEN'),
  };
}
