import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../errors.js';

dotenv.config();

export const LOGALTY_PRODUCTION_URL = 'https://api.logalty.com';
export const LOGALTY_SANDBOX_URL = 'https://api-sandbox.logalty.com';

type Env = Record<string, string | undefined>;

// Helper to read a string env var, treating empty string as undefined
function env(source: Env, name: string): string | undefined {
  const val = source[name];
  return val !== undefined && val !== '' ? val : undefined;
}

function envInt(source: Env, name: string): number | undefined {
  const val = env(source, name);
  if (val === undefined) return undefined;
  const parsed = parseInt(val, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function envBool(source: Env, name: string): boolean | undefined {
  const val = env(source, name);
  if (val === undefined) return undefined;
  return val === 'true' || val === '1';
}

// ─── Schema ──────────────────────────────────────────────────────

export const signatureTypes = ['SIMPLE', 'ADVANCED', 'QUALIFIED'] as const;

const logaltySchema = z.object({
  clientId: z.string({ required_error: 'Logalty client ID is required' }).min(1, 'Logalty client ID is required'),
  clientSecret: z.string({ required_error: 'Logalty client secret is required' }).min(1, 'Logalty client secret is required'),

  // Endpoint
  baseUrl: z.string().url().optional(),
  apiVersion: z.string().min(1).default('v1'),
  sandboxMode: z.boolean().default(false),
  readTimeoutMs: z.number().int().positive().default(60000),

  // Fault tolerance
  maxRetries: z.number().int().min(0).max(10).default(3),
  retryWaitMs: z.number().int().min(0).default(2000),
  tokenExpiration: z.number().int().min(300).max(86400).default(3600),

  // Request defaults
  defaultEmailSubject: z.string().min(1).default('Firma requerida / Signature required'),
  defaultEmailMessage: z
    .string()
    .min(1)
    .default('Por favor, revise y firme el documento adjunto / Please review and sign the attached document.'),
  defaultSignatureType: z.enum(signatureTypes).default('ADVANCED'),
  enableBiometricSignature: z.boolean().default(false),
  enableSmsVerification: z.boolean().default(false),
  enableVideoIdentification: z.boolean().default(false),
});

const configSchema = z.object({
  // Server
  port: z.number().int().positive().default(3000),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  apiKey: z.string().min(1),

  // Provider selection
  esignatureProvider: z.string().min(1).default('logalty'),

  // Rate Limiting
  rateLimitWindowMs: z.number().int().positive().default(60000),
  rateLimitMaxRequests: z.number().int().positive().default(100),

  logalty: logaltySchema,
});

type ParsedConfig = z.infer<typeof configSchema>;
type ParsedLogaltySettings = z.infer<typeof logaltySchema>;

/** Logalty settings with the endpoint resolved from `sandboxMode`. */
export type LogaltySettings = Omit<ParsedLogaltySettings, 'baseUrl'> & { baseUrl: string };

export type Config = Omit<ParsedConfig, 'logalty'> & { logalty: LogaltySettings };

// ─── Loader ──────────────────────────────────────────────────────

export function readRawConfig(source: Env = process.env): unknown {
  return {
    // Server
    port: envInt(source, 'PORT'),
    nodeEnv: env(source, 'NODE_ENV'),
    apiKey: env(source, 'API_KEY'),

    // Provider selection
    esignatureProvider: env(source, 'ESIGNATURE_PROVIDER'),

    // Rate Limiting
    rateLimitWindowMs: envInt(source, 'RATE_LIMIT_WINDOW_MS'),
    rateLimitMaxRequests: envInt(source, 'RATE_LIMIT_MAX_REQUESTS'),

    logalty: {
      clientId: env(source, 'LOGALTY_CLIENT_ID'),
      clientSecret: env(source, 'LOGALTY_CLIENT_SECRET'),
      baseUrl: env(source, 'LOGALTY_BASE_URL'),
      apiVersion: env(source, 'LOGALTY_API_VERSION'),
      sandboxMode: envBool(source, 'LOGALTY_SANDBOX_MODE'),
      readTimeoutMs: envInt(source, 'LOGALTY_READ_TIMEOUT_MS'),
      maxRetries: envInt(source, 'LOGALTY_MAX_RETRIES'),
      retryWaitMs: envInt(source, 'LOGALTY_RETRY_WAIT_MS'),
      tokenExpiration: envInt(source, 'LOGALTY_TOKEN_EXPIRATION'),
      defaultEmailSubject: env(source, 'LOGALTY_DEFAULT_EMAIL_SUBJECT'),
      defaultEmailMessage: env(source, 'LOGALTY_DEFAULT_EMAIL_MESSAGE'),
      defaultSignatureType: env(source, 'LOGALTY_DEFAULT_SIGNATURE_TYPE')?.toUpperCase(),
      enableBiometricSignature: envBool(source, 'LOGALTY_ENABLE_BIOMETRIC_SIGNATURE'),
      enableSmsVerification: envBool(source, 'LOGALTY_ENABLE_SMS_VERIFICATION'),
      enableVideoIdentification: envBool(source, 'LOGALTY_ENABLE_VIDEO_IDENTIFICATION'),
    },
  };
}

export function loadConfig(source: Env = process.env): Config {
  return validateConfig(readRawConfig(source));
}

// ─── Validator ───────────────────────────────────────────────────

/**
 * Validate a raw configuration object. Throws a ConfigurationError listing
 * every offending field.
 */
export function validateConfig(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const { logalty, ...rest } = result.data;

  return {
    ...rest,
    logalty: {
      ...logalty,
      baseUrl: (logalty.baseUrl ?? (logalty.sandboxMode ? LOGALTY_SANDBOX_URL : LOGALTY_PRODUCTION_URL)).replace(/\/$/, ''),
    },
  };
}

// ─── Startup ─────────────────────────────────────────────────────

/**
 * Load the config at startup, aborting the process when it is invalid.
 */
export function initConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;

    console.error('╔══════════════════════════════════════════════════╗');
    console.error('║  Gateway Configuration Error - Startup Aborted   ║');
    console.error('╚══════════════════════════════════════════════════╝');
    console.error('');
    console.error('Missing or invalid environment variables:');
    console.error(error.issues.map((issue) => `  - ${issue}`).join('\n'));
    console.error('');
    console.error('See .env.example for a complete reference.');
    process.exit(1);
  }
}
