import {existsSync, readFileSync} from 'node:fs';
import {join} from 'node:path';
import {z} from 'genkit';
import {MissingCredentialError} from '@/lib/errors';

/**
 * @fileOverview Runtime configuration for the model connection.
 *
 * The API key is looked up in the deployment secret store first (one file per
 * secret, Docker/Kubernetes style) and then in the environment. Everything
 * else comes from the environment, validated by `EnvSchema`.
 */

const EnvSchema = z.object({
  GEMINI_MODEL: z.string().trim().min(1).default('googleai/gemini-2.5-flash'),
  MODEL_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SECRETS_DIR: z.string().trim().min(1).default('/run/secrets'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export type AppConfig = {
  apiKey: string;
  modelName: string;
  maxAttempts: number;
  timeoutMs: number;
  logLevel: LogLevel;
};

export const API_KEY_SECRET = 'GOOGLE_API_KEY';
const API_KEY_ENV_NAMES = ['GOOGLE_API_KEY', 'GEMINI_API_KEY'] as const;

type Env = Record<string, string | undefined>;

function readSecret(secretsDir: string, name: string): string {
  const file = join(secretsDir, name);
  if (!existsSync(file)) return '';
  return readFileSync(file, 'utf8').trim();
}

export function resolveApiKey(env: Env, secretsDir: string): string {
  const fromSecret = readSecret(secretsDir, API_KEY_SECRET);
  if (fromSecret) return fromSecret;

  for (const name of API_KEY_ENV_NAMES) {
    const value = String(env[name] ?? '').trim();
    if (value) return value;
  }

  throw new MissingCredentialError([join(secretsDir, API_KEY_SECRET), ...API_KEY_ENV_NAMES]);
}

// Blank variables count as unset so that `FOO=` in a .env file keeps the default.
function withoutBlanks(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''));
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.parse(withoutBlanks(env));
  return {
    apiKey: resolveApiKey(env, parsed.SECRETS_DIR),
    modelName: parsed.GEMINI_MODEL,
    maxAttempts: parsed.MODEL_MAX_ATTEMPTS,
    timeoutMs: parsed.MODEL_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
  };
}
