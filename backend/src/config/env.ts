import { ConfigurationError, MissingCredentialError } from '../types/errors';

export type TranslationProvider = 'gemini' | 'groq';

export interface AppConfig {
  groqApiKey: string;
  translationProvider: TranslationProvider;
  googleApiKey: string | null;
  geminiModel: string;
  groqChatModel: string;
  port: number;
  debug: boolean;
  sessionTtlMs: number;
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_GROQ_CHAT_MODEL = 'llama-3.3-70b-versatile';
export const DEFAULT_SESSION_TTL_MINUTES = 120;

type Env = Record<string, string | undefined>;

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readTranslationProvider(env: Env): TranslationProvider {
  const raw = env.TRANSLATION_PROVIDER?.trim().toLowerCase();
  if (!raw || raw === 'gemini') return 'gemini';
  if (raw === 'groq') return 'groq';
  throw new ConfigurationError(`TRANSLATION_PROVIDER must be "gemini" or "groq", got "${raw}"`);
}

/**
 * Reads the application configuration from the process environment.
 * Throws MissingCredentialError when a required API key is absent.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const groqApiKey = env.GROQ_API_KEY?.trim();
  if (!groqApiKey) {
    throw new MissingCredentialError('GROQ_API_KEY');
  }

  const translationProvider = readTranslationProvider(env);
  const googleApiKey = env.GOOGLE_API_KEY?.trim() || null;
  if (translationProvider === 'gemini' && !googleApiKey) {
    throw new MissingCredentialError('GOOGLE_API_KEY');
  }

  const debugFlag = env.DEBUG?.trim().toLowerCase();

  return {
    groqApiKey,
    translationProvider,
    googleApiKey,
    geminiModel: env.GEMINI_MODEL?.trim() || DEFAULT_GEMINI_MODEL,
    groqChatModel: env.GROQ_CHAT_MODEL?.trim() || DEFAULT_GROQ_CHAT_MODEL,
    port: readPositiveInteger(env, 'PORT', DEFAULT_PORT),
    debug: debugFlag === 'true' || debugFlag === '1',
    sessionTtlMs: readPositiveInteger(env, 'SESSION_TTL_MINUTES', DEFAULT_SESSION_TTL_MINUTES) * 60 * 1000,
  };
}
