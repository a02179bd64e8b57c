import { z } from 'zod';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

const optionalString = z.string().optional();

/** Drops empty and blank variables so they fall back to their defaults. */
export function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }
  return present;
}

export function parseCorsOrigins(raw: string): string[] {
  if (raw.trim() === '*') return ['*'];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
}

const EnvSchema = z.object({
  API_PREFIX: z.string().default('/api/v1'),
  PROJECT_NAME: z.string().default('AI Tutor'),
  PORT: z.coerce.number().int().positive().default(8000),
  BACKEND_CORS_ORIGINS: z.string().default('*').transform(parseCorsOrigins),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR'])),

  FIREBASE_PROJECT_ID: optionalString,
  FIREBASE_CLIENT_EMAIL: optionalString,
  // Keys pasted into .env files usually carry literal "\n" sequences.
  FIREBASE_PRIVATE_KEY: optionalString.transform((v) => v?.replace(/\\n/g, '\n')),
  FIREBASE_STORAGE_BUCKET: optionalString,

  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
  GEMINI_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  TTS_LANGUAGE_CODE: z.string().default('en-US'),
  TTS_VOICE_NAME: z.string().default('en-US-Neural2-A'),
});

export interface Settings {
  apiPrefix: string;
  projectName: string;
  port: number;
  corsOrigins: string[];
  logLevel: LogLevel;
  firebase: {
    projectId?: string;
    clientEmail?: string;
    privateKey?: string;
    storageBucket?: string;
  };
  gemini: {
    apiKey?: string;
    model: string;
    maxTokens: number;
    temperature: number;
  };
  tts: {
    languageCode: string;
    voiceName: string;
  };
}

/**
 * Reads settings from the given environment. Empty variables count as unset.
 * Throws with one line per offending variable when a value does not parse.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const e = parsed.data;
  return {
    apiPrefix: e.API_PREFIX,
    projectName: e.PROJECT_NAME,
    port: e.PORT,
    corsOrigins: e.BACKEND_CORS_ORIGINS,
    logLevel: e.LOG_LEVEL,
    firebase: {
      projectId: e.FIREBASE_PROJECT_ID,
      clientEmail: e.FIREBASE_CLIENT_EMAIL,
      privateKey: e.FIREBASE_PRIVATE_KEY,
      storageBucket: e.FIREBASE_STORAGE_BUCKET,
    },
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      maxTokens: e.GEMINI_MAX_TOKENS,
      temperature: e.GEMINI_TEMPERATURE,
    },
    tts: {
      languageCode: e.TTS_LANGUAGE_CODE,
      voiceName: e.TTS_VOICE_NAME,
    },
  };
}

let cached: Settings | null = null;

export function getSettings(): Settings {
  if (!cached) cached = loadSettings();
  return cached;
}

export function resetSettings(): void {
  cached = null;
}
