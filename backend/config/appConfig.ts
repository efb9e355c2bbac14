/**
 * Application configuration read from the environment
 */

import type { ModelType } from '../types/index.js';
import { getModelProvider, isModelSupported } from './aiModels.js';
import { isSupportedLanguage, type SupportedLanguage } from './languages.js';
import { DEFAULT_QUESTIONS_COLLECTION } from '../services/firestoreService.js';
import { ConfigurationError } from '../utils/errors.js';

export type QuestionStoreKind = 'firestore' | 'memory';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  geminiApiKey?: string;
  openaiApiKey?: string;
  models: {
    extraction: ModelType;
    translation: ModelType;
    tutor: ModelType;
  };
  defaultTargetLanguage: SupportedLanguage;
  questionStore: QuestionStoreKind;
  firebase: {
    serviceAccountPath?: string;
    storageBucket?: string;
    questionsCollection: string;
  };
  corsOrigins: string[];
  rateLimitMax: number;
}

type Env = Record<string, string | undefined>;

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000'];

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readModel(env: Env, key: string, fallback: ModelType): ModelType {
  const raw = readString(env, key) ?? fallback;
  if (!isModelSupported(raw)) {
    throw new ConfigurationError(`${key} names an unsupported model: ${raw}`);
  }
  return raw;
}

function readQuestionStore(env: Env): QuestionStoreKind {
  const raw = readString(env, 'QUESTION_STORE') ?? 'firestore';
  if (raw !== 'firestore' && raw !== 'memory') {
    throw new ConfigurationError(`QUESTION_STORE must be "firestore" or "memory", got "${raw}"`);
  }
  return raw;
}

/**
 * Build the typed configuration and check that every configured model has credentials.
 * @throws ConfigurationError on a missing or invalid setting
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const models = {
    extraction: readModel(env, 'EXTRACTION_MODEL', 'gemini-2.0-flash'),
    translation: readModel(env, 'TRANSLATION_MODEL', 'openai-gpt-4o'),
    tutor: readModel(env, 'TUTOR_MODEL', 'gemini-2.0-flash')
  };

  const geminiApiKey = readString(env, 'GEMINI_API_KEY');
  const openaiApiKey = readString(env, 'OPENAI_API_KEY');
  const providers = new Set(Object.values(models).map(getModelProvider));
  if (providers.has('gemini') && !geminiApiKey) {
    throw new ConfigurationError('GEMINI_API_KEY not configured in environment');
  }
  if (providers.has('openai') && !openaiApiKey) {
    throw new ConfigurationError('OPENAI_API_KEY not configured in environment');
  }

  const defaultTargetLanguage = (readString(env, 'DEFAULT_TARGET_LANGUAGE') ?? 'thai').toLowerCase();
  if (!isSupportedLanguage(defaultTargetLanguage)) {
    throw new ConfigurationError(`DEFAULT_TARGET_LANGUAGE is not supported: ${defaultTargetLanguage}`);
  }

  const questionStore = readQuestionStore(env);
  const storageBucket = readString(env, 'FIREBASE_STORAGE_BUCKET');
  if (questionStore === 'firestore' && !storageBucket) {
    throw new ConfigurationError('FIREBASE_STORAGE_BUCKET not configured in environment');
  }

  const corsOrigins = readString(env, 'CORS_ORIGINS')
    ?.split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return {
    port: readInteger(env, 'PORT', 5001),
    nodeEnv: readString(env, 'NODE_ENV') ?? 'development',
    geminiApiKey,
    openaiApiKey,
    models,
    defaultTargetLanguage,
    questionStore,
    firebase: {
      serviceAccountPath: readString(env, 'FIREBASE_SERVICE_ACCOUNT_PATH'),
      storageBucket,
      questionsCollection: readString(env, 'QUESTIONS_COLLECTION') ?? DEFAULT_QUESTIONS_COLLECTION
    },
    corsOrigins: corsOrigins && corsOrigins.length > 0 ? corsOrigins : DEFAULT_CORS_ORIGINS,
    rateLimitMax: readInteger(env, 'RATE_LIMIT_MAX', 1000)
  };
}
