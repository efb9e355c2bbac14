/**
 * Tests for environment-driven application configuration
 */

import { loadConfig } from './appConfig.js';
import { ConfigurationError } from '../utils/errors.js';

describe('loadConfig', () => {
  const baseEnv = {
    GEMINI_API_KEY: 'test-gemini-key',
    OPENAI_API_KEY: 'test-openai-key',
    FIREBASE_STORAGE_BUCKET: 'test-bucket'
  };

  it('should apply defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      port: 5001,
      nodeEnv: 'development',
      geminiApiKey: 'test-gemini-key',
      openaiApiKey: 'test-openai-key',
      models: {
        extraction: 'gemini-2.0-flash',
        translation: 'openai-gpt-4o',
        tutor: 'gemini-2.0-flash'
      },
      defaultTargetLanguage: 'thai',
      questionStore: 'firestore',
      firebase: {
        serviceAccountPath: undefined,
        storageBucket: 'test-bucket',
        questionsCollection: 'questions'
      },
      corsOrigins: ['http://localhost:3000', 'http://127.0.0.1:3000'],
      rateLimitMax: 1000
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: '8080',
      NODE_ENV: 'production',
      TUTOR_MODEL: 'openai-gpt-4o-mini',
      DEFAULT_TARGET_LANGUAGE: 'English',
      QUESTIONS_COLLECTION: 'practice_questions',
      CORS_ORIGINS: 'https://tutor.example.com, https://admin.example.com,',
      RATE_LIMIT_MAX: '50'
    });

    expect(config.port).toBe(8080);
    expect(config.nodeEnv).toBe('production');
    expect(config.models.tutor).toBe('openai-gpt-4o-mini');
    expect(config.defaultTargetLanguage).toBe('english');
    expect(config.firebase.questionsCollection).toBe('practice_questions');
    expect(config.corsOrigins).toEqual(['https://tutor.example.com', 'https://admin.example.com']);
    expect(config.rateLimitMax).toBe(50);
  });

  it('should only require the keys of the providers in use', () => {
    const config = loadConfig({
      GEMINI_API_KEY: 'test-gemini-key',
      TRANSLATION_MODEL: 'gemini-2.5-flash',
      QUESTION_STORE: 'memory'
    });

    expect(config.openaiApiKey).toBeUndefined();
    expect(config.questionStore).toBe('memory');
    expect(config.firebase.storageBucket).toBeUndefined();
  });

  it('should reject a missing Gemini key', () => {
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-openai-key', FIREBASE_STORAGE_BUCKET: 'test-bucket' }))
      .toThrow(new ConfigurationError('GEMINI_API_KEY not configured in environment'));
  });

  it('should reject a missing OpenAI key when an OpenAI model is configured', () => {
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-gemini-key', FIREBASE_STORAGE_BUCKET: 'test-bucket' }))
      .toThrow('OPENAI_API_KEY not configured in environment');
  });

  it('should require a storage bucket for the Firestore store', () => {
    expect(() => loadConfig({ GEMINI_API_KEY: 'test-gemini-key', OPENAI_API_KEY: 'test-openai-key' }))
      .toThrow('FIREBASE_STORAGE_BUCKET not configured in environment');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ ...baseEnv, EXTRACTION_MODEL: 'gpt-2' }))
      .toThrow('EXTRACTION_MODEL names an unsupported model: gpt-2');
    expect(() => loadConfig({ ...baseEnv, PORT: 'abc' }))
      .toThrow('PORT must be a positive integer, got "abc"');
    expect(() => loadConfig({ ...baseEnv, QUESTION_STORE: 'sqlite' }))
      .toThrow('QUESTION_STORE must be "firestore" or "memory", got "sqlite"');
    expect(() => loadConfig({ ...baseEnv, DEFAULT_TARGET_LANGUAGE: 'klingon' }))
      .toThrow('DEFAULT_TARGET_LANGUAGE is not supported: klingon');
  });
});
