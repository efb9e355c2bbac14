/**
 * AI Model Configuration
 * Centralized configuration for all supported AI models
 */

import type { ModelType, AIModelConfig } from '../types/index.js';

export type ModelProviderName = 'gemini' | 'openai';

export const OPENAI_CHAT_COMPLETIONS_ENDPOINT = 'https://api.openai.com/v1/chat/completions';

/**
 * Configuration for all supported AI models
 */
export const AI_MODELS: Record<ModelType, AIModelConfig> = {
  'gemini-2.0-flash': {
    name: 'Google Gemini 2.0 Flash',
    apiEndpoint: 'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent',
    maxTokens: 8192,
    temperature: 0.1
  },
  'gemini-2.5-flash': {
    name: 'Google Gemini 2.5 Flash',
    apiEndpoint: 'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent',
    maxTokens: 16384,
    temperature: 0.1
  },
  'openai-gpt-4o': {
    name: 'OpenAI GPT-4o',
    apiEndpoint: OPENAI_CHAT_COMPLETIONS_ENDPOINT,
    maxTokens: 16384,
    temperature: 0.1
  },
  'openai-gpt-4o-mini': {
    name: 'OpenAI GPT-4o Mini',
    apiEndpoint: OPENAI_CHAT_COMPLETIONS_ENDPOINT,
    maxTokens: 16384,
    temperature: 0.1
  }
};

/**
 * Get configuration for a specific model
 */
export function getModelConfig(modelType: ModelType): AIModelConfig {
  return AI_MODELS[modelType];
}

export function isModelSupported(model: string): model is ModelType {
  return Object.prototype.hasOwnProperty.call(AI_MODELS, model);
}

/**
 * Which provider serves the model ('openai-gpt-4o' -> openai)
 */
export function getModelProvider(modelType: ModelType): ModelProviderName {
  return modelType.startsWith('openai-') ? 'openai' : 'gemini';
}

/**
 * Provider-side model name ('openai-gpt-4o' -> 'gpt-4o', Gemini ids unchanged)
 */
export function getProviderModelName(modelType: ModelType): string {
  return modelType.startsWith('openai-') ? modelType.replace('openai-', '') : modelType;
}
