import type { LLMClient, LLMRequest, LLMResponse } from '../types/index.js';
import {
  getModelConfig,
  getModelProvider,
  getProviderModelName,
  OPENAI_CHAT_COMPLETIONS_ENDPOINT
} from '../config/aiModels.js';
import { ConfigurationError } from './errors.js';
import { ErrorHandler } from './errorHandler.js';
import { isRecord } from '../services/ai/JsonUtils.js';
import { ImageUtils } from './ImageUtils.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ModelProviderOptions {
  geminiApiKey?: string;
  openaiApiKey?: string;
  openaiEndpoint?: string;
  fetchImpl?: FetchLike;
}

interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

const GEMINI_SAFETY_SETTINGS = [
  { category: 'HARM_CATEGORY_HARASSMENT', threshold: 'BLOCK_NONE' },
  { category: 'HARM_CATEGORY_HATE_SPEECH', threshold: 'BLOCK_NONE' },
  { category: 'HARM_CATEGORY_SEXUALLY_EXPLICIT', threshold: 'BLOCK_NONE' },
  { category: 'HARM_CATEGORY_DANGEROUS_CONTENT', threshold: 'BLOCK_NONE' }
];

function readNumber(source: unknown, key: string): number {
  if (!isRecord(source)) return 0;
  const value = source[key];
  return typeof value === 'number' ? value : 0;
}

/**
 * Talks to Gemini (generateContent) and OpenAI (chat/completions) over fetch.
 * Routing is decided by the model id: 'openai-*' goes to OpenAI, everything else to Gemini.
 */
export class ModelProvider implements LLMClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: ModelProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    const provider = getModelProvider(request.model);
    const phase = request.phase ?? 'other';
    try {
      return provider === 'openai'
        ? await this.callOpenAI(request)
        : await this.callGemini(request);
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, `calling ${request.model} (${phase})`);
    }
  }

  // ----------------------------------------------------------------------------
  // Gemini
  // ----------------------------------------------------------------------------

  private async callGemini(request: LLMRequest): Promise<LLMResponse> {
    const apiKey = this.requireKey(this.options.geminiApiKey, 'GEMINI_API_KEY');
    const config = getModelConfig(request.model);

    const parts: Array<Record<string, unknown>> = [
      { text: request.systemPrompt },
      { text: request.userPrompt }
    ];
    if (request.imageBase64 && request.imageBase64.trim() !== '') {
      parts.push({
        inline_data: {
          mime_type: 'image/jpeg',
          data: ImageUtils.toRawBase64(request.imageBase64)
        }
      });
    }

    const response = await this.fetchImpl(`${config.apiEndpoint}?key=${apiKey}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        contents: [{ parts }],
        generationConfig: {
          temperature: request.temperature ?? config.temperature,
          maxOutputTokens: request.maxTokens ?? config.maxTokens,
          ...(request.responseFormat === 'json' && { responseMimeType: 'application/json' })
        },
        safetySettings: GEMINI_SAFETY_SETTINGS
      })
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Gemini API error: ${response.status} ${response.statusText} - ${errorText}`);
    }

    const result: unknown = await response.json();
    const content = ModelProvider.extractGeminiTextContent(result);
    const usage = isRecord(result) ? result.usageMetadata : undefined;
    const tokens = this.withEstimate({
      inputTokens: readNumber(usage, 'promptTokenCount'),
      outputTokens: readNumber(usage, 'candidatesTokenCount'),
      totalTokens: readNumber(usage, 'totalTokenCount')
    }, request, content);

    return { content, usageTokens: tokens.totalTokens, inputTokens: tokens.inputTokens, outputTokens: tokens.outputTokens, modelName: request.model };
  }

  static extractGeminiTextContent(result: unknown): string {
    const candidates = isRecord(result) && Array.isArray(result.candidates) ? result.candidates : [];
    const candidate: unknown = candidates[0];
    const finishReason = isRecord(candidate) && typeof candidate.finishReason === 'string'
      ? candidate.finishReason
      : undefined;

    if (finishReason === 'MAX_TOKENS') {
      throw new Error('Gemini response truncated (MAX_TOKENS)');
    }

    const contentNode = isRecord(candidate) ? candidate.content : undefined;
    const parts = isRecord(contentNode) && Array.isArray(contentNode.parts) ? contentNode.parts : [];
    const text = parts
      .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
      .join('');

    if (!text) {
      const apiError = isRecord(result) && isRecord(result.error) && typeof result.error.message === 'string'
        ? result.error.message
        : undefined;
      const blockReason = isRecord(result) && isRecord(result.promptFeedback) && typeof result.promptFeedback.blockReason === 'string'
        ? result.promptFeedback.blockReason
        : undefined;
      throw new Error(`Gemini API error: ${apiError || finishReason || blockReason || 'No content in Gemini response'}`);
    }
    return text;
  }

  // ----------------------------------------------------------------------------
  // OpenAI
  // ----------------------------------------------------------------------------

  private async callOpenAI(request: LLMRequest): Promise<LLMResponse> {
    const apiKey = this.requireKey(this.options.openaiApiKey, 'OPENAI_API_KEY');
    const config = getModelConfig(request.model);
    const modelName = getProviderModelName(request.model);

    const userContent = request.imageBase64
      ? [
        { type: 'text', text: request.userPrompt },
        { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${ImageUtils.toRawBase64(request.imageBase64)}` } }
      ]
      : request.userPrompt;

    const body: Record<string, unknown> = {
      model: modelName,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: userContent }
      ],
      temperature: request.temperature ?? config.temperature,
      max_tokens: request.maxTokens ?? config.maxTokens
    };

    if (request.responseFormat === 'json') {
      body.response_format = { type: 'json_object' };
    }

    const response = await this.fetchImpl(this.options.openaiEndpoint ?? OPENAI_CHAT_COMPLETIONS_ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${apiKey}`
      },
      body: JSON.stringify(body)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenAI API error: ${response.status} ${response.statusText} - ${text}`);
    }

    const json: unknown = await response.json();
    const choices = isRecord(json) && Array.isArray(json.choices) ? json.choices : [];
    const firstChoice: unknown = choices[0];
    const message = isRecord(firstChoice) ? firstChoice.message : undefined;
    const content = isRecord(message) && typeof message.content === 'string' ? message.content : '';
    if (!content) {
      throw new Error('OpenAI API error: No content in OpenAI response');
    }

    const usage = isRecord(json) ? json.usage : undefined;
    const tokens = this.withEstimate({
      inputTokens: readNumber(usage, 'prompt_tokens'),
      outputTokens: readNumber(usage, 'completion_tokens'),
      totalTokens: readNumber(usage, 'total_tokens')
    }, request, content);

    return { content, usageTokens: tokens.totalTokens, inputTokens: tokens.inputTokens, outputTokens: tokens.outputTokens, modelName: request.model };
  }

  // ----------------------------------------------------------------------------
  // Helpers
  // ----------------------------------------------------------------------------

  private requireKey(key: string | undefined, name: string): string {
    if (!key) {
      throw new ConfigurationError(`${name} not configured in environment`);
    }
    return key;
  }

  /**
   * Some responses come back without usage metadata; estimate at ~4 chars per token
   * (plus a flat 258 tokens per image) so usage logs never read zero for a real call.
   */
  private withEstimate(tokens: TokenUsage, request: LLMRequest, content: string): TokenUsage {
    if (tokens.totalTokens > 0) {
      return tokens;
    }
    const imageTokens = request.imageBase64 ? 258 : 0;
    const inputTokens = imageTokens + Math.ceil((request.systemPrompt.length + request.userPrompt.length) / 4);
    const outputTokens = Math.ceil(content.length / 4);
    return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
  }
}

