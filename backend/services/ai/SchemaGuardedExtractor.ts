/**
 * Schema-guarded extraction: image -> vision model -> validated Analysis
 */

import type { Analysis, LLMClient, ModelType } from '../../types/index.js';
import { getPrompt } from '../../config/prompts.js';
import { MalformedResponseError, ValidationError } from '../../utils/errors.js';
import { JsonUtils } from './JsonUtils.js';

export const ANALYSIS_KEYS = ['question_understanding', 'solving_strategy', 'solution_steps'] as const;

const EXTRACTION_TEMPERATURE = 0.1;

export interface SchemaGuardedExtractorDeps {
  llm: LLMClient;
  model: ModelType;
}

/**
 * Check a parsed object against the Analysis shape.
 * @throws MalformedResponseError naming the first missing or invalid field
 */
export function validateAnalysis(value: Record<string, unknown>): Analysis {
  for (const key of ANALYSIS_KEYS) {
    if (!(key in value)) {
      throw new MalformedResponseError(`LLM response is missing required field: ${key}`, { field: key });
    }
  }

  const understanding = value.question_understanding;
  if (typeof understanding !== 'string' || understanding.trim() === '') {
    throw new MalformedResponseError('question_understanding must be a non-empty string', { field: 'question_understanding' });
  }

  const strategy = value.solving_strategy;
  if (typeof strategy !== 'string' || strategy.trim() === '') {
    throw new MalformedResponseError('solving_strategy must be a non-empty string', { field: 'solving_strategy' });
  }

  const steps = value.solution_steps;
  if (!Array.isArray(steps) || steps.length === 0) {
    throw new MalformedResponseError('solution_steps must be a non-empty list', { field: 'solution_steps' });
  }
  const solutionSteps: string[] = [];
  for (const step of steps) {
    if (typeof step !== 'string') {
      throw new MalformedResponseError('solution_steps must contain only strings', { field: 'solution_steps' });
    }
    if (step.trim() === '') {
      throw new MalformedResponseError('solution_steps must not contain blank steps', { field: 'solution_steps' });
    }
    solutionSteps.push(step);
  }

  return {
    question_understanding: understanding,
    solving_strategy: strategy,
    solution_steps: solutionSteps
  };
}

export class SchemaGuardedExtractor {
  constructor(private readonly deps: SchemaGuardedExtractorDeps) {}

  /**
   * Analyze an image of Thai text. Failures propagate; there is no retry here.
   * @param imageBase64 JPEG image, raw base64 or data URL
   * @param language language the analysis is written in
   */
  async extract(imageBase64: string, language: string): Promise<Analysis> {
    if (!imageBase64 || imageBase64.trim() === '') {
      throw new ValidationError('Image data is required for extraction');
    }

    console.log(`🔍 [EXTRACTOR] Analyzing image with ${this.deps.model} (${language})`);
    const response = await this.deps.llm.generate({
      systemPrompt: getPrompt('extraction.system', language),
      userPrompt: getPrompt('extraction.user', language),
      model: this.deps.model,
      imageBase64,
      responseFormat: 'json',
      temperature: EXTRACTION_TEMPERATURE,
      phase: 'extraction'
    });

    return this.parse(response.content);
  }

  /**
   * Recover the Analysis from raw model text.
   */
  parse(rawContent: string): Analysis {
    const recovery = JsonUtils.recoverObject(rawContent);
    if (!recovery.ok) {
      console.error(`❌ [EXTRACTOR] ${recovery.reason}`);
      throw new MalformedResponseError(recovery.reason);
    }

    const analysis = validateAnalysis(recovery.value);
    console.log(`✅ [EXTRACTOR] Extracted analysis with ${analysis.solution_steps.length} steps`);
    return analysis;
  }
}
