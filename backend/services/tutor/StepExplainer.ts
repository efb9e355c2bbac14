/**
 * Step Explainer
 *
 * Explains a single solution step of a stored question: why the step is taken
 * and which concepts it relies on. Nothing is persisted.
 */

import type {
  Explanation,
  ExplanationOutcome,
  LLMClient,
  ModelType,
  Question
} from '../../types/index.js';
import { getPrompt } from '../../config/prompts.js';
import { ValidationError } from '../../utils/errors.js';
import { JsonUtils } from '../ai/JsonUtils.js';
import { formatConversationContext, windowConversation } from './ConversationWindow.js';

export const GENERIC_WHY_THIS_WAY = 'This step follows from the previous steps and moves the solution toward the final answer.';
export const GENERIC_KEY_CONCEPTS = 'This step applies the concepts introduced in the solving strategy.';

const STEP_EXPLANATION_TEMPERATURE = 0.3;

export interface StepExplainerDeps {
  llm: LLMClient;
  model: ModelType;
  /** Recent conversation entries included in the prompt. 0 leaves the conversation out. */
  conversationContextLimit?: number;
}

export type ExplanationFields = Pick<Explanation, 'why_this_way' | 'key_concepts'>;

/**
 * Last-resort parse for free text: first paragraph is the "why", second the concepts.
 */
export function parseExplanationFallback(rawText: string): ExplanationFields {
  const paragraphs = rawText
    .split(/\n\s*\n/)
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0);

  return {
    why_this_way: paragraphs[0] ?? GENERIC_WHY_THIS_WAY,
    key_concepts: paragraphs[1] ?? GENERIC_KEY_CONCEPTS
  };
}

function readField(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value.trim();
  }
  if (Array.isArray(value) && value.length > 0 && value.every(item => typeof item === 'string')) {
    return value.join('\n');
  }
  return null;
}

/**
 * Structured parse of the model's JSON answer, or null when the answer carries
 * neither field in a usable form.
 */
export function parseExplanationJson(rawText: string): ExplanationFields | null {
  const recovery = JsonUtils.recoverObject(rawText);
  if (!recovery.ok) {
    return null;
  }

  const why = readField(recovery.value.why_this_way);
  const concepts = readField(recovery.value.key_concepts);
  if (why === null && concepts === null) {
    return null;
  }

  return {
    why_this_way: why ?? GENERIC_WHY_THIS_WAY,
    key_concepts: concepts ?? GENERIC_KEY_CONCEPTS
  };
}

export class StepExplainer {
  private readonly conversationContextLimit: number;

  constructor(private readonly deps: StepExplainerDeps) {
    this.conversationContextLimit = deps.conversationContextLimit ?? 0;
  }

  /**
   * @param stepNumber 1-indexed position in `question.solution_steps`
   * @throws ValidationError when the step is out of range, before the model is called
   */
  async explain(question: Question, stepNumber: number): Promise<ExplanationOutcome> {
    const totalSteps = question.solution_steps.length;
    if (!Number.isInteger(stepNumber) || stepNumber < 1 || stepNumber > totalSteps) {
      throw new ValidationError(
        `Step number must be between 1 and ${totalSteps}, got ${stepNumber}`,
        { min: 1, max: totalSteps }
      );
    }

    const stepContent = question.solution_steps[stepNumber - 1];
    const context = formatConversationContext(
      windowConversation(question.conversations, this.conversationContextLimit)
    );

    console.log(`🔍 [STEP EXPLAINER] Explaining step ${stepNumber}/${totalSteps} of ${question.question_id}`);
    const response = await this.deps.llm.generate({
      systemPrompt: getPrompt('stepExplanation.system'),
      userPrompt: getPrompt(
        'stepExplanation.user',
        question.question_understanding,
        question.solving_strategy,
        String(stepNumber),
        String(totalSteps),
        stepContent,
        context
      ),
      model: this.deps.model,
      responseFormat: 'json',
      temperature: STEP_EXPLANATION_TEMPERATURE,
      phase: 'stepExplanation'
    });

    const parsed = parseExplanationJson(response.content);
    if (parsed) {
      return {
        explanation: { step: stepNumber, step_content: stepContent, ...parsed },
        parsing: 'parsed'
      };
    }

    console.warn(`⚠️ [STEP EXPLAINER] Could not parse JSON explanation for step ${stepNumber}, splitting paragraphs`);
    return {
      explanation: { step: stepNumber, step_content: stepContent, ...parseExplanationFallback(response.content) },
      parsing: 'fallback_heuristic'
    };
  }
}
