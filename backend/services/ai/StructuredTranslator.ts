import type { Analysis, LLMClient, ModelType, TranslationOutcome } from '../../types/index.js';
import { getPrompt } from '../../config/prompts.js';
import { getErrorMessage } from '../../utils/errors.js';
import { JsonUtils } from './JsonUtils.js';
import { validateAnalysis } from './SchemaGuardedExtractor.js';

const TRANSLATION_TEMPERATURE = 0.1;

const STEP_LABEL_PATTERN = /^\s*((?:Step\s+\d+|Conclusion)\s*:)/i;

export interface StructuredTranslatorDeps {
  llm: LLMClient;
  model: ModelType;
}

/**
 * Leading "Step N:" or "Conclusion:" label of a step, if any.
 */
export function readStepLabel(step: string): string | null {
  const match = STEP_LABEL_PATTERN.exec(step);
  return match ? match[1] : null;
}

/**
 * Put back labels the model dropped from translated steps.
 */
export function restoreStepLabels(source: readonly string[], translated: readonly string[]): string[] {
  return translated.map((step, index) => {
    const label = readStepLabel(source[index] ?? '');
    if (!label || readStepLabel(step) !== null) {
      return step;
    }
    return `${label} ${step.trimStart()}`;
  });
}

/**
 * Re-expresses an Analysis in another language, keeping keys, step count and math.
 * Every failure degrades to the untouched original.
 */
export class StructuredTranslator {
  constructor(private readonly deps: StructuredTranslatorDeps) {}

  async translate(analysis: Analysis, targetLanguage: string): Promise<TranslationOutcome> {
    try {
      const translated = await this.requestTranslation(analysis, targetLanguage);
      console.log(`✅ [TRANSLATOR] Translated analysis to ${targetLanguage}`);
      return { status: 'translated', analysis: translated };
    } catch (error) {
      const reason = getErrorMessage(error);
      console.warn(`⚠️ [TRANSLATOR] Translation to ${targetLanguage} failed, keeping original: ${reason}`);
      return { status: 'fell_back', analysis, reason };
    }
  }

  private async requestTranslation(analysis: Analysis, targetLanguage: string): Promise<Analysis> {
    const response = await this.deps.llm.generate({
      systemPrompt: getPrompt('translation.system', targetLanguage),
      userPrompt: getPrompt('translation.user', targetLanguage, JSON.stringify(analysis, null, 2)),
      model: this.deps.model,
      responseFormat: 'json',
      temperature: TRANSLATION_TEMPERATURE,
      phase: 'translation'
    });

    const recovery = JsonUtils.recoverObject(response.content, { strictFirst: true });
    if (!recovery.ok) {
      throw new Error(recovery.reason);
    }

    const translated = validateAnalysis(recovery.value);
    if (translated.solution_steps.length !== analysis.solution_steps.length) {
      throw new Error(
        `Translated step count ${translated.solution_steps.length} does not match original ${analysis.solution_steps.length}`
      );
    }

    return {
      question_understanding: translated.question_understanding,
      solving_strategy: translated.solving_strategy,
      solution_steps: restoreStepLabels(analysis.solution_steps, translated.solution_steps)
    };
  }
}
