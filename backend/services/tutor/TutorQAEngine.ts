import type { LLMClient, ModelType, Question, TutorExchange } from '../../types/index.js';
import { getPrompt } from '../../config/prompts.js';
import { MalformedResponseError, ValidationError } from '../../utils/errors.js';
import type { QuestionStore } from '../QuestionStore.js';
import {
  TUTOR_CONTEXT_LIMIT,
  formatConversationContext,
  tagAssistantTurn,
  tagUserTurn,
  windowConversation
} from './ConversationWindow.js';

const TUTOR_TEMPERATURE = 0.3;
const TUTOR_MAX_TOKENS = 1024;

export interface TutorQAEngineDeps {
  llm: LLMClient;
  model: ModelType;
  store: QuestionStore;
}

export function enumerateSteps(steps: readonly string[]): string {
  return steps.map((step, index) => `${index + 1}. ${step}`).join('\n');
}

/**
 * Free-form follow-up questions about a stored analysis.
 * Both sides of the exchange are appended in one write; a failed model call appends nothing.
 */
export class TutorQAEngine {
  constructor(private readonly deps: TutorQAEngineDeps) {}

  async ask(question: Question, userText: string): Promise<TutorExchange> {
    const text = userText.trim();
    if (!text) {
      throw new ValidationError('Message must not be empty');
    }

    const priorTurns = formatConversationContext(
      windowConversation(question.conversations, TUTOR_CONTEXT_LIMIT)
    );

    console.log(`💬 [TUTOR] Answering question about ${question.question_id}`);
    const response = await this.deps.llm.generate({
      systemPrompt: getPrompt('tutor.system'),
      userPrompt: getPrompt(
        'tutor.user',
        question.question_understanding,
        question.solving_strategy,
        enumerateSteps(question.solution_steps),
        priorTurns,
        text
      ),
      model: this.deps.model,
      responseFormat: 'text',
      temperature: TUTOR_TEMPERATURE,
      maxTokens: TUTOR_MAX_TOKENS,
      phase: 'tutorChat'
    });

    const answer = response.content.trim();
    if (!answer) {
      throw new MalformedResponseError('Tutor model returned an empty answer');
    }
    const updated = await this.deps.store.mutate(question.question_id, current => ({
      conversations: [...current.conversations, tagUserTurn(text), tagAssistantTurn(answer)]
    }));

    console.log(`✅ [TUTOR] Appended exchange to ${question.question_id} (${updated.conversations.length} turns)`);
    return { user_message: text, ai_response: answer, question: updated };
  }
}
