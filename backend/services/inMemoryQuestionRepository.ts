import type {
  Question,
  QuestionDeleteResult,
  QuestionLookup,
  QuestionRepository,
  QuestionSaveResult
} from '../types/index.js';

function copyQuestion(question: Question): Question {
  return { ...question, solution_steps: [...question.solution_steps], conversations: [...question.conversations] };
}

/**
 * Process-local question store used when Firestore is not configured, and by tests.
 * Conditional saves are compare-and-set on `version`.
 */
export class InMemoryQuestionRepository implements QuestionRepository {
  private readonly questions = new Map<string, Question>();

  async get(questionId: string): Promise<QuestionLookup> {
    const stored = this.questions.get(questionId);
    return stored ? { status: 'found', question: copyQuestion(stored) } : { status: 'not_found' };
  }

  async save(question: Question, expectedVersion?: number): Promise<QuestionSaveResult> {
    if (expectedVersion !== undefined) {
      const storedVersion = this.questions.get(question.question_id)?.version ?? 0;
      if (storedVersion !== expectedVersion) {
        return { status: 'conflict' };
      }
    }
    this.questions.set(question.question_id, copyQuestion(question));
    return { status: 'saved', question: copyQuestion(question) };
  }

  async scan(limit: number): Promise<Question[]> {
    return [...this.questions.values()]
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .slice(0, limit)
      .map(copyQuestion);
  }

  async delete(questionId: string): Promise<QuestionDeleteResult> {
    return this.questions.delete(questionId) ? 'deleted' : 'not_found';
  }
}
