import type { Question, QuestionRepository, QuestionUpdate } from '../types/index.js';
import { NotFoundError, UpstreamServiceError } from '../utils/errors.js';

export const DEFAULT_MUTATION_ATTEMPTS = 3;

export type QuestionMutation = (current: Question) => QuestionUpdate;

export interface QuestionStoreOptions {
  maxAttempts?: number;
  now?: () => Date;
}

/**
 * Versioned access to questions on top of a QuestionRepository.
 * Writes are conditional on the version that was read; a conflicting write
 * re-reads and re-applies the mutation.
 */
export class QuestionStore {
  private readonly maxAttempts: number;
  private readonly now: () => Date;

  constructor(
    private readonly repository: QuestionRepository,
    options: QuestionStoreOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MUTATION_ATTEMPTS;
    this.now = options.now ?? (() => new Date());
  }

  timestamp(): string {
    return this.now().toISOString();
  }

  async require(questionId: string): Promise<Question> {
    const lookup = await this.repository.get(questionId);
    if (lookup.status === 'not_found') {
      throw new NotFoundError('Question not found', { question_id: questionId });
    }
    return lookup.question;
  }

  /**
   * Save a brand new question (version 1). Fails if the id is already taken.
   */
  async insert(question: Question): Promise<Question> {
    const result = await this.repository.save(question, 0);
    if (result.status === 'conflict') {
      throw new UpstreamServiceError(`Question ${question.question_id} already exists`);
    }
    return result.question;
  }

  async mutate(questionId: string, mutation: QuestionMutation): Promise<Question> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const current = await this.require(questionId);
      const next: Question = {
        ...current,
        ...mutation(current),
        question_id: current.question_id,
        created_at: current.created_at,
        updated_at: this.timestamp(),
        version: current.version + 1
      };

      const result = await this.repository.save(next, current.version);
      if (result.status === 'saved') {
        return result.question;
      }
      console.warn(`⚠️ [QUESTION STORE] Version conflict on ${questionId} (attempt ${attempt}/${this.maxAttempts})`);
    }

    throw new UpstreamServiceError(
      `Could not update question ${questionId}: concurrent modification`,
      { attempts: this.maxAttempts }
    );
  }

  async scan(limit: number): Promise<Question[]> {
    return this.repository.scan(limit);
  }

  async remove(questionId: string): Promise<void> {
    const result = await this.repository.delete(questionId);
    if (result === 'not_found') {
      throw new NotFoundError('Question not found', { question_id: questionId });
    }
  }
}
