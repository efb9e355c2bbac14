/**
 * Question Service
 * CRUD over stored questions plus the tutoring operations that work on them
 */

import { v4 as uuidv4 } from 'uuid';
import type {
  ExplanationOutcome,
  ImageStorage,
  Question,
  QuestionCreate,
  QuestionUpdate,
  TutorExchange
} from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { isRecord } from './ai/JsonUtils.js';
import type { QuestionStore } from './QuestionStore.js';
import type { StepExplainer } from './tutor/StepExplainer.js';
import type { TutorQAEngine } from './tutor/TutorQAEngine.js';

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export interface QuestionServiceDeps {
  store: QuestionStore;
  storage: ImageStorage;
  stepExplainer: StepExplainer;
  tutor: TutorQAEngine;
}

/**
 * `q_<8 hex>_<unix seconds>`
 */
export function generateQuestionId(now: Date = new Date()): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `q_${suffix}_${Math.floor(now.getTime() / 1000)}`;
}

// ============================================================================
// INPUT VALIDATION
// ============================================================================

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, { field });
  }
  return value;
}

function requireSteps(value: unknown): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError('solution_steps must be a non-empty list of strings', { field: 'solution_steps' });
  }
  return value.map(step => requireText(step, 'solution_steps'));
}

function requireConversations(value: unknown): string[] {
  if (!Array.isArray(value) || !value.every(entry => typeof entry === 'string')) {
    throw new ValidationError('conversations must be a list of strings', { field: 'conversations' });
  }
  return value.map(String);
}

export function parseQuestionCreate(body: unknown): QuestionCreate {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return {
    question_understanding: requireText(body.question_understanding, 'question_understanding'),
    solving_strategy: requireText(body.solving_strategy, 'solving_strategy'),
    solution_steps: requireSteps(body.solution_steps),
    image_s3: requireText(body.image_s3, 'image_s3'),
    conversations: body.conversations === undefined ? [] : requireConversations(body.conversations)
  };
}

export function parseQuestionUpdate(body: unknown): QuestionUpdate {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const update: QuestionUpdate = {};
  if (body.question_understanding !== undefined) {
    update.question_understanding = requireText(body.question_understanding, 'question_understanding');
  }
  if (body.solving_strategy !== undefined) {
    update.solving_strategy = requireText(body.solving_strategy, 'solving_strategy');
  }
  if (body.solution_steps !== undefined) {
    update.solution_steps = requireSteps(body.solution_steps);
  }
  if (body.conversations !== undefined) {
    update.conversations = requireConversations(body.conversations);
  }
  if (body.image_s3 !== undefined) {
    update.image_s3 = requireText(body.image_s3, 'image_s3');
  }
  return update;
}

/**
 * Parse a `limit` query value; absent means the default.
 */
export function parseListLimit(value: unknown): number {
  if (value === undefined || value === '') {
    return DEFAULT_LIST_LIMIT;
  }
  const limit = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new ValidationError(
      `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`,
      { min: 1, max: MAX_LIST_LIMIT }
    );
  }
  return limit;
}

// ============================================================================
// SERVICE
// ============================================================================

export class QuestionService {
  constructor(private readonly deps: QuestionServiceDeps) {}

  async createQuestion(data: QuestionCreate): Promise<Question> {
    const input = parseQuestionCreate(data);
    const timestamp = this.deps.store.timestamp();
    const question = await this.deps.store.insert({
      question_id: generateQuestionId(new Date(timestamp)),
      question_understanding: input.question_understanding,
      solving_strategy: input.solving_strategy,
      solution_steps: input.solution_steps,
      conversations: input.conversations ?? [],
      image_s3: input.image_s3,
      created_at: timestamp,
      updated_at: timestamp,
      version: 1
    });

    console.log(`✅ [QUESTIONS] Created question ${question.question_id}`);
    return question;
  }

  async getQuestion(questionId: string): Promise<Question> {
    return this.deps.store.require(questionId);
  }

  async updateQuestion(questionId: string, update: QuestionUpdate): Promise<Question> {
    const fields = parseQuestionUpdate(update);
    const question = await this.deps.store.mutate(questionId, () => fields);
    console.log(`✅ [QUESTIONS] Updated question ${questionId}`);
    return question;
  }

  async deleteQuestion(questionId: string): Promise<{ message: string }> {
    await this.deps.store.remove(questionId);
    console.log(`🗑️ [QUESTIONS] Deleted question ${questionId}`);
    return { message: `Question ${questionId} deleted successfully` };
  }

  async listQuestions(limit: number = DEFAULT_LIST_LIMIT): Promise<Question[]> {
    const questions = await this.deps.store.scan(parseListLimit(limit));
    console.log(`📋 [QUESTIONS] Listed ${questions.length} questions`);
    return questions;
  }

  /**
   * Append one entry to the conversation log, verbatim.
   */
  async appendConversation(questionId: string, message: string): Promise<Question> {
    const entry = requireText(message, 'message');
    const question = await this.deps.store.mutate(questionId, current => ({
      conversations: [...current.conversations, entry]
    }));
    console.log(`💬 [QUESTIONS] Appended conversation to ${questionId}`);
    return question;
  }

  async explainStep(questionId: string, stepNumber: number): Promise<ExplanationOutcome> {
    const question = await this.deps.store.require(questionId);
    return this.deps.stepExplainer.explain(question, stepNumber);
  }

  async askAboutQuestion(questionId: string, userText: string): Promise<TutorExchange> {
    const question = await this.deps.store.require(questionId);
    return this.deps.tutor.ask(question, userText);
  }

  /**
   * Signed, time-limited read URL for the question's source image.
   */
  async getImageUrl(questionId: string, expiresInSeconds?: number): Promise<{ url: string }> {
    const question = await this.deps.store.require(questionId);
    const url = await this.deps.storage.getSignedUrl(question.image_s3, expiresInSeconds);
    return { url };
  }
}
