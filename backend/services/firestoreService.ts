/**
 * Firestore Question Repository
 * Durable storage of questions in Cloud Firestore, one document per question
 */

import type { CollectionReference, DocumentData, Firestore } from 'firebase-admin/firestore';
import type {
  Question,
  QuestionDeleteResult,
  QuestionLookup,
  QuestionRepository,
  QuestionSaveResult
} from '../types/index.js';
import { UpstreamServiceError } from '../utils/errors.js';
import { ErrorHandler } from '../utils/errorHandler.js';
import { isRecord } from './ai/JsonUtils.js';

export const DEFAULT_QUESTIONS_COLLECTION = 'questions';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Decode a stored document. Documents written before versioning count as version 1.
 */
export function decodeQuestion(data: unknown, questionId: string): Question {
  if (
    !isRecord(data) ||
    typeof data.question_understanding !== 'string' ||
    typeof data.solving_strategy !== 'string' ||
    !isStringArray(data.solution_steps) ||
    typeof data.image_s3 !== 'string'
  ) {
    throw new UpstreamServiceError(`Stored question ${questionId} is malformed`);
  }

  const createdAt = typeof data.created_at === 'string' ? data.created_at : new Date(0).toISOString();
  return {
    question_id: questionId,
    question_understanding: data.question_understanding,
    solving_strategy: data.solving_strategy,
    solution_steps: data.solution_steps,
    conversations: isStringArray(data.conversations) ? data.conversations : [],
    image_s3: data.image_s3,
    created_at: createdAt,
    updated_at: typeof data.updated_at === 'string' ? data.updated_at : createdAt,
    version: typeof data.version === 'number' ? data.version : 1
  };
}

export function encodeQuestion(question: Question): DocumentData {
  return {
    question_id: question.question_id,
    question_understanding: question.question_understanding,
    solving_strategy: question.solving_strategy,
    solution_steps: question.solution_steps,
    conversations: question.conversations,
    image_s3: question.image_s3,
    created_at: question.created_at,
    updated_at: question.updated_at,
    version: question.version
  };
}

export class FirestoreQuestionRepository implements QuestionRepository {
  private readonly collection: CollectionReference;

  constructor(
    private readonly db: Firestore,
    collectionName: string = DEFAULT_QUESTIONS_COLLECTION
  ) {
    this.collection = db.collection(collectionName);
  }

  async get(questionId: string): Promise<QuestionLookup> {
    try {
      const snapshot = await this.collection.doc(questionId).get();
      if (!snapshot.exists) {
        return { status: 'not_found' };
      }
      return { status: 'found', question: decodeQuestion(snapshot.data(), snapshot.id) };
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'reading question from Firestore');
    }
  }

  async save(question: Question, expectedVersion?: number): Promise<QuestionSaveResult> {
    const docRef = this.collection.doc(question.question_id);

    try {
      if (expectedVersion === undefined) {
        await docRef.set(encodeQuestion(question));
        return { status: 'saved', question };
      }

      const written = await this.db.runTransaction(async transaction => {
        const snapshot = await transaction.get(docRef);
        const storedVersion = snapshot.exists
          ? decodeQuestion(snapshot.data(), snapshot.id).version
          : 0;
        if (storedVersion !== expectedVersion) {
          return false;
        }
        transaction.set(docRef, encodeQuestion(question));
        return true;
      });

      return written ? { status: 'saved', question } : { status: 'conflict' };
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'saving question to Firestore');
    }
  }

  async scan(limit: number): Promise<Question[]> {
    try {
      const querySnapshot = await this.collection
        .orderBy('created_at', 'desc')
        .limit(limit)
        .get();

      return querySnapshot.docs.map(doc => decodeQuestion(doc.data(), doc.id));
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'listing questions from Firestore');
    }
  }

  async delete(questionId: string): Promise<QuestionDeleteResult> {
    const docRef = this.collection.doc(questionId);
    try {
      const snapshot = await docRef.get();
      if (!snapshot.exists) {
        return 'not_found';
      }
      await docRef.delete();
      return 'deleted';
    } catch (error) {
      throw ErrorHandler.toUpstreamError(error, 'deleting question from Firestore');
    }
  }
}
