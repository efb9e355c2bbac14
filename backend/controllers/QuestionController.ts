import type { NextFunction, Request, Response } from 'express';
import type { QuestionService } from '../services/questionService.js';
import { parseListLimit, parseQuestionCreate, parseQuestionUpdate } from '../services/questionService.js';
import { isRecord } from '../services/ai/JsonUtils.js';
import { ValidationError } from '../utils/errors.js';

function readMessage(body: unknown): string {
  if (!isRecord(body) || typeof body.message !== 'string') {
    throw new ValidationError('message must be a string', { field: 'message' });
  }
  return body.message;
}

function parseStepNumber(raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new ValidationError(`Step number must be an integer, got ${raw}`);
  }
  return Number(raw);
}

/**
 * HTTP handlers for question CRUD and tutoring.
 * Errors are forwarded to the Express error middleware.
 */
export class QuestionController {
  constructor(private readonly questions: QuestionService) {}

  createQuestion = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const question = await this.questions.createQuestion(parseQuestionCreate(req.body));
      res.status(201).json(question);
    } catch (error) {
      next(error);
    }
  };

  listQuestions = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const limit = parseListLimit(req.query.limit);
      res.json(await this.questions.listQuestions(limit));
    } catch (error) {
      next(error);
    }
  };

  getQuestion = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.questions.getQuestion(req.params.id));
    } catch (error) {
      next(error);
    }
  };

  updateQuestion = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.questions.updateQuestion(req.params.id, parseQuestionUpdate(req.body)));
    } catch (error) {
      next(error);
    }
  };

  deleteQuestion = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.questions.deleteQuestion(req.params.id));
    } catch (error) {
      next(error);
    }
  };

  appendConversation = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const message = readMessage(req.body);
      res.json(await this.questions.appendConversation(req.params.id, message));
    } catch (error) {
      next(error);
    }
  };

  explainStep = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const stepNumber = parseStepNumber(req.params.stepNumber);
      const outcome = await this.questions.explainStep(req.params.id, stepNumber);
      res.json(outcome);
    } catch (error) {
      next(error);
    }
  };

  askQuestion = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const message = readMessage(req.body);
      const exchange = await this.questions.askAboutQuestion(req.params.id, message);
      res.json({ user_message: exchange.user_message, ai_response: exchange.ai_response });
    } catch (error) {
      next(error);
    }
  };

  getImageUrl = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(await this.questions.getImageUrl(req.params.id));
    } catch (error) {
      next(error);
    }
  };
}
