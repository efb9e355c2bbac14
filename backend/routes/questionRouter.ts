/**
 * Question Router
 * CRUD over stored questions plus step explanations and follow-up questions
 */

import express from 'express';
import { QuestionController } from '../controllers/QuestionController.js';
import type { QuestionService } from '../services/questionService.js';

export function createQuestionRouter(questions: QuestionService): express.Router {
  const router = express.Router();
  const controller = new QuestionController(questions);

  router.post('/', controller.createQuestion);
  router.get('/', controller.listQuestions);
  router.get('/:id', controller.getQuestion);
  router.put('/:id', controller.updateQuestion);
  router.delete('/:id', controller.deleteQuestion);

  /**
   * POST /questions/:id/conversation
   * Appends { message } to the conversation log verbatim
   */
  router.post('/:id/conversation', controller.appendConversation);

  /**
   * POST /questions/:id/steps/:stepNumber/explain
   * Explains one solution step (1-indexed); nothing is stored
   */
  router.post('/:id/steps/:stepNumber/explain', controller.explainStep);

  /**
   * POST /questions/:id/ask
   * Short tutor answer; both turns are appended to the conversation
   */
  router.post('/:id/ask', controller.askQuestion);

  router.get('/:id/image-url', controller.getImageUrl);

  return router;
}
