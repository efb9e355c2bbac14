/**
 * In-process stand-ins shared by the Jest suites
 */

import type { LLMRequest, LLMResponse, Question } from '../types/index.js';

export function llmResponse(content: string): LLMResponse {
  return { content, usageTokens: 0, inputTokens: 0, outputTokens: 0, modelName: 'gemini-2.0-flash' };
}

/**
 * LLM client that answers with the given replies in order; an Error reply rejects.
 */
export function fakeLlm(...replies: Array<string | Error>) {
  const generate = jest.fn<Promise<LLMResponse>, [LLMRequest]>();
  for (const reply of replies) {
    if (reply instanceof Error) {
      generate.mockRejectedValueOnce(reply);
    } else {
      generate.mockResolvedValueOnce(llmResponse(reply));
    }
  }
  return { generate };
}

export function sampleQuestion(overrides: Partial<Question> = {}): Question {
  return {
    question_id: 'q_0a1b2c3d_1714557600',
    question_understanding: 'U',
    solving_strategy: 'S',
    solution_steps: ['Step 1: a', 'Step 2: b'],
    conversations: [],
    image_s3: 'gs://local-bucket/question-images/sample.jpg',
    created_at: '2024-05-01T10:00:00.000Z',
    updated_at: '2024-05-01T10:00:00.000Z',
    version: 1,
    ...overrides
  };
}
