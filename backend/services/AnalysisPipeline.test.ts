/**
 * End-to-end tests: image submission, step explanations and follow-up questions
 */

import sharp from 'sharp';
import { AnalysisPipeline } from './AnalysisPipeline.js';
import { SchemaGuardedExtractor } from './ai/SchemaGuardedExtractor.js';
import { StructuredTranslator } from './ai/StructuredTranslator.js';
import { StepExplainer } from './tutor/StepExplainer.js';
import { TutorQAEngine } from './tutor/TutorQAEngine.js';
import { QuestionStore } from './QuestionStore.js';
import { QuestionService } from './questionService.js';
import { InMemoryQuestionRepository } from './inMemoryQuestionRepository.js';
import { InMemoryImageStorage } from './imageStorageService.js';
import { MalformedResponseError, ValidationError } from '../utils/errors.js';
import { fakeLlm } from '../tests/fakes.js';
import type { ProgressData } from '../utils/progressTracker.js';

const SCENARIO_OUTPUT = '{"question_understanding":"U","solving_strategy":"S","solution_steps":["Step 1: a","Step 2: b"]}';

describe('AnalysisPipeline', () => {
  let image: Buffer;

  const build = (...replies: Array<string | Error>) => {
    const llm = fakeLlm(...replies);
    const repository = new InMemoryQuestionRepository();
    const storage = new InMemoryImageStorage();
    const store = new QuestionStore(repository);
    const questions = new QuestionService({
      store,
      storage,
      stepExplainer: new StepExplainer({ llm, model: 'gemini-2.0-flash' }),
      tutor: new TutorQAEngine({ llm, model: 'gemini-2.0-flash', store })
    });
    const progress: ProgressData[] = [];
    const pipeline = new AnalysisPipeline({
      extractor: new SchemaGuardedExtractor({ llm, model: 'gemini-2.0-flash' }),
      translator: new StructuredTranslator({ llm, model: 'openai-gpt-4o' }),
      storage,
      questions,
      onProgress: data => progress.push(data)
    });
    return { llm, repository, storage, questions, pipeline, progress };
  };

  beforeAll(async () => {
    image = await sharp({
      create: { width: 32, height: 24, channels: 3, background: { r: 255, g: 255, b: 255 } }
    }).png().toBuffer();
  });

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('scenario: English target', () => {
    it('should persist the extracted analysis without translating', async () => {
      const { llm, storage, pipeline, progress } = build(SCENARIO_OUTPUT);

      const result = await pipeline.submitImage(image, 'english', { contentType: 'image/png', filename: 'page.png' });

      expect(result.translation).toBe('skipped');
      expect(result.stages).toEqual(['image_prepared', 'extracted', 'translation_skipped_or_failed', 'persisted']);
      expect(result.question.solution_steps).toEqual(['Step 1: a', 'Step 2: b']);
      expect(result.question.conversations).toEqual([]);
      expect(result.question.version).toBe(1);
      expect(result.question.image_s3).toMatch(/^gs:\/\/local-bucket\/question-images\/.+\.jpg$/);
      expect(llm.generate).toHaveBeenCalledTimes(1);
      expect(llm.generate.mock.calls[0][0].userPrompt).toContain('in clear english');
      expect(storage.size).toBe(1);
      expect(progress[progress.length - 1]).toMatchObject({ isComplete: true });
    });

    it('should reject step 3 of a two-step question before calling the model', async () => {
      const { llm, pipeline, questions } = build(SCENARIO_OUTPUT);
      const { question } = await pipeline.submitImage(image, 'english');

      const error = await questions.explainStep(question.question_id, 3).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ details: { min: 1, max: 2 } });
      expect(llm.generate).toHaveBeenCalledTimes(1);
    });

    it('should record a follow-up exchange', async () => {
      const { pipeline, questions } = build(SCENARIO_OUTPUT, 'It sets up the given values.');
      const { question } = await pipeline.submitImage(image, 'english');

      const exchange = await questions.askAboutQuestion(question.question_id, 'What is step 1?');

      expect(exchange.question.conversations).toEqual([
        'User: What is step 1?',
        'Assistant: It sets up the given values.'
      ]);
      await expect(questions.getQuestion(question.question_id)).resolves.toMatchObject({
        conversations: ['User: What is step 1?', 'Assistant: It sets up the given values.']
      });
    });
  });

  describe('translation', () => {
    const thaiOutput = '{"question_understanding":"เข้าใจ","solving_strategy":"กลยุทธ์","solution_steps":["Step 1: ก","Step 2: ข"]}';

    it('should persist the translated analysis', async () => {
      const { llm, pipeline } = build(SCENARIO_OUTPUT, thaiOutput);

      const result = await pipeline.submitImage(image, 'Thai');

      expect(result.translation).toBe('translated');
      expect(result.stages).toEqual(['image_prepared', 'extracted', 'translated', 'persisted']);
      expect(result.question).toMatchObject({
        question_understanding: 'เข้าใจ',
        solving_strategy: 'กลยุทธ์',
        solution_steps: ['Step 1: ก', 'Step 2: ข']
      });
      expect(llm.generate.mock.calls[1][0].model).toBe('openai-gpt-4o');
    });

    it('should persist the original analysis when translation fails', async () => {
      const { pipeline } = build(SCENARIO_OUTPUT, new Error('fetch failed'));

      const result = await pipeline.submitImage(image, 'thai');

      expect(result.translation).toBe('fell_back');
      expect(result.stages).toEqual(['image_prepared', 'extracted', 'translation_skipped_or_failed', 'persisted']);
      expect(result.question).toMatchObject({ question_understanding: 'U', solving_strategy: 'S' });
    });

    it('should keep the original analysis when a translated step comes back blank', async () => {
      const unlabeled = '{"question_understanding":"U","solving_strategy":"S","solution_steps":["a","b"]}';
      const blankStep = '{"question_understanding":"เข้าใจ","solving_strategy":"กลยุทธ์","solution_steps":["ค",""]}';
      const { repository, pipeline } = build(unlabeled, blankStep);

      const result = await pipeline.submitImage(image, 'thai');

      expect(result.translation).toBe('fell_back');
      expect(result.question.solution_steps).toEqual(['a', 'b']);
      const stored = await repository.get(result.question.question_id);
      expect(stored).toMatchObject({ status: 'found', question: { solution_steps: ['a', 'b'] } });
    });
  });

  describe('failures', () => {
    it('should report a blank extracted step as a malformed response', async () => {
      const { storage, pipeline } = build('{"question_understanding":"U","solving_strategy":"S","solution_steps":["Step 1: a",""]}');

      await expect(pipeline.submitImage(image, 'english')).rejects.toBeInstanceOf(MalformedResponseError);
      expect(storage.size).toBe(0);
    });

    it('should reject an unsupported language before any work', async () => {
      const { llm, storage, pipeline } = build(SCENARIO_OUTPUT);

      await expect(pipeline.submitImage(image, 'french')).rejects.toBeInstanceOf(ValidationError);
      expect(llm.generate).not.toHaveBeenCalled();
      expect(storage.size).toBe(0);
    });

    it('should store nothing when extraction output is malformed', async () => {
      const { repository, storage, pipeline } = build('{"question_understanding":"U","solving_strategy":"S","solution_steps":[]}');

      await expect(pipeline.submitImage(image, 'english')).rejects.toBeInstanceOf(MalformedResponseError);
      expect(storage.size).toBe(0);
      await expect(repository.scan(100)).resolves.toEqual([]);
    });

    it('should reject an unreadable image before calling the model', async () => {
      const { llm, pipeline } = build(SCENARIO_OUTPUT);

      await expect(pipeline.submitImage(Buffer.from('not an image'), 'english')).rejects.toBeInstanceOf(ValidationError);
      expect(llm.generate).not.toHaveBeenCalled();
    });

    it('should remove the uploaded image when the record cannot be saved', async () => {
      const { repository, storage, pipeline } = build(SCENARIO_OUTPUT);
      jest.spyOn(repository, 'save').mockRejectedValueOnce(new Error('write failed'));

      await expect(pipeline.submitImage(image, 'english')).rejects.toThrow('write failed');
      expect(storage.size).toBe(0);
    });
  });
});
