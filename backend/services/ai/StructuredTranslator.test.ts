import { StructuredTranslator, readStepLabel, restoreStepLabels } from './StructuredTranslator.js';
import { UpstreamServiceError } from '../../utils/errors.js';
import { fakeLlm } from '../../tests/fakes.js';
import type { Analysis } from '../../types/index.js';

describe('StructuredTranslator', () => {
  const original: Analysis = {
    question_understanding: 'Find the total.',
    solving_strategy: 'Add the numbers.',
    solution_steps: ['Step 1: Add $2 + 3$.', 'Conclusion: The total is $5$.']
  };

  const thai: Analysis = {
    question_understanding: 'หาผลรวม',
    solving_strategy: 'บวกตัวเลข',
    solution_steps: ['Step 1: บวก $2 + 3$', 'Conclusion: ผลรวมคือ $5$']
  };

  const translatorWith = (...replies: Array<string | Error>) => {
    const llm = fakeLlm(...replies);
    return { llm, translator: new StructuredTranslator({ llm, model: 'openai-gpt-4o' }) };
  };

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the translated analysis', async () => {
    const { llm, translator } = translatorWith(JSON.stringify(thai));

    await expect(translator.translate(original, 'thai')).resolves.toEqual({ status: 'translated', analysis: thai });
    const request = llm.generate.mock.calls[0][0];
    expect(request.model).toBe('openai-gpt-4o');
    expect(request.responseFormat).toBe('json');
    expect(request.userPrompt).toContain(JSON.stringify(original, null, 2));
  });

  it('should restore step labels the model dropped', async () => {
    const unlabeled = { ...thai, solution_steps: ['บวก $2 + 3$', 'ผลรวมคือ $5$'] };
    const { translator } = translatorWith(JSON.stringify(unlabeled));

    const outcome = await translator.translate(original, 'thai');

    expect(outcome.analysis.solution_steps).toEqual(['Step 1: บวก $2 + 3$', 'Conclusion: ผลรวมคือ $5$']);
  });

  it('should take JSON escapes at face value when the output is valid JSON', async () => {
    const multiline = { ...thai, question_understanding: 'บรรทัด 1\nบรรทัด 2' };
    const { translator } = translatorWith(JSON.stringify(multiline));

    const outcome = await translator.translate(original, 'thai');

    expect(outcome.analysis.question_understanding).toBe('บรรทัด 1\nบรรทัด 2');
  });

  it('should return the exact input object when the model fails', async () => {
    const { translator } = translatorWith(new UpstreamServiceError('Error calling openai-gpt-4o (translation): fetch failed'));

    const outcome = await translator.translate(original, 'thai');

    expect(outcome).toEqual({
      status: 'fell_back',
      analysis: original,
      reason: 'Error calling openai-gpt-4o (translation): fetch failed'
    });
    expect(outcome.analysis).toBe(original);
  });

  it('should fall back when the step count changes', async () => {
    const { translator } = translatorWith(JSON.stringify({ ...thai, solution_steps: ['Step 1: ทั้งหมด'] }));

    const outcome = await translator.translate(original, 'thai');

    expect(outcome).toEqual({
      status: 'fell_back',
      analysis: original,
      reason: 'Translated step count 1 does not match original 2'
    });
  });

  it('should fall back when the output is not JSON', async () => {
    const { translator } = translatorWith('ขออภัย ไม่สามารถแปลได้');

    const outcome = await translator.translate(original, 'thai');

    expect(outcome.status).toBe('fell_back');
    expect(outcome.analysis).toBe(original);
  });

  it('should fall back when a field is missing', async () => {
    const { translator } = translatorWith(JSON.stringify({ question_understanding: 'หาผลรวม', solution_steps: thai.solution_steps }));

    await expect(translator.translate(original, 'thai')).resolves.toEqual({
      status: 'fell_back',
      analysis: original,
      reason: 'LLM response is missing required field: solving_strategy'
    });
  });

  describe('step labels', () => {
    it('should read Step N and Conclusion labels', () => {
      expect(readStepLabel('Step 12: x')).toBe('Step 12:');
      expect(readStepLabel('Conclusion: done')).toBe('Conclusion:');
      expect(readStepLabel('just text')).toBeNull();
    });

    it('should leave steps alone when the source had no label', () => {
      expect(restoreStepLabels(['add the numbers'], ['บวกตัวเลข'])).toEqual(['บวกตัวเลข']);
    });

    it('should trim leading space before prefixing', () => {
      expect(restoreStepLabels(['Step 1: a'], ['  ก'])).toEqual(['Step 1: ก']);
    });
  });
});
