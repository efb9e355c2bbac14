/**
 * Analysis Pipeline
 *
 * Image upload -> prepared JPEG -> extracted analysis -> optional translation -> stored question.
 * Stages run strictly in sequence; a failure before persistence leaves nothing behind.
 */

import type {
  Analysis,
  ImageStorage,
  PipelineResult,
  Question,
  SubmitImageOptions,
  TranslationStatus
} from '../types/index.js';
import { EXTRACTION_LANGUAGE, normalizeLanguage } from '../config/languages.js';
import { IMAGE_STORAGE_CONFIG, type ImageStorageConfig } from '../config/imageStorage.js';
import { ImageUtils } from '../utils/ImageUtils.js';
import { ProgressTracker, type ProgressData } from '../utils/progressTracker.js';
import { getErrorMessage } from '../utils/errors.js';
import type { SchemaGuardedExtractor } from './ai/SchemaGuardedExtractor.js';
import type { StructuredTranslator } from './ai/StructuredTranslator.js';
import type { QuestionService } from './questionService.js';

export interface AnalysisPipelineDeps {
  extractor: SchemaGuardedExtractor;
  translator: StructuredTranslator;
  storage: ImageStorage;
  questions: QuestionService;
  imageConfig?: ImageStorageConfig;
  onProgress?: (data: ProgressData) => void;
}

export class AnalysisPipeline {
  constructor(private readonly deps: AnalysisPipelineDeps) {}

  async submitImage(
    imageBytes: Buffer,
    targetLanguage: string,
    options: SubmitImageOptions = {}
  ): Promise<PipelineResult> {
    const language = normalizeLanguage(targetLanguage);
    const tracker = new ProgressTracker(undefined, this.deps.onProgress);

    const prepared = await ImageUtils.prepareImage(imageBytes, this.deps.imageConfig ?? IMAGE_STORAGE_CONFIG);
    tracker.complete('image_prepared');

    const extracted = await this.deps.extractor.extract(prepared.base64, EXTRACTION_LANGUAGE);
    tracker.complete('extracted');

    let analysis: Analysis = extracted;
    let translation: TranslationStatus;
    if (language === EXTRACTION_LANGUAGE) {
      translation = 'skipped';
      tracker.complete('translation_skipped_or_failed');
    } else {
      const outcome = await this.deps.translator.translate(extracted, language);
      analysis = outcome.analysis;
      if (outcome.status === 'translated') {
        translation = 'translated';
        tracker.complete('translated');
      } else {
        translation = 'fell_back';
        tracker.complete('translation_skipped_or_failed');
      }
    }

    const reference = await this.deps.storage.upload(prepared.buffer, {
      contentType: prepared.mimeType,
      filename: options.filename,
      originalContentType: options.contentType
    });

    let question: Question;
    try {
      question = await this.deps.questions.createQuestion({ ...analysis, image_s3: reference });
    } catch (error) {
      await this.discardUpload(reference);
      throw error;
    }
    tracker.complete('persisted');

    console.log(`✅ [PIPELINE] Question ${question.question_id} stored (translation: ${translation})`);
    return { question, translation, stages: tracker.getStages() };
  }

  private async discardUpload(reference: string): Promise<void> {
    try {
      await this.deps.storage.delete(reference);
      console.warn(`⚠️ [PIPELINE] Removed orphaned image ${reference}`);
    } catch (cleanupError) {
      console.error(`❌ [PIPELINE] Failed to remove orphaned image ${reference}:`, getErrorMessage(cleanupError));
    }
  }
}
