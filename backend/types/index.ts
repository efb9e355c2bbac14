/**
 * Shared type definitions for the analysis and tutoring backend
 */

// ============================================================================
// AI MODEL TYPES
// ============================================================================

export type ModelType = 'gemini-2.0-flash' | 'gemini-2.5-flash' | 'openai-gpt-4o' | 'openai-gpt-4o-mini';

export type ModelPhase = 'extraction' | 'translation' | 'stepExplanation' | 'tutorChat' | 'other';

export interface AIModelConfig {
  name: string;
  apiEndpoint: string;
  maxTokens: number;
  temperature: number;
}

export type ResponseFormat = 'json' | 'text';

export interface LLMRequest {
  systemPrompt: string;
  userPrompt: string;
  model: ModelType;
  imageBase64?: string; // raw base64 or data URL, JPEG
  responseFormat?: ResponseFormat;
  temperature?: number;
  maxTokens?: number;
  phase?: ModelPhase;
}

export interface LLMResponse {
  content: string;
  usageTokens: number;
  inputTokens: number;
  outputTokens: number;
  modelName: string;
}

/**
 * The single seam every component uses to talk to a model.
 * ModelProvider is the production implementation; tests pass jest.fn() clients.
 */
export interface LLMClient {
  generate(request: LLMRequest): Promise<LLMResponse>;
}

// ============================================================================
// ANALYSIS & QUESTION TYPES
// ============================================================================

export interface Analysis {
  question_understanding: string;
  solving_strategy: string;
  solution_steps: string[];
}

export interface Question extends Analysis {
  question_id: string;
  conversations: string[];
  image_s3: string;
  created_at: string;
  updated_at: string;
  version: number;
}

export interface QuestionCreate extends Analysis {
  image_s3: string;
  conversations?: string[];
}

export interface QuestionUpdate {
  question_understanding?: string;
  solving_strategy?: string;
  solution_steps?: string[];
  conversations?: string[];
  image_s3?: string;
}

export interface Explanation {
  step: number;
  step_content: string;
  why_this_way: string;
  key_concepts: string;
}

export type ExplanationParsing = 'parsed' | 'fallback_heuristic';

export interface ExplanationOutcome {
  explanation: Explanation;
  parsing: ExplanationParsing;
}

export type TranslationOutcome =
  | { status: 'translated'; analysis: Analysis }
  | { status: 'fell_back'; analysis: Analysis; reason: string };

export interface TutorExchange {
  user_message: string;
  ai_response: string;
  question: Question;
}

// ============================================================================
// RECORD STORE TYPES
// ============================================================================

export type QuestionLookup =
  | { status: 'found'; question: Question }
  | { status: 'not_found' };

export type QuestionSaveResult =
  | { status: 'saved'; question: Question }
  | { status: 'conflict' };

export type QuestionDeleteResult = 'deleted' | 'not_found';

export interface QuestionRepository {
  get(questionId: string): Promise<QuestionLookup>;
  /**
   * Writes the question. With `expectedVersion` the write only happens when the
   * stored version matches (0 means "must not exist yet").
   */
  save(question: Question, expectedVersion?: number): Promise<QuestionSaveResult>;
  scan(limit: number): Promise<Question[]>;
  delete(questionId: string): Promise<QuestionDeleteResult>;
}

// ============================================================================
// IMAGE TYPES
// ============================================================================

export interface PreparedImage {
  buffer: Buffer;
  base64: string;
  mimeType: 'image/jpeg';
  width: number;
  height: number;
}

export interface UploadOptions {
  contentType?: string;
  filename?: string;
  originalContentType?: string; // type of the upload before re-encoding
}

export interface ImageStorage {
  upload(data: Buffer, options?: UploadOptions): Promise<string>;
  download(reference: string): Promise<Buffer>;
  delete(reference: string): Promise<void>;
  getSignedUrl(reference: string, expiresInSeconds?: number): Promise<string>;
}

// ============================================================================
// PIPELINE TYPES
// ============================================================================

export type PipelineStage =
  | 'image_prepared'
  | 'extracted'
  | 'translated'
  | 'translation_skipped_or_failed'
  | 'persisted';

export type TranslationStatus = 'translated' | 'skipped' | 'fell_back';

export interface PipelineResult {
  question: Question;
  translation: TranslationStatus;
  stages: PipelineStage[];
}

export interface SubmitImageOptions {
  contentType?: string;
  filename?: string;
}
