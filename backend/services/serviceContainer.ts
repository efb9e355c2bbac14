/**
 * Service Container
 * Composition root: builds every service from the application config
 */

import type { ImageStorage, LLMClient, QuestionRepository } from '../types/index.js';
import type { AppConfig } from '../config/appConfig.js';
import { initializeFirebase } from '../config/firebase.js';
import { IMAGE_STORAGE_CONFIG } from '../config/imageStorage.js';
import { ModelProvider } from '../utils/ModelProvider.js';
import { ConfigurationError } from '../utils/errors.js';
import { SchemaGuardedExtractor } from './ai/SchemaGuardedExtractor.js';
import { StructuredTranslator } from './ai/StructuredTranslator.js';
import { StepExplainer } from './tutor/StepExplainer.js';
import { TutorQAEngine } from './tutor/TutorQAEngine.js';
import { QuestionStore } from './QuestionStore.js';
import { QuestionService } from './questionService.js';
import { AnalysisPipeline } from './AnalysisPipeline.js';
import { FirestoreQuestionRepository } from './firestoreService.js';
import { InMemoryQuestionRepository } from './inMemoryQuestionRepository.js';
import { FirebaseImageStorage, InMemoryImageStorage } from './imageStorageService.js';

export interface ServiceContainer {
  config: AppConfig;
  questions: QuestionService;
  pipeline: AnalysisPipeline;
}

export interface ServiceOverrides {
  llm?: LLMClient;
  repository?: QuestionRepository;
  storage?: ImageStorage;
}

function createBackends(config: AppConfig): { repository: QuestionRepository; storage: ImageStorage } {
  if (config.questionStore === 'memory') {
    console.warn('⚠️ [SERVICES] Using in-memory question store and image storage - data is lost on restart');
    return {
      repository: new InMemoryQuestionRepository(),
      storage: new InMemoryImageStorage(config.firebase.storageBucket)
    };
  }

  const { storageBucket, serviceAccountPath } = config.firebase;
  if (!storageBucket) {
    throw new ConfigurationError('FIREBASE_STORAGE_BUCKET not configured in environment');
  }
  const firebase = initializeFirebase({ serviceAccountPath, storageBucket });
  return {
    repository: new FirestoreQuestionRepository(firebase.firestore, config.firebase.questionsCollection),
    storage: new FirebaseImageStorage(firebase.bucket, IMAGE_STORAGE_CONFIG)
  };
}

export function createServiceContainer(config: AppConfig, overrides: ServiceOverrides = {}): ServiceContainer {
  const llm = overrides.llm ?? new ModelProvider({
    geminiApiKey: config.geminiApiKey,
    openaiApiKey: config.openaiApiKey
  });

  const backends = overrides.repository && overrides.storage
    ? { repository: overrides.repository, storage: overrides.storage }
    : createBackends(config);
  const repository = overrides.repository ?? backends.repository;
  const storage = overrides.storage ?? backends.storage;

  const store = new QuestionStore(repository);
  const questions = new QuestionService({
    store,
    storage,
    stepExplainer: new StepExplainer({ llm, model: config.models.tutor }),
    tutor: new TutorQAEngine({ llm, model: config.models.tutor, store })
  });

  const pipeline = new AnalysisPipeline({
    extractor: new SchemaGuardedExtractor({ llm, model: config.models.extraction }),
    translator: new StructuredTranslator({ llm, model: config.models.translation }),
    storage,
    questions,
    imageConfig: IMAGE_STORAGE_CONFIG
  });

  console.log(`✅ [SERVICES] Ready (store: ${config.questionStore}, extraction: ${config.models.extraction})`);
  return { config, questions, pipeline };
}
