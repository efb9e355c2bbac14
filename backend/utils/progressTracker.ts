/**
 * Progress Tracker Utility
 * Records the analysis pipeline stages in the order they are reached
 */

import type { PipelineStage } from '../types/index.js';

export interface StepConfig {
  id: PipelineStage;
  name: string;
  description: string;
}

export interface ProgressData {
  currentStepDescription: string; // Description of the stage just reached
  completedStages: PipelineStage[];
  isComplete: boolean;            // Whether the final stage was reached
}

export const PIPELINE_STEPS: StepConfig[] = [
  {
    id: 'image_prepared',
    name: 'Image Prepared',
    description: 'Preparing image...'
  },
  {
    id: 'extracted',
    name: 'Extracted',
    description: 'Analyzing image...'
  },
  {
    id: 'translated',
    name: 'Translated',
    description: 'Translating analysis...'
  },
  {
    id: 'translation_skipped_or_failed',
    name: 'Translation Skipped',
    description: 'Keeping original analysis...'
  },
  {
    id: 'persisted',
    name: 'Persisted',
    description: 'Saving question...'
  }
];

// Stages that share a position: exactly one of them is reached
const STAGE_ORDER: Record<PipelineStage, number> = {
  image_prepared: 0,
  extracted: 1,
  translated: 2,
  translation_skipped_or_failed: 2,
  persisted: 3
};

export class ProgressTracker {
  private readonly completed: PipelineStage[] = [];

  constructor(
    private readonly steps: StepConfig[] = PIPELINE_STEPS,
    private readonly onProgress?: (data: ProgressData) => void
  ) {}

  /**
   * Mark a stage as reached. Stages must arrive in pipeline order, one per position.
   */
  complete(stage: PipelineStage): void {
    const expectedPosition = this.completed.length;
    if (STAGE_ORDER[stage] !== expectedPosition) {
      throw new Error(`Stage ${stage} reached out of order after [${this.completed.join(', ')}]`);
    }
    this.completed.push(stage);
    this.updateProgress(stage);
  }

  getStages(): PipelineStage[] {
    return [...this.completed];
  }

  getCurrentStepId(): PipelineStage | 'not_started' {
    return this.completed[this.completed.length - 1] ?? 'not_started';
  }

  private updateProgress(stage: PipelineStage): void {
    const step = this.steps.find(candidate => candidate.id === stage);
    const isComplete = stage === 'persisted';
    const progressData: ProgressData = {
      currentStepDescription: step?.description ?? stage,
      completedStages: this.getStages(),
      isComplete
    };

    console.log(`🔄 [PIPELINE] ${step?.name ?? stage}${isComplete ? ' (complete)' : ''}`);
    this.onProgress?.(progressData);
  }
}
