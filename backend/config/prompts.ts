/**
 * Centralized AI Prompts Configuration
 *
 * All prompts used by the extraction, translation and tutoring services.
 * Long system prompts live in ./prompts; short user prompts are built inline.
 */

import analysisExtractionSystemPrompt from './prompts/analysis_extraction_system_prompt.js';
import translationSystemPrompt from './prompts/translation_system_prompt.js';
import stepExplanationSystemPrompt from './prompts/step_explanation_system_prompt.js';
import tutorSystemPrompt from './prompts/tutor_system_prompt.js';

type PromptTemplate = (...args: string[]) => string;

interface PromptTree {
  [key: string]: string | PromptTemplate | PromptTree;
}

export const AI_PROMPTS = {
  // ============================================================================
  // IMAGE ANALYSIS (SCHEMA-GUARDED EXTRACTION)
  // ============================================================================

  extraction: {
    system: (language: string) => analysisExtractionSystemPrompt(language),

    user: (language: string) => `Analyze this Thai text image. Apply thorough reasoning and respond with the structured JSON format in clear ${language}. Use LaTeX enclosed in $...$ for all mathematical expressions.`
  },

  // ============================================================================
  // STRUCTURED TRANSLATION
  // ============================================================================

  translation: {
    system: (targetLanguage: string) => translationSystemPrompt(targetLanguage),

    user: (targetLanguage: string, analysisJson: string) => `Translate this analysis into clear, natural ${targetLanguage}.

IMPORTANT RULES:
- Translate all natural-language text to ${targetLanguage}
- Keep the exact same JSON structure and field names
- For "solution_steps", keep the array format and the same number of steps
- Keep labels such as "Step 1:", "Step 2:" and "Conclusion:" verbatim at the beginning of each step
- Keep everything between $ signs (LaTeX) exactly as it is
- Make the text clear, natural, and educational

JSON to translate:
${analysisJson}

Return ONLY valid JSON.`
  },

  // ============================================================================
  // TUTORING
  // ============================================================================

  stepExplanation: {
    system: stepExplanationSystemPrompt,

    user: (
      understanding: string,
      strategy: string,
      stepNumber: string,
      totalSteps: string,
      stepContent: string,
      conversationContext: string
    ) => `Problem understanding:
${understanding}

Solving strategy:
${strategy}

This is step ${stepNumber} of ${totalSteps}:
${stepContent}
${conversationContext ? `\nRecent conversation:\n${conversationContext}\n` : ''}
Explain this step as the JSON object described.`
  },

  tutor: {
    system: tutorSystemPrompt,

    user: (
      understanding: string,
      strategy: string,
      enumeratedSteps: string,
      priorTurns: string,
      userText: string
    ) => `Problem understanding:
${understanding}

Solving strategy:
${strategy}

Solution steps:
${enumeratedSteps}

Recent conversation:
${priorTurns || '(no previous messages)'}

Student question: ${userText}`
  }
} satisfies PromptTree;

/**
 * Resolve a prompt by dotted path ('tutor.user') and apply template arguments.
 */
export function getPrompt(path: string, ...args: string[]): string {
  let node: string | PromptTemplate | PromptTree = AI_PROMPTS;

  for (const key of path.split('.')) {
    if (typeof node !== 'object' || !(key in node)) {
      throw new Error(`Prompt not found: ${path}`);
    }
    node = node[key];
  }

  if (typeof node === 'function') {
    return node(...args);
  }
  if (typeof node === 'string') {
    return node;
  }
  throw new Error(`Prompt path is not a leaf: ${path}`);
}

/**
 * Get all available prompt paths
 */
export function getPromptPaths(): string[] {
  const paths: string[] = [];

  function traverse(obj: PromptTree, prefix: string) {
    for (const key of Object.keys(obj)) {
      const currentPath = prefix ? `${prefix}.${key}` : key;
      const value = obj[key];
      if (typeof value === 'object') {
        traverse(value, currentPath);
      } else {
        paths.push(currentPath);
      }
    }
  }

  traverse(AI_PROMPTS, '');
  return paths;
}
