import { ValidationError } from '../utils/errors.js';

export const SUPPORTED_LANGUAGES = ['english', 'thai'] as const;

export type SupportedLanguage = typeof SUPPORTED_LANGUAGES[number];

/** Language the extraction prompt always runs in. */
export const EXTRACTION_LANGUAGE: SupportedLanguage = 'english';

export function isSupportedLanguage(value: string): value is SupportedLanguage {
  return SUPPORTED_LANGUAGES.some(language => language === value);
}

/**
 * Case-insensitive lookup of a supported language name.
 * @throws ValidationError for anything else
 */
export function normalizeLanguage(value: string): SupportedLanguage {
  const candidate = value.trim().toLowerCase();
  if (!isSupportedLanguage(candidate)) {
    throw new ValidationError(
      `Unsupported language: ${value}`,
      { supported: [...SUPPORTED_LANGUAGES] }
    );
  }
  return candidate;
}
