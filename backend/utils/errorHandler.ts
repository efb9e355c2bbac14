/**
 * Classification of failures coming back from model and storage services
 */

import { isAppError, getErrorMessage, UpstreamServiceError } from './errors.js';

export interface ErrorInfo {
  isRateLimit: boolean;
  isAuthError: boolean;
  isContentFilter: boolean;
  isNetworkError: boolean;
  retryable: boolean;
  retryAfter?: number;
}

export class ErrorHandler {
  /**
   * Analyze error and return structured error information
   */
  static analyzeError(error: unknown): ErrorInfo {
    const message = getErrorMessage(error).toLowerCase();

    const isRateLimit = message.includes('429') ||
      message.includes('rate limit') ||
      message.includes('quota exceeded') ||
      message.includes('resource exhausted') ||
      message.includes('too many requests');

    const isAuthError = message.includes('401') ||
      message.includes('403') ||
      message.includes('unauthorized') ||
      message.includes('forbidden') ||
      message.includes('api key not valid');

    const isContentFilter = message.includes('safety') ||
      message.includes('content filter') ||
      message.includes('blocked');

    const isNetworkError = message.includes('network') ||
      message.includes('timeout') ||
      message.includes('connection') ||
      message.includes('econnreset') ||
      message.includes('fetch failed');

    const retryable = isRateLimit || isNetworkError;

    let retryAfter: number | undefined;
    const retryMatch = message.match(/retry.?after[:\s]+(\d+)/i);
    if (retryMatch) {
      retryAfter = parseInt(retryMatch[1], 10);
    }

    return {
      isRateLimit,
      isAuthError,
      isContentFilter,
      isNetworkError,
      retryable,
      retryAfter
    };
  }

  /**
   * Get appropriate log message for error type
   */
  static getLogMessage(error: unknown, context: string): string {
    const errorInfo = this.analyzeError(error);

    if (errorInfo.isRateLimit) {
      return `🔄 [429 DETECTED] Rate limit hit in ${context}`;
    } else if (errorInfo.isAuthError) {
      return `❌ [AUTH ERROR] Authentication failed in ${context}`;
    } else if (errorInfo.isContentFilter) {
      return `⚠️ [CONTENT FILTER] Content blocked in ${context}`;
    } else if (errorInfo.isNetworkError) {
      return `🌐 [NETWORK ERROR] Network issue in ${context}`;
    }
    return `❌ [ERROR] ${context} failed with unknown error`;
  }

  /**
   * Wrap a raw service failure into an UpstreamServiceError with a stable message.
   * Errors that are already part of the taxonomy pass through untouched.
   */
  static toUpstreamError(error: unknown, context: string): Error {
    if (isAppError(error)) {
      return error;
    }
    const info = this.analyzeError(error);
    console.error(this.getLogMessage(error, context), getErrorMessage(error));
    return new UpstreamServiceError(`Error ${context}: ${getErrorMessage(error)}`, {
      rateLimited: info.isRateLimit,
      authFailed: info.isAuthError,
      contentFiltered: info.isContentFilter,
      network: info.isNetworkError,
      retryable: info.retryable,
      ...(info.retryAfter !== undefined && { retryAfter: info.retryAfter })
    });
  }
}
