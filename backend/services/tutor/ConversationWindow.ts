import { ValidationError } from '../../utils/errors.js';

export const USER_TAG = 'User: ';
export const ASSISTANT_TAG = 'Assistant: ';

/** Number of prior turns handed to the tutor as context. */
export const TUTOR_CONTEXT_LIMIT = 10;

/**
 * The most recent `limit` entries of a conversation log, in their original order.
 */
export function windowConversation(conversations: readonly string[], limit: number): string[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError(`Conversation window limit must be a non-negative integer, got ${limit}`);
  }
  // slice(-0) would return the whole log, so compute the start index explicitly
  return conversations.slice(Math.max(conversations.length - limit, 0));
}

export function tagUserTurn(text: string): string {
  return `${USER_TAG}${text}`;
}

export function tagAssistantTurn(text: string): string {
  return `${ASSISTANT_TAG}${text}`;
}

export function formatConversationContext(turns: readonly string[]): string {
  return turns.join('\n');
}
