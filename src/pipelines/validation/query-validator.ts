import { InputValidationError } from '../../common/errors/query-cache.errors';

export const QUESTION_MIN_LENGTH = 3;
export const QUESTION_MAX_LENGTH = 1000;
export const TOP_K_MIN = 1;
export const TOP_K_MAX = 10;
export const DEFAULT_TOP_K = 5;

/**
 * Trim a question and check its length. Returns the trimmed text.
 */
export function validateQuestion(question: string): string {
  const trimmed = question.trim();

  if (trimmed.length < QUESTION_MIN_LENGTH) {
    throw new InputValidationError(
      `Question must be at least ${QUESTION_MIN_LENGTH} characters`,
      'question',
    );
  }
  if (trimmed.length > QUESTION_MAX_LENGTH) {
    throw new InputValidationError(
      `Question must be at most ${QUESTION_MAX_LENGTH} characters`,
      'question',
    );
  }

  return trimmed;
}

export function validateTopK(topK: number = DEFAULT_TOP_K): number {
  if (!Number.isInteger(topK) || topK < TOP_K_MIN || topK > TOP_K_MAX) {
    throw new InputValidationError(
      `topK must be an integer between ${TOP_K_MIN} and ${TOP_K_MAX}`,
      'topK',
    );
  }
  return topK;
}
