import { TierInputMap, TierName } from '../cache/tiers/tier.types';
import { InputValidationError } from '../common/errors/query-cache.errors';
import { validateTopK } from '../pipelines/validation/query-validator';

export type TierRequest = { [K in TierName]: { tier: K; input: TierInputMap[K] } }[TierName];

/**
 * Check a raw lookup or store input against what the tier is keyed on
 */
export function toTierRequest(tier: TierName, input: unknown): TierRequest {
  if (tier === 'ans') {
    if (input === null || typeof input !== 'object' || Array.isArray(input)) {
      throw new InputValidationError('ans input must be an object with question and topK', 'input');
    }

    const question: unknown = Reflect.get(input, 'question');
    const topK: unknown = Reflect.get(input, 'topK');

    if (typeof question !== 'string' || question.trim().length === 0) {
      throw new InputValidationError('ans input needs a non-empty question', 'input.question');
    }
    if (typeof topK !== 'number') {
      throw new InputValidationError('ans input needs a numeric topK', 'input.topK');
    }

    return { tier, input: { question, topK: validateTopK(topK) } };
  }

  if (typeof input !== 'string' || input.length === 0) {
    throw new InputValidationError(`${tier} input must be a non-empty string`, 'input');
  }
  return { tier, input };
}
