// Response validation
// Errors are returned as a field -> message map, never thrown.

import type { CalculatorConfig, QuestionSpec } from '@/types/config';
import { QUICK_REQUIRED_FIELDS, type ResponseSet, type ResponseValue, type ValidationErrors } from '@/types/estimator';
import { getQuestion, getQuestionsForTier, shouldShowQuestion } from '@/lib/config/queries';

export interface ValidateOptions {
  /** Validate only these question ids, ignoring tier visibility */
  requiredOnly?: readonly string[];
}

/**
 * Check one present value against its question; null means valid
 */
export function checkResponseValue(question: QuestionSpec, value: ResponseValue): string | null {
  switch (question.type) {
    case 'number_input':
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        return 'Must be a positive number';
      }
      if (question.minValue !== undefined && value < question.minValue) {
        return `Must be at least ${question.minValue}`;
      }
      if (question.maxValue !== undefined && value > question.maxValue) {
        return `Must be at most ${question.maxValue}`;
      }
      return null;

    case 'selectbox':
    case 'radio':
      if (question.options && question.options.length > 0 && !question.options.some(option => option === value)) {
        return `Must be one of: ${question.options.join(', ')}`;
      }
      return null;

    case 'checkbox':
      return typeof value === 'boolean' ? null : 'Must be true or false';

    default:
      return null;
  }
}

function isPresent(responses: ResponseSet, questionId: string): boolean {
  return responses[questionId] !== undefined && responses[questionId] !== null;
}

/**
 * Validate responses for a tier.
 *
 * Every present answer to a tier question is type-checked. A missing answer is
 * an error only when the question is required and currently visible, so a
 * dependent question whose condition is unmet is never reported.
 */
export function validateResponses(
  responses: ResponseSet,
  config: CalculatorConfig,
  tier = 'advanced',
  options: ValidateOptions = {}
): ValidationErrors {
  const errors: ValidationErrors = {};
  const { requiredOnly } = options;

  const questionIds = requiredOnly
    ? requiredOnly.filter(id => getQuestion(config, id) !== undefined)
    : getQuestionsForTier(config, tier);

  for (const questionId of questionIds) {
    const question = getQuestion(config, questionId);
    if (!question) continue;

    if (isPresent(responses, questionId)) {
      const error = checkResponseValue(question, responses[questionId]);
      if (error) {
        errors[questionId] = error;
      }
      continue;
    }

    if (question.optional) continue;
    if (!requiredOnly && !shouldShowQuestion(config, questionId, responses)) continue;

    errors[questionId] = 'This field is required';
  }

  return errors;
}

/**
 * Validate the abbreviated entry flow: only the core fields are required
 */
export function validateQuickResponses(responses: ResponseSet, config: CalculatorConfig): ValidationErrors {
  return validateResponses(responses, config, 'advanced', { requiredOnly: QUICK_REQUIRED_FIELDS });
}
