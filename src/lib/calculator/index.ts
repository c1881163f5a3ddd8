/**
 * DQ Service Calculator
 *
 * Call surface over one configuration snapshot: validation, quick
 * validation and computation. Hold a calculator for one request only;
 * after a configuration reload create a new one.
 */

import type { CalculatorConfig } from '@/types/config';
import type { EstimationResult, ResponseSet, ValidationErrors } from '@/types/estimator';
import { calculateWorkingDays } from './engine';
import { buildQuickResponses, calculateConfidence, explainCalculation } from './insights';
import { validateQuickResponses, validateResponses } from './validation';

export * from './engine';
export * from './insights';
export * from './resolve';
export * from './validation';

export interface Calculator {
  readonly config: CalculatorConfig;
  validate(responses: ResponseSet, tier?: string): ValidationErrors;
  validateQuick(responses: ResponseSet): ValidationErrors;
  compute(responses: ResponseSet): EstimationResult;
  explain(responses: ResponseSet, result: EstimationResult): string;
  confidence(responses: ResponseSet, result: EstimationResult): number;
  quickResponses(responses: ResponseSet): ResponseSet;
}

export function createCalculator(config: CalculatorConfig): Calculator {
  return {
    config,
    validate: (responses, tier = 'advanced') => validateResponses(responses, config, tier),
    validateQuick: responses => validateQuickResponses(responses, config),
    compute: responses => calculateWorkingDays(responses, config.calculationRules),
    explain: (responses, result) => explainCalculation(responses, result.breakdown, config.calculationRules),
    confidence: (responses, result) =>
      calculateConfidence(responses, result.totalDays, Object.keys(config.questions).length),
    quickResponses: responses => buildQuickResponses(responses, config.quickEstimateConfig),
  };
}
