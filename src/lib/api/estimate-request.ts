/**
 * Estimate request handling shared by the estimate and export routes:
 * body schema, validation by mode, computation and the breakdown gate.
 */

import { z } from 'zod';
import type { CalculatorConfig, SecurityConfig } from '@/types/config';
import type { EstimationResult, ResponseSet, ValidationErrors } from '@/types/estimator';
import { createCalculator } from '@/lib/calculator';
import { resolvePricePerDay } from '@/lib/pricing';

const responseValueSchema = z.union([z.number(), z.string(), z.boolean()]);

export const estimateRequestSchema = z.object({
  responses: z.record(responseValueSchema).default({}),
  mode: z.enum(['full', 'quick']).default('full'),
  tier: z.string().default('advanced'),
  pricePerDay: z.number().optional(),
  teamSize: z.number().int().positive().default(1),
  breakdownPassword: z.string().optional(),
});

export type EstimateRequest = z.infer<typeof estimateRequestSchema>;

export type EstimateOutcome =
  | { status: 'invalid'; validationErrors: ValidationErrors }
  | { status: 'price_rejected'; error: string }
  | { status: 'ok'; responses: ResponseSet; result: EstimationResult; pricePerDay: number };

/**
 * Validate and compute one estimate against a configuration snapshot.
 * Quick mode fills unanswered questions from the configured defaults first.
 */
export function runEstimate(config: CalculatorConfig, request: EstimateRequest): EstimateOutcome {
  const calculator = createCalculator(config);
  const quick = request.mode === 'quick';

  const responses = quick ? calculator.quickResponses(request.responses) : request.responses;
  const validationErrors = quick ? calculator.validateQuick(responses) : calculator.validate(responses, request.tier);
  if (Object.keys(validationErrors).length > 0) {
    return { status: 'invalid', validationErrors };
  }

  const price = resolvePricePerDay(config.pricingConfig, request.pricePerDay);
  if (!price.ok) {
    return { status: 'price_rejected', error: price.error };
  }

  return { status: 'ok', responses, result: calculator.compute(responses), pricePerDay: price.pricePerDay };
}

/**
 * Whether a caller may see the per-component breakdown
 */
export function canViewBreakdown(security: SecurityConfig, password?: string): boolean {
  if (!security.passwordRequired) {
    return true;
  }
  return password !== undefined && password === security.breakdownPassword;
}
