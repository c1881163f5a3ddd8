import path from 'node:path';
import type { CalculationRules, CalculatorConfig } from '@/types/config';
import type { ResponseSet } from '@/types/estimator';
import { ConfigLoader } from '@/lib/config/loader';

export const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'config', 'calculator.yaml');

export function loadDefaultConfig(): CalculatorConfig {
  return new ConfigLoader(DEFAULT_CONFIG_PATH).load();
}

export const SCENARIO_RESPONSES: ResponseSet = {
  tables_count: 3,
  workflow_complexity: 'Complex (multiple tables/joins)',
  data_sources: 'Complex integration (4+ sources)',
  existing_rules: 'Not documented',
  commercial_tool: 'No commercial tool',
  governance_maturity: false,
};

/**
 * Rule set with empty tables, so every lookup falls back to its default
 */
export function makeRules(overrides: Partial<CalculationRules> = {}): CalculationRules {
  return {
    baseServiceDays: 9,
    minimumProjectDays: 5,
    workflowMultipliers: {},
    integrationComplexity: {},
    integrationComplexityLegacy: {},
    dataVolumeMultipliers: {},
    rulesOverhead: { baseRulesIncluded: 20, additionalRulesPer5: 0.5 },
    existingRulesImpact: {},
    toolSetup: {},
    installationService: {},
    cloudIntegration: {},
    additionalRequirements: {},
    ...overrides,
  };
}

export function scenarioRules(): CalculationRules {
  return makeRules({
    workflowMultipliers: { 'Complex (multiple tables/joins)': 4.0 },
    integrationComplexity: { 'Complex integration (4+ sources)': 3.0 },
    existingRulesImpact: { 'Not documented': 5.0 },
    additionalRequirements: { governance_setup: 3.0 },
  });
}

/**
 * Run a function expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
