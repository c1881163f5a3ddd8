/**
 * DQ Service Calculation Engine
 *
 * Maps a response set and a rule set to a total day count and a
 * per-component breakdown. Every component is additive and independent;
 * unresolved labels fall back to fixed defaults instead of failing.
 */

import type { CalculationRules } from '@/types/config';
import {
  BREAKDOWN_COMPONENTS,
  ENGINE_DEFAULTS,
  LEGACY_TOOL_LABELS,
  RESPONSE_KEYS,
  type Breakdown,
  type BreakdownComponent,
  type EstimationResult,
  type ResponseSet,
} from '@/types/estimator';
import { hasResponse, lookupCoefficient, resolveFlag, resolveLabel, resolveNumber } from './resolve';

type ComponentCalculator = (responses: ResponseSet, rules: CalculationRules) => number;

export function resolveTablesCount(responses: ResponseSet): number {
  return resolveNumber(responses, RESPONSE_KEYS.tablesCount, ENGINE_DEFAULTS.tablesCount);
}

function calculateBaseService(_responses: ResponseSet, rules: CalculationRules): number {
  return rules.baseServiceDays;
}

function calculateWorkflowComplexity(responses: ResponseSet, rules: CalculationRules): number {
  const complexity = resolveLabel(responses, RESPONSE_KEYS.workflowComplexity, ENGINE_DEFAULTS.workflowComplexity);
  const multiplier = lookupCoefficient(complexity, [rules.workflowMultipliers], ENGINE_DEFAULTS.workflowMultiplier);
  return resolveTablesCount(responses) * multiplier;
}

function calculateIntegrationComplexity(responses: ResponseSet, rules: CalculationRules): number {
  const integration = resolveLabel(responses, RESPONSE_KEYS.dataSources, '');
  const multiplier = lookupCoefficient(
    integration,
    [rules.integrationComplexity, rules.integrationComplexityLegacy],
    ENGINE_DEFAULTS.integrationMultiplier
  );
  return resolveTablesCount(responses) * multiplier;
}

/**
 * Rules beyond the included allowance are billed in blocks of five, rounded
 * up: with an allowance of 20, totals of 21..25 cost one block and 26 costs two.
 */
export function calculateRulesOverhead(responses: ResponseSet, rules: CalculationRules): number {
  if (!hasResponse(responses, RESPONSE_KEYS.rulesCount)) {
    return 0;
  }

  const totalRules = resolveNumber(responses, RESPONSE_KEYS.rulesCount, 0) * resolveTablesCount(responses);
  const baseIncluded = rules.rulesOverhead.baseRulesIncluded;
  if (totalRules <= baseIncluded) {
    return 0;
  }

  const extraBlocks = Math.ceil((totalRules - baseIncluded) / 5);
  return extraBlocks * rules.rulesOverhead.additionalRulesPer5;
}

function calculateRulesDevelopment(responses: ResponseSet, rules: CalculationRules): number {
  const status = resolveLabel(responses, RESPONSE_KEYS.existingRules, ENGINE_DEFAULTS.existingRules);
  const baseImpact = lookupCoefficient(status, [rules.existingRulesImpact], ENGINE_DEFAULTS.existingRulesImpact);
  return baseImpact + calculateRulesOverhead(responses, rules);
}

function calculateDataVolumeImpact(responses: ResponseSet, rules: CalculationRules): number {
  if (!hasResponse(responses, RESPONSE_KEYS.dataVolume)) {
    return 0;
  }

  const volume = resolveLabel(responses, RESPONSE_KEYS.dataVolume, '');
  return resolveTablesCount(responses) * lookupCoefficient(volume, [rules.dataVolumeMultipliers], 0);
}

function calculateCommercialTool(responses: ResponseSet, rules: CalculationRules): number {
  const tool = resolveLabel(responses, RESPONSE_KEYS.commercialTool, ENGINE_DEFAULTS.commercialTool);
  if (Object.prototype.hasOwnProperty.call(rules.toolSetup, tool)) {
    return rules.toolSetup[tool];
  }

  if (!LEGACY_TOOL_LABELS.includes(tool)) {
    return 0;
  }

  return tool.toLowerCase().includes('existing')
    ? lookupCoefficient('Have existing DQ tool', [rules.toolSetup], ENGINE_DEFAULTS.existingToolRate)
    : lookupCoefficient('Need tool acquisition', [rules.toolSetup], ENGINE_DEFAULTS.toolAcquisitionRate);
}

function calculateToolSetup(responses: ResponseSet, rules: CalculationRules): number {
  const installation = resolveLabel(
    responses,
    RESPONSE_KEYS.installationService,
    ENGINE_DEFAULTS.installationService
  );
  return calculateCommercialTool(responses, rules) + lookupCoefficient(installation, [rules.installationService], 0);
}

function calculateCloudIntegration(responses: ResponseSet, rules: CalculationRules): number {
  const platform = resolveLabel(responses, RESPONSE_KEYS.cloudPlatform, ENGINE_DEFAULTS.cloudPlatform);
  return lookupCoefficient(platform, [rules.cloudIntegration], 0);
}

function calculateAdditionalRequirements(responses: ResponseSet, rules: CalculationRules): number {
  const costs = rules.additionalRequirements;
  let days = 0;

  // Cost applies when governance is NOT yet mature
  if (!resolveFlag(responses, RESPONSE_KEYS.governanceMaturity)) {
    days += lookupCoefficient('governance_setup', [costs], ENGINE_DEFAULTS.governanceSetup);
  }

  if (resolveFlag(responses, RESPONSE_KEYS.complianceReq)) {
    days += lookupCoefficient('compliance', [costs], ENGINE_DEFAULTS.compliance);
  }

  if (resolveFlag(responses, RESPONSE_KEYS.historicalAnalysis)) {
    const perTable = lookupCoefficient(
      'historical_analysis_per_table',
      [costs],
      ENGINE_DEFAULTS.historicalAnalysisPerTable
    );
    days += resolveTablesCount(responses) * perTable;
  }

  if (resolveFlag(responses, RESPONSE_KEYS.systemIntegration)) {
    days += lookupCoefficient('system_integration', [costs], ENGINE_DEFAULTS.systemIntegration);
  }

  return days;
}

const COMPONENT_CALCULATORS: Record<BreakdownComponent, ComponentCalculator> = {
  'Base Service': calculateBaseService,
  'Workflow Complexity': calculateWorkflowComplexity,
  'Data Integration': calculateIntegrationComplexity,
  'DQ Rules Development': calculateRulesDevelopment,
  'Data Volume Impact': calculateDataVolumeImpact,
  'Tool Setup': calculateToolSetup,
  'Cloud Integration': calculateCloudIntegration,
  'Additional Requirements': calculateAdditionalRequirements,
};

/**
 * Sum of the breakdown before flooring and the minimum-days clamp
 */
export function sumBreakdown(breakdown: Breakdown): number {
  return BREAKDOWN_COMPONENTS.reduce((sum, component) => sum + (breakdown[component] ?? 0), 0);
}

/**
 * Calculate estimated working days for a response set.
 *
 * The breakdown is not rescaled when the minimum-days floor lifts the total,
 * so its sum can be lower than `totalDays`.
 */
export function calculateWorkingDays(responses: ResponseSet, rules: CalculationRules): EstimationResult {
  const breakdown: Breakdown = {};

  for (const component of BREAKDOWN_COMPONENTS) {
    const days = COMPONENT_CALCULATORS[component](responses, rules);
    if (component === 'Base Service' || days > 0) {
      breakdown[component] = days;
    }
  }

  const totalDays = Math.max(Math.floor(sumBreakdown(breakdown)), rules.minimumProjectDays);

  return { totalDays, breakdown };
}
