/**
 * Estimate insights
 *
 * Derived views over an already computed estimate: a readable explanation,
 * a confidence score and a calendar timeline. Nothing here changes the
 * day count.
 */

import type { CalculationRules, QuickEstimateConfig } from '@/types/config';
import {
  BREAKDOWN_COMPONENTS,
  ENGINE_DEFAULTS,
  RESPONSE_KEYS,
  type Breakdown,
  type ProjectTimeline,
  type ResponseSet,
} from '@/types/estimator';
import { resolveTablesCount, sumBreakdown } from './engine';
import { lookupCoefficient, resolveLabel } from './resolve';

const WORKING_DAYS_PER_WEEK = 5;
const DOCUMENTED_RULES_LABEL = 'Fully documented and validated';

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function describeComponent(
  component: string,
  days: number,
  responses: ResponseSet,
  rules: CalculationRules
): string | null {
  const tablesCount = resolveTablesCount(responses);

  switch (component) {
    case 'Base Service':
      return 'Core DQ methodology implementation';
    case 'Workflow Complexity': {
      const complexity = resolveLabel(responses, RESPONSE_KEYS.workflowComplexity, ENGINE_DEFAULTS.workflowComplexity);
      const perTable = tablesCount > 0 ? days / tablesCount : 0;
      return `${complexity}: ${tablesCount} × ${perTable.toFixed(1)} days each`;
    }
    case 'Data Integration':
      return resolveLabel(responses, RESPONSE_KEYS.dataSources, '');
    case 'DQ Rules Development':
      return `Rules status: ${resolveLabel(responses, RESPONSE_KEYS.existingRules, '')}`;
    case 'Tool Setup': {
      const installation = resolveLabel(
        responses,
        RESPONSE_KEYS.installationService,
        ENGINE_DEFAULTS.installationService
      );
      const installationDays = lookupCoefficient(installation, [rules.installationService], 0);
      return installationDays > 0 ? `Includes installation service (~${installationDays} days)` : null;
    }
    default:
      return null;
  }
}

/**
 * Explain how each non-zero component of a breakdown was derived
 */
export function explainCalculation(responses: ResponseSet, breakdown: Breakdown, rules: CalculationRules): string {
  const lines: string[] = ['**Calculation Breakdown:**', ''];
  lines.push(`📊 **Project Scope:** ${resolveTablesCount(responses)} table(s)/workflow(s)`, '');

  for (const component of BREAKDOWN_COMPONENTS) {
    const days = breakdown[component] ?? 0;
    if (days <= 0) continue;

    lines.push(`• **${component}:** ${days.toFixed(1)} days`);
    const detail = describeComponent(component, days, responses, rules);
    if (detail !== null) {
      lines.push(`  - ${detail}`);
    }
    lines.push('');
  }

  lines.push(`**Total Estimated Days:** ${Math.floor(sumBreakdown(breakdown))} days`);
  lines.push(`**Minimum Project Threshold:** ${rules.minimumProjectDays} days`);

  return lines.join('\n');
}

/**
 * Confidence in an estimate, between 0 and 1.
 *
 * Starts at 0.7, grows with the share of questions answered and with fully
 * documented rules, and drops for very large or very small projects.
 */
export function calculateConfidence(responses: ResponseSet, totalDays: number, questionCount: number): number {
  let confidence = 0.7;

  const answered = Object.values(responses).filter(value => value !== undefined && value !== null).length;
  if (questionCount > 0) {
    confidence += 0.2 * (answered / questionCount);
  }

  if (responses.existing_rules === DOCUMENTED_RULES_LABEL) {
    confidence += 0.1;
  }

  if (totalDays > 50 || totalDays < 5) {
    confidence -= 0.1;
  }

  return Math.min(Math.max(confidence, 0), 1);
}

/**
 * Calendar duration of an estimate on five-day weeks
 */
export function calculateProjectTimeline(totalDays: number, teamSize = 1): ProjectTimeline {
  const weeks = totalDays / WORKING_DAYS_PER_WEEK;

  if (teamSize > 1) {
    return {
      teamSize,
      totalPersonDays: totalDays,
      sequentialWeeks: roundTo(weeks, 1),
      parallelWeeks: roundTo(weeks / teamSize, 1),
    };
  }

  return {
    teamSize: 1,
    totalPersonDays: totalDays,
    weeks: roundTo(weeks, 1),
  };
}

/**
 * Overlay the supplied quick-estimate answers on the configured defaults
 */
export function buildQuickResponses(responses: ResponseSet, quickConfig: QuickEstimateConfig): ResponseSet {
  const merged: ResponseSet = { ...quickConfig.defaults };
  for (const [questionId, value] of Object.entries(responses)) {
    if (value !== undefined && value !== null) {
      merged[questionId] = value;
    }
  }
  return merged;
}
