// Structural validation of a mapped configuration.
// Every check runs; violations are accumulated rather than thrown.

import {
  ALL_QUESTIONS,
  QUESTION_TYPES,
  REPORT_FORMATS,
  type CalculationRules,
  type CalculatorConfig,
  type QuestionSpec,
  type QuestionType,
} from '@/types/config';
import type { ResponseValue } from '@/types/estimator';
import { getQuestion } from './queries';

function isQuestionType(type: string): type is QuestionType {
  return (QUESTION_TYPES as readonly string[]).includes(type);
}

function isChoiceType(type: string): boolean {
  return type === 'selectbox' || type === 'radio';
}

/**
 * Values a dependent question may require of the question it depends on
 */
export function allowedDependencyValues(question: QuestionSpec): ResponseValue[] {
  if (question.type === 'checkbox') {
    return [true, false];
  }
  return question.options ?? [];
}

export function validateQuestion(question: QuestionSpec, tiers: string[] = []): string[] {
  const errors: string[] = [];
  const prefix = `Question '${question.id}'`;

  if (!isQuestionType(question.type)) {
    errors.push(`${prefix}: Invalid question type '${question.type}'`);
  }

  if (tiers.length > 0 && !tiers.includes(question.complexityLevel)) {
    errors.push(`${prefix}: Invalid complexity level '${question.complexityLevel}'`);
  }

  if (question.type === 'number_input') {
    if (question.minValue === undefined || question.maxValue === undefined) {
      errors.push(`${prefix}: Number input requires min_value and max_value`);
    } else if (question.minValue >= question.maxValue) {
      errors.push(`${prefix}: min_value must be less than max_value`);
    }
  }

  if (isChoiceType(question.type) && (!question.options || question.options.length < 2)) {
    errors.push(`${prefix}: ${question.type} requires at least 2 options`);
  }

  if (question.dependsOn && question.dependsValue === undefined) {
    errors.push(`${prefix}: depends_on requires depends_value`);
  }

  return errors;
}

export function validateCalculationRules(rules: CalculationRules): string[] {
  const errors: string[] = [];

  if (rules.baseServiceDays <= 0) {
    errors.push('base_service_days must be positive');
  }
  if (rules.minimumProjectDays <= 0) {
    errors.push('minimum_project_days must be positive');
  }
  if (rules.baseServiceDays < rules.minimumProjectDays) {
    errors.push('base_service_days should be >= minimum_project_days');
  }

  const tables: Array<[string, Record<string, number>]> = [
    ['workflow_multipliers', rules.workflowMultipliers],
    ['integration_complexity', rules.integrationComplexity],
    ['integration_complexity_legacy', rules.integrationComplexityLegacy],
    ['data_volume_multipliers', rules.dataVolumeMultipliers],
    ['existing_rules_impact', rules.existingRulesImpact],
    ['tool_setup', rules.toolSetup],
    ['installation_service', rules.installationService],
    ['cloud_integration', rules.cloudIntegration],
    ['additional_requirements', rules.additionalRequirements],
    [
      'rules_overhead',
      {
        base_rules_included: rules.rulesOverhead.baseRulesIncluded,
        additional_rules_per_5: rules.rulesOverhead.additionalRulesPer5,
      },
    ],
  ];

  for (const [tableName, table] of tables) {
    for (const [key, value] of Object.entries(table)) {
      if (value < 0) {
        errors.push(`Negative multiplier not allowed: ${tableName}.${key} = ${value}`);
      }
    }
  }

  return errors;
}

function validateDependencies(config: CalculatorConfig): string[] {
  const errors: string[] = [];

  for (const question of Object.values(config.questions)) {
    if (!question.dependsOn) continue;

    const target = getQuestion(config, question.dependsOn);
    if (!target) {
      errors.push(`Question '${question.id}' depends on undefined question '${question.dependsOn}'`);
      continue;
    }

    if (question.dependsValue === undefined) continue; // already reported by validateQuestion

    if (!allowedDependencyValues(target).includes(question.dependsValue)) {
      errors.push(
        `Question '${question.id}' depends on value '${String(question.dependsValue)}' ` +
          `not in options for '${question.dependsOn}'`
      );
    }
  }

  return errors;
}

/**
 * Validate the whole configuration graph; an empty list means valid
 */
export function validateConfig(config: CalculatorConfig): string[] {
  const errors: string[] = [];
  const tiers = Object.keys(config.complexityLevels);
  const questionIds = Object.keys(config.questions);

  for (const question of Object.values(config.questions)) {
    errors.push(...validateQuestion(question, tiers));
  }

  errors.push(...validateCalculationRules(config.calculationRules));

  const definedSections = new Set(config.uiSections.map(section => section.name));
  const missingSections = new Set<string>();
  for (const question of Object.values(config.questions)) {
    if (!definedSections.has(question.section)) {
      missingSections.add(question.section);
    }
  }
  for (const section of missingSections) {
    errors.push(`Missing UI section definition: ${section}`);
  }

  for (const [levelId, level] of Object.entries(config.complexityLevels)) {
    if (level.showQuestions === ALL_QUESTIONS) continue;
    const undefinedQuestions = level.showQuestions.filter(id => !questionIds.includes(id));
    if (undefinedQuestions.length > 0) {
      errors.push(`Complexity level '${levelId}' references undefined questions: ${undefinedQuestions.join(', ')}`);
    }
  }

  errors.push(...validateDependencies(config));

  for (const questionId of config.quickEstimateConfig.coreQuestions) {
    if (!getQuestion(config, questionId)) {
      errors.push(`Quick estimate core question '${questionId}' is not defined`);
    }
  }

  for (const format of config.exportConfig.formats) {
    if (!REPORT_FORMATS.some(known => known === format)) {
      errors.push(`Unknown export format '${format}'. Available: ${REPORT_FORMATS.join(', ')}`);
    }
  }

  return errors;
}
