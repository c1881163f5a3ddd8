import { describe, expect, it } from 'vitest';
import type { CalculatorConfig, QuestionSpec } from '@/types/config';
import { captureError, loadDefaultConfig, makeRules } from '@/test/fixtures';
import { UnknownTierError } from './errors';
import { getQuestionsBySection, getQuestionsForTier, shouldShowQuestion } from './queries';
import { validateCalculationRules, validateConfig, validateQuestion } from './validate';

function question(overrides: Partial<QuestionSpec>): QuestionSpec {
  return {
    id: 'q',
    label: 'Question',
    type: 'selectbox',
    tooltip: '',
    section: 'Scope',
    complexityLevel: 'basic',
    options: ['A', 'B'],
    optional: false,
    ...overrides,
  };
}

describe('validateQuestion', () => {
  it('accepts a well-formed question', () => {
    expect(validateQuestion(question({}), ['basic'])).toEqual([]);
  });

  it('requires bounds on number inputs', () => {
    expect(validateQuestion(question({ type: 'number_input', options: undefined }))).toEqual([
      "Question 'q': Number input requires min_value and max_value",
    ]);
  });

  it('requires two options on choice questions', () => {
    expect(validateQuestion(question({ type: 'radio', options: ['Only'] }))).toEqual([
      "Question 'q': radio requires at least 2 options",
    ]);
  });

  it('checks the complexity level against declared tiers', () => {
    expect(validateQuestion(question({ complexityLevel: 'expert' }), ['basic', 'advanced'])).toEqual([
      "Question 'q': Invalid complexity level 'expert'",
    ]);
  });

  it('requires a value for a dependency', () => {
    expect(validateQuestion(question({ dependsOn: 'other' }))).toEqual([
      "Question 'q': depends_on requires depends_value",
    ]);
  });
});

describe('validateCalculationRules', () => {
  it('rejects negative coefficients in any table', () => {
    const rules = makeRules({ toolSetup: { k: -1 }, integrationComplexityLegacy: { Low: -0.5 } });

    expect(validateCalculationRules(rules)).toEqual([
      'Negative multiplier not allowed: integration_complexity_legacy.Low = -0.5',
      'Negative multiplier not allowed: tool_setup.k = -1',
    ]);
  });

  it('requires the base service to cover the minimum', () => {
    expect(validateCalculationRules(makeRules({ baseServiceDays: 4, minimumProjectDays: 5 }))).toEqual([
      'base_service_days should be >= minimum_project_days',
    ]);
  });

  it('requires positive day counts', () => {
    expect(validateCalculationRules(makeRules({ baseServiceDays: 0, minimumProjectDays: 0 }))).toEqual([
      'base_service_days must be positive',
      'minimum_project_days must be positive',
    ]);
  });
});

describe('validateConfig', () => {
  const config = loadDefaultConfig();

  it('accepts the shipped configuration', () => {
    expect(validateConfig(config)).toEqual([]);
  });

  it('rejects dependencies on undeclared questions and values', () => {
    const broken: CalculatorConfig = {
      ...config,
      questions: {
        ...config.questions,
        installation_service: { ...config.questions.installation_service, dependsValue: 'Open source tool' },
        cloud_platform: { ...config.questions.cloud_platform, dependsOn: 'ghost', dependsValue: 'x' },
      },
    };

    expect(validateConfig(broken)).toEqual([
      "Question 'installation_service' depends on value 'Open source tool' not in options for 'commercial_tool'",
      "Question 'cloud_platform' depends on undefined question 'ghost'",
    ]);
  });

  it('rejects quick estimate core questions inherited from the object prototype', () => {
    const broken: CalculatorConfig = {
      ...config,
      quickEstimateConfig: { ...config.quickEstimateConfig, coreQuestions: ['tables_count', 'toString'] },
    };

    expect(validateConfig(broken)).toEqual(["Quick estimate core question 'toString' is not defined"]);
  });

  it('rejects a dependency on an object prototype key', () => {
    const broken: CalculatorConfig = {
      ...config,
      questions: {
        ...config.questions,
        cloud_platform: { ...config.questions.cloud_platform, dependsOn: 'constructor', dependsValue: 'x' },
      },
    };

    expect(validateConfig(broken)).toEqual(["Question 'cloud_platform' depends on undefined question 'constructor'"]);
  });

  it('rejects unknown export formats', () => {
    const broken: CalculatorConfig = {
      ...config,
      exportConfig: { ...config.exportConfig, formats: ['json', 'docx'] },
    };

    expect(validateConfig(broken)).toEqual(['Unknown export format \'docx\'. Available: json, csv, txt, excel, pdf']);
  });
});

describe('configuration queries', () => {
  const config = loadDefaultConfig();

  it('lists the questions of an explicit tier in order', () => {
    expect(getQuestionsForTier(config, 'basic')).toEqual([
      'tables_count',
      'workflow_complexity',
      'data_sources',
      'existing_rules',
      'governance_maturity',
    ]);
  });

  it('expands the all marker to every declared question', () => {
    expect(getQuestionsForTier(config, 'advanced')).toEqual(Object.keys(config.questions));
  });

  it('throws for an unknown tier', () => {
    expect(captureError(() => getQuestionsForTier(config, 'expert'))).toBeInstanceOf(UnknownTierError);
    expect(captureError(() => getQuestionsForTier(config, 'toString'))).toBeInstanceOf(UnknownTierError);
  });

  it('groups questions by section and drops empty sections', () => {
    expect(getQuestionsBySection(config, 'basic')).toEqual({
      'Project Scope': ['tables_count', 'workflow_complexity', 'data_sources'],
      'Data Quality Rules': ['existing_rules'],
      'Additional Requirements': ['governance_maturity'],
    });
    expect(Object.keys(getQuestionsBySection(config, 'advanced'))).toEqual([
      'Project Scope',
      'Data Quality Rules',
      'Tooling',
      'Additional Requirements',
    ]);
  });

  it('shows a dependent question only when its condition holds', () => {
    expect(shouldShowQuestion(config, 'installation_service', {})).toBe(false);
    expect(shouldShowQuestion(config, 'installation_service', { commercial_tool: 'No commercial tool' })).toBe(true);
    expect(shouldShowQuestion(config, 'installation_service', { commercial_tool: 'Have existing DQ tool' })).toBe(false);
    expect(shouldShowQuestion(config, 'tables_count', {})).toBe(true);
    expect(shouldShowQuestion(config, 'ghost', {})).toBe(false);
    expect(shouldShowQuestion(config, 'constructor', {})).toBe(false);
  });
});
