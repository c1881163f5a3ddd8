/**
 * Configuration document schema
 *
 * Maps the raw (snake_case) configuration document onto the typed model,
 * filling a default for every absent field. Type mismatches are reported by
 * zod; cross-reference checks live in ./validate.
 */

import { z } from 'zod';
import {
  ALL_QUESTIONS,
  type CalculatorConfig,
  type ComplexityLevelConfig,
  type MethodologyPhase,
  type QuestionSpec,
} from '@/types/config';
import { ENGINE_DEFAULTS, type ResponseSet } from '@/types/estimator';

const responseValueSchema = z.union([z.number(), z.string(), z.boolean()]);
const coefficientTableSchema = z.record(z.number()).default({});

const appConfigSchema = z
  .object({
    title: z.string().default('DQ Service Calculator'),
    subtitle: z.string().default(''),
    description: z.string().default(''),
    page_icon: z.string().default('📊'),
    layout: z.string().default('wide'),
    sidebar_title: z.string().default('Options'),
  })
  .default({});

const complexityLevelSchema = z.object({
  title: z.string().optional(),
  label: z.string().default(''),
  description: z.string().default(''),
  show_questions: z.union([z.literal(ALL_QUESTIONS), z.array(z.string())]).default([]),
});

export const QUICK_ESTIMATE_DEFAULTS: ResponseSet = {
  workflow_complexity: 'Simple (single table/report)',
  data_sources: 'Single location (same database/schema)',
  existing_rules: 'Not documented',
  commercial_tool: 'No commercial tool',
  data_volume: 'Small (<1M records)',
  installation_service: 'No, not needed',
  compliance_req: false,
  historical_analysis: false,
  system_integration: false,
  governance_maturity: false,
  rules_count: 15,
  cloud_platform: 'Not applicable',
};

const quickEstimateSchema = z
  .object({
    title: z.string().default('Quick Estimate Mode'),
    core_questions: z.array(z.string()).default(['tables_count']),
    defaults: z.record(responseValueSchema).default({}),
  })
  .default({});

const questionSchema = z.object({
  label: z.string().default(''),
  type: z.string().default('text'),
  tooltip: z.string().default(''),
  section: z.string().default('General'),
  complexity_level: z.string().default('basic'),
  options: z.array(z.string()).nullish(),
  min_value: z.number().nullish(),
  max_value: z.number().nullish(),
  default: responseValueSchema.nullish(),
  optional: z.boolean().default(false),
  depends_on: z.string().nullish(),
  depends_value: responseValueSchema.nullish(),
});

const calculationRulesSchema = z
  .object({
    base_service_days: z.number().default(9),
    minimum_project_days: z.number().default(5),
    workflow_multipliers: coefficientTableSchema,
    integration_complexity: coefficientTableSchema,
    integration_complexity_legacy: coefficientTableSchema,
    data_volume_multipliers: coefficientTableSchema,
    rules_overhead: z
      .object({
        base_rules_included: z.number().default(ENGINE_DEFAULTS.baseRulesIncluded),
        additional_rules_per_5: z.number().default(ENGINE_DEFAULTS.additionalRulesPer5),
      })
      .default({}),
    existing_rules_impact: coefficientTableSchema,
    tool_setup: coefficientTableSchema,
    installation_service: coefficientTableSchema,
    cloud_integration: coefficientTableSchema,
    additional_requirements: coefficientTableSchema,
  })
  .default({});

const pricingSchema = z
  .object({
    default_price_per_day: z.number().default(700),
    currency: z.string().default('EUR'),
    currency_symbol: z.string().default('€'),
    allow_admin_override: z.boolean().default(true),
    min_price_override: z.number().default(500),
    max_price_override: z.number().default(5000),
  })
  .default({});

const securitySchema = z
  .object({
    breakdown_password: z.string().default(''),
    password_required: z.boolean().default(false),
  })
  .default({});

const exportSchema = z
  .object({
    formats: z.array(z.string()).default(['json']),
    include_metadata: z.boolean().default(true),
    timestamp_format: z.string().default('%Y-%m-%d %H:%M:%S'),
  })
  .default({});

const reportSchema = z
  .object({
    include_executive_summary: z.boolean().default(true),
    include_calculation_explanation: z.boolean().default(true),
    include_methodology: z.boolean().default(true),
    include_risk_assessment: z.boolean().default(true),
    include_company_branding: z.boolean().default(true),
    default_language: z.string().default('en'),
    company_info: z
      .object({
        name: z.string().default(''),
        logo_url: z.string().default(''),
        contact_email: z.string().default(''),
      })
      .default({}),
  })
  .default({});

const uiSectionSchema = z.object({
  name: z.string().default(''),
  icon: z.string().default(''),
  description: z.string().default(''),
});

const methodologyPhaseSchema = z.object({
  title: z.string().default(''),
  description: z.string().default(''),
});

export const configDocumentSchema = z.object({
  app_config: appConfigSchema,
  complexity_levels: z.record(complexityLevelSchema).default({}),
  quick_estimate_config: quickEstimateSchema,
  questions: z.record(questionSchema).default({}),
  calculation_rules: calculationRulesSchema,
  pricing_config: pricingSchema,
  // Read for completeness; only the breakdown gate uses it
  security_config: securitySchema,
  export_config: exportSchema,
  report_config: reportSchema,
  ui_sections: z.array(uiSectionSchema).default([]),
  methodology_phases: z.record(methodologyPhaseSchema).default({}),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

function mapQuestion(id: string, raw: z.infer<typeof questionSchema>): QuestionSpec {
  return {
    id,
    label: raw.label,
    type: raw.type,
    tooltip: raw.tooltip,
    section: raw.section,
    complexityLevel: raw.complexity_level,
    options: raw.options ?? undefined,
    minValue: raw.min_value ?? undefined,
    maxValue: raw.max_value ?? undefined,
    default: raw.default ?? undefined,
    optional: raw.optional,
    dependsOn: raw.depends_on ?? undefined,
    dependsValue: raw.depends_value ?? undefined,
  };
}

/**
 * Convert a schema-checked document into the configuration model
 */
export function mapConfigDocument(doc: ConfigDocument, sourceFile: string): CalculatorConfig {
  const complexityLevels: Record<string, ComplexityLevelConfig> = {};
  for (const [levelId, level] of Object.entries(doc.complexity_levels)) {
    complexityLevels[levelId] = {
      title: level.title ?? level.label,
      label: level.label,
      description: level.description,
      showQuestions: level.show_questions,
    };
  }

  const questions: Record<string, QuestionSpec> = {};
  for (const [questionId, question] of Object.entries(doc.questions)) {
    questions[questionId] = mapQuestion(questionId, question);
  }

  const methodologyPhases: Record<string, MethodologyPhase> = {};
  for (const [phaseId, phase] of Object.entries(doc.methodology_phases)) {
    methodologyPhases[phaseId] = { title: phase.title, description: phase.description };
  }

  const rules = doc.calculation_rules;
  const quick = doc.quick_estimate_config;
  const report = doc.report_config;

  return {
    sourceFile,
    appConfig: {
      title: doc.app_config.title,
      subtitle: doc.app_config.subtitle,
      description: doc.app_config.description,
      pageIcon: doc.app_config.page_icon,
      layout: doc.app_config.layout,
      sidebarTitle: doc.app_config.sidebar_title,
    },
    complexityLevels,
    quickEstimateConfig: {
      title: quick.title,
      coreQuestions: quick.core_questions,
      defaults: { ...QUICK_ESTIMATE_DEFAULTS, ...quick.defaults },
    },
    questions,
    calculationRules: {
      baseServiceDays: rules.base_service_days,
      minimumProjectDays: rules.minimum_project_days,
      workflowMultipliers: rules.workflow_multipliers,
      integrationComplexity: rules.integration_complexity,
      integrationComplexityLegacy: rules.integration_complexity_legacy,
      dataVolumeMultipliers: rules.data_volume_multipliers,
      rulesOverhead: {
        baseRulesIncluded: rules.rules_overhead.base_rules_included,
        additionalRulesPer5: rules.rules_overhead.additional_rules_per_5,
      },
      existingRulesImpact: rules.existing_rules_impact,
      toolSetup: rules.tool_setup,
      installationService: rules.installation_service,
      cloudIntegration: rules.cloud_integration,
      additionalRequirements: rules.additional_requirements,
    },
    pricingConfig: {
      defaultPricePerDay: doc.pricing_config.default_price_per_day,
      currency: doc.pricing_config.currency,
      currencySymbol: doc.pricing_config.currency_symbol,
      allowAdminOverride: doc.pricing_config.allow_admin_override,
      minPriceOverride: doc.pricing_config.min_price_override,
      maxPriceOverride: doc.pricing_config.max_price_override,
    },
    securityConfig: {
      breakdownPassword: doc.security_config.breakdown_password,
      passwordRequired: doc.security_config.password_required,
    },
    exportConfig: {
      formats: doc.export_config.formats,
      includeMetadata: doc.export_config.include_metadata,
      timestampFormat: doc.export_config.timestamp_format,
    },
    reportConfig: {
      includeExecutiveSummary: report.include_executive_summary,
      includeCalculationExplanation: report.include_calculation_explanation,
      includeMethodology: report.include_methodology,
      includeRiskAssessment: report.include_risk_assessment,
      includeCompanyBranding: report.include_company_branding,
      defaultLanguage: report.default_language,
      companyInfo: {
        name: report.company_info.name,
        logoUrl: report.company_info.logo_url,
        contactEmail: report.company_info.contact_email,
      },
    },
    uiSections: doc.ui_sections.map(section => ({ ...section })),
    methodologyPhases,
  };
}

/**
 * Describe zod issues as "path: message" lines
 */
export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
