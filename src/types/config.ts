// Calculator Configuration Model
// Typed, immutable view of the configuration document

import type { ResponseSet, ResponseValue } from './estimator';

export type QuestionType = 'number_input' | 'selectbox' | 'radio' | 'checkbox';

export const QUESTION_TYPES: readonly QuestionType[] = ['number_input', 'selectbox', 'radio', 'checkbox'];

/**
 * Marker accepted in `show_questions` meaning every declared question
 */
export const ALL_QUESTIONS = 'all';

export interface QuestionDependency {
  questionId: string;
  value: ResponseValue;
}

export interface QuestionSpec {
  id: string;
  label: string;
  /** Kept as declared so an unknown kind can be reported by validation */
  type: string;
  tooltip: string;
  section: string;
  complexityLevel: string;
  options?: string[];
  minValue?: number;
  maxValue?: number;
  default?: ResponseValue;
  optional: boolean;
  dependsOn?: string;
  dependsValue?: ResponseValue;
}

export interface RulesOverhead {
  baseRulesIncluded: number;
  additionalRulesPer5: number;
}

export type CoefficientTable = Record<string, number>;

export interface CalculationRules {
  baseServiceDays: number;
  minimumProjectDays: number;
  workflowMultipliers: CoefficientTable;
  integrationComplexity: CoefficientTable;
  integrationComplexityLegacy: CoefficientTable;
  dataVolumeMultipliers: CoefficientTable;
  rulesOverhead: RulesOverhead;
  existingRulesImpact: CoefficientTable;
  toolSetup: CoefficientTable;
  installationService: CoefficientTable;
  cloudIntegration: CoefficientTable;
  additionalRequirements: CoefficientTable;
}

export interface AppConfig {
  title: string;
  subtitle: string;
  description: string;
  pageIcon: string;
  layout: string;
  sidebarTitle: string;
}

export interface ComplexityLevelConfig {
  title: string;
  label: string;
  description: string;
  showQuestions: string[] | typeof ALL_QUESTIONS;
}

export interface QuickEstimateConfig {
  title: string;
  coreQuestions: string[];
  defaults: ResponseSet;
}

export interface PricingConfig {
  defaultPricePerDay: number;
  currency: string;
  currencySymbol: string;
  allowAdminOverride: boolean;
  minPriceOverride: number;
  maxPriceOverride: number;
}

export interface SecurityConfig {
  breakdownPassword: string;
  passwordRequired: boolean;
}

export type ReportFormat = 'json' | 'csv' | 'txt' | 'excel' | 'pdf';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'csv', 'txt', 'excel', 'pdf'];

export interface ExportConfig {
  formats: string[];
  includeMetadata: boolean;
  /** strftime-style pattern (%Y, %m, %d, %H, %M, %S) */
  timestampFormat: string;
}

export interface CompanyInfo {
  name: string;
  logoUrl: string;
  contactEmail: string;
}

export interface ReportConfig {
  includeExecutiveSummary: boolean;
  includeCalculationExplanation: boolean;
  includeMethodology: boolean;
  includeRiskAssessment: boolean;
  includeCompanyBranding: boolean;
  defaultLanguage: string;
  companyInfo: CompanyInfo;
}

export interface UISection {
  name: string;
  icon: string;
  description: string;
}

export interface MethodologyPhase {
  title: string;
  description: string;
}

export interface CalculatorConfig {
  /** File name of the document this snapshot was loaded from */
  sourceFile: string;
  appConfig: AppConfig;
  complexityLevels: Record<string, ComplexityLevelConfig>;
  quickEstimateConfig: QuickEstimateConfig;
  /** Declaration order is preserved */
  questions: Record<string, QuestionSpec>;
  calculationRules: CalculationRules;
  pricingConfig: PricingConfig;
  securityConfig: SecurityConfig;
  exportConfig: ExportConfig;
  reportConfig: ReportConfig;
  uiSections: UISection[];
  methodologyPhases: Record<string, MethodologyPhase>;
}
