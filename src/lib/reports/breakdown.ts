/**
 * Breakdown Formatter
 *
 * Turns a computed breakdown into a table, CSV, a plain-text summary and
 * the JSON export envelope. No figure is recomputed here.
 */

import * as XLSX from 'xlsx';
import type { CalculatorConfig, MethodologyPhase } from '@/types/config';
import {
  BREAKDOWN_COMPONENTS,
  RESPONSE_KEYS,
  type Breakdown,
  type BreakdownComponent,
  type ResponseSet,
  type ResponseValue,
} from '@/types/estimator';
import { resolveTablesCount } from '@/lib/calculator/engine';
import { hasResponse, resolveLabel } from '@/lib/calculator/resolve';
import { getQuestion } from '@/lib/config/queries';
import { formatCurrency } from '@/lib/pricing';
import type { ReportInput } from './base-report';

export const CALCULATOR_VERSION = '2.0';

export const CSV_HEADER = ['Component', 'Days', 'Percentage', 'Raw_Days', 'Raw_Percentage'];

export interface BreakdownRow {
  component: BreakdownComponent;
  /** Whole days, truncated */
  days: number;
  /** e.g. "25.0%" */
  percentage: string;
  rawDays: number;
  rawPercentage: number;
  cost: number;
}

export interface ProjectDetail {
  question: string;
  value: ResponseValue;
  section: string;
}

export interface QuestionMetadata {
  label: string;
  type: string;
  section: string;
  complexity_level: string;
  optional: boolean;
}

export interface ExportEnvelope {
  metadata: {
    generated_date: string;
    calculator_version: string;
    configuration_file: string;
  };
  project_details: Record<string, ProjectDetail>;
  results: {
    total_days: number;
    breakdown: Partial<Record<BreakdownComponent, number>>;
  };
  calculation_rules: {
    base_service_days: number;
    minimum_project_days: number;
  };
  questions_config?: Record<string, QuestionMetadata>;
}

/**
 * Format a date with a strftime-style pattern (%Y %m %d %H %M %S), local time
 */
export function formatTimestamp(date: Date, pattern: string): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return pattern.replace(/%([YmdHMS%])/g, (_match, token: string) => {
    switch (token) {
      case 'Y':
        return String(date.getFullYear());
      case 'm':
        return pad(date.getMonth() + 1);
      case 'd':
        return pad(date.getDate());
      case 'H':
        return pad(date.getHours());
      case 'M':
        return pad(date.getMinutes());
      case 'S':
        return pad(date.getSeconds());
      default:
        return '%';
    }
  });
}

export function percentageOf(days: number, totalDays: number): number {
  return totalDays > 0 ? (days / totalDays) * 100 : 0;
}

function roundOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * One row per non-zero component, in breakdown order
 */
export function buildBreakdownTable(breakdown: Breakdown, totalDays: number, pricePerDay = 0): BreakdownRow[] {
  const rows: BreakdownRow[] = [];

  for (const component of BREAKDOWN_COMPONENTS) {
    const days = breakdown[component] ?? 0;
    if (days <= 0) continue;

    const rawPercentage = percentageOf(days, totalDays);
    rows.push({
      component,
      days: Math.trunc(days),
      percentage: `${rawPercentage.toFixed(1)}%`,
      rawDays: days,
      rawPercentage,
      cost: days * pricePerDay,
    });
  }

  return rows;
}

export function generateCsvBreakdown(breakdown: Breakdown, totalDays: number): string {
  const records = buildBreakdownTable(breakdown, totalDays).map(row => ({
    Component: row.component,
    Days: row.days,
    Percentage: row.percentage,
    Raw_Days: row.rawDays,
    Raw_Percentage: row.rawPercentage,
  }));

  const sheet = XLSX.utils.json_to_sheet(records, { header: CSV_HEADER });
  return XLSX.utils.sheet_to_csv(sheet, { rawNumbers: true });
}

function titleCase(questionId: string): string {
  return questionId
    .split('_')
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Attach question labels and sections to the raw answers
 */
export function cleanResponsesForExport(
  responses: ResponseSet,
  config: CalculatorConfig
): Record<string, ProjectDetail> {
  const cleaned: Record<string, ProjectDetail> = {};

  for (const [questionId, value] of Object.entries(responses)) {
    const question = getQuestion(config, questionId);
    cleaned[questionId] = question
      ? { question: question.label, value, section: question.section }
      : { question: titleCase(questionId), value, section: 'Legacy' };
  }

  return cleaned;
}

export function generateQuestionsMetadata(config: CalculatorConfig): Record<string, QuestionMetadata> {
  const metadata: Record<string, QuestionMetadata> = {};
  for (const [questionId, question] of Object.entries(config.questions)) {
    metadata[questionId] = {
      label: question.label,
      type: question.type,
      section: question.section,
      complexity_level: question.complexityLevel,
      optional: question.optional,
    };
  }
  return metadata;
}

export function generateExportData(input: ReportInput): ExportEnvelope {
  const { config, breakdown } = input;

  const roundedBreakdown: Partial<Record<BreakdownComponent, number>> = {};
  for (const component of BREAKDOWN_COMPONENTS) {
    const days = breakdown[component] ?? 0;
    if (days > 0) {
      roundedBreakdown[component] = roundOneDecimal(days);
    }
  }

  const envelope: ExportEnvelope = {
    metadata: {
      generated_date: formatTimestamp(input.generatedAt ?? new Date(), config.exportConfig.timestampFormat),
      calculator_version: CALCULATOR_VERSION,
      configuration_file: config.sourceFile,
    },
    project_details: cleanResponsesForExport(input.responses, config),
    results: {
      total_days: input.totalDays,
      breakdown: roundedBreakdown,
    },
    calculation_rules: {
      base_service_days: config.calculationRules.baseServiceDays,
      minimum_project_days: config.calculationRules.minimumProjectDays,
    },
  };

  if (config.exportConfig.includeMetadata) {
    envelope.questions_config = generateQuestionsMetadata(config);
  }

  return envelope;
}

export function generateJsonExport(input: ReportInput): string {
  return JSON.stringify(generateExportData(input), null, 2);
}

/**
 * Plain-text report with the figures and the methodology phases
 */
export function generateSummaryReport(input: ReportInput): string {
  const { config, responses, totalDays, breakdown, pricePerDay } = input;
  const rule = '='.repeat(60);
  const lines: string[] = [rule, 'DATA QUALITY SERVICE ESTIMATION REPORT', rule, ''];

  lines.push('PROJECT OVERVIEW', '-'.repeat(20));
  lines.push(`Tables/Workflows: ${resolveTablesCount(responses)}`);
  if (hasResponse(responses, RESPONSE_KEYS.workflowComplexity)) {
    lines.push(`Complexity: ${resolveLabel(responses, RESPONSE_KEYS.workflowComplexity, '')}`);
  }
  if (hasResponse(responses, RESPONSE_KEYS.dataSources)) {
    lines.push(`Integration: ${resolveLabel(responses, RESPONSE_KEYS.dataSources, '')}`);
  }
  lines.push('');

  lines.push('ESTIMATION RESULTS', '-'.repeat(20));
  lines.push(`Total Working Days: ${totalDays}`);
  if (pricePerDay > 0) {
    lines.push(`Total Cost: ${formatCurrency(totalDays * pricePerDay, config.pricingConfig)}`);
  }
  lines.push('');

  lines.push('COST BREAKDOWN', '-'.repeat(20));
  for (const row of buildBreakdownTable(breakdown, totalDays)) {
    lines.push(`${row.component}: ${row.rawDays.toFixed(1)} days (${row.rawPercentage.toFixed(1)}%)`);
  }
  lines.push('');

  const phases = Object.values(config.methodologyPhases);
  if (phases.length > 0) {
    lines.push('DQ METHODOLOGY', '-'.repeat(30));
    for (const phase of phases) {
      lines.push(`${phase.title}:`);
      for (const line of phase.description.trim().split('\n')) {
        if (line.trim()) {
          lines.push(`  ${line.trim()}`);
        }
      }
      lines.push('');
    }
  }

  lines.push(rule);
  lines.push(`Generated by ${config.appConfig.title}`);
  lines.push(`Report Date: ${formatTimestamp(input.generatedAt ?? new Date(), config.exportConfig.timestampFormat)}`);
  lines.push(rule);

  return lines.join('\n');
}

export function getPhaseDescriptions(config: CalculatorConfig): Record<string, MethodologyPhase> {
  const phases: Record<string, MethodologyPhase> = {};
  for (const [phaseId, phase] of Object.entries(config.methodologyPhases)) {
    phases[phaseId] = { title: phase.title, description: phase.description };
  }
  return phases;
}
