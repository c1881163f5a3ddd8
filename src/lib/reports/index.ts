/**
 * Report Generators Registry
 *
 * Central registry for every export format. Each generator renders one
 * computed estimate into a document.
 */

import { REPORT_FORMATS, type CalculatorConfig, type ReportFormat } from '@/types/config';
import type { ReportGenerator, ReportInput, ReportResult } from './base-report';
import { csvReportGenerator } from './csv-report';
import { excelReportGenerator } from './excel-report';
import { jsonReportGenerator } from './json-report';
import { pdfReportGenerator } from './pdf-report';
import { textReportGenerator } from './text-report';

export * from './base-report';
export * from './breakdown';
export * from './narrative';
export * from './json-report';
export * from './csv-report';
export * from './text-report';
export * from './excel-report';
export * from './pdf-report';

export type ReportOutcome = { ok: true; result: ReportResult } | { ok: false; error: string };

/**
 * Registry of all available report generators
 */
export const reportRegistry: Record<ReportFormat, ReportGenerator> = {
  json: jsonReportGenerator,
  csv: csvReportGenerator,
  txt: textReportGenerator,
  excel: excelReportGenerator,
  pdf: pdfReportGenerator,
};

export function isReportFormat(format: string): format is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(format);
}

/**
 * Get a generator by its format id
 */
export function getReportGenerator(format: string): ReportGenerator | undefined {
  const id = format.toLowerCase();
  return isReportFormat(id) ? reportRegistry[id] : undefined;
}

/**
 * Formats enabled by export_config, in configured order
 */
export function getAvailableFormats(config: CalculatorConfig): ReportFormat[] {
  return config.exportConfig.formats.filter(isReportFormat);
}

/**
 * Get generator metadata for UI display
 */
export function getReportFormatInfo(config: CalculatorConfig): Array<{
  id: ReportFormat;
  name: string;
  description: string;
  mimeType: string;
  fileExtension: string;
}> {
  return getAvailableFormats(config).map(format => {
    const generator = reportRegistry[format];
    return {
      id: generator.id,
      name: generator.name,
      description: generator.description,
      mimeType: generator.mimeType,
      fileExtension: generator.fileExtension,
    };
  });
}

/**
 * Generate a report in one format
 */
export async function generateReport(format: string, input: ReportInput): Promise<ReportResult> {
  const generator = getReportGenerator(format);
  if (!generator) {
    throw new Error(`Unknown report format: ${format}. Available: ${REPORT_FORMATS.join(', ')}`);
  }
  if (!input.config.exportConfig.formats.includes(generator.id)) {
    throw new Error(`Report format '${generator.id}' is not enabled in export_config.formats`);
  }
  return generator.generate(input);
}

/**
 * Generate several formats; a failing format is reported without affecting the others
 */
export async function generateReports(
  formats: string[],
  input: ReportInput,
  registry: Partial<Record<ReportFormat, ReportGenerator>> = reportRegistry
): Promise<Record<string, ReportOutcome>> {
  const outcomes: Record<string, ReportOutcome> = {};

  for (const format of formats) {
    try {
      const generator = isReportFormat(format) ? registry[format] : undefined;
      if (!generator) {
        throw new Error(`Unknown report format: ${format}`);
      }
      if (!input.config.exportConfig.formats.includes(format)) {
        throw new Error(`Report format '${format}' is not enabled in export_config.formats`);
      }
      outcomes[format] = { ok: true, result: await generator.generate(input) };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.warn(`Report generation failed for ${format}:`, message);
      outcomes[format] = { ok: false, error: message };
    }
  }

  return outcomes;
}
