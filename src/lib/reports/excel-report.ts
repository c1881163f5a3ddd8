/**
 * Excel Report Generator
 *
 * Workbook with a Summary and a Breakdown sheet, plus Methodology and Risks
 * sheets when report_config enables them.
 */

import * as XLSX from 'xlsx';
import type { ReportFormat } from '@/types/config';
import { resolveTablesCount } from '@/lib/calculator/engine';
import { BaseReportGenerator, type ReportInput } from './base-report';
import { buildBreakdownTable, formatTimestamp } from './breakdown';
import { assessRisks, generateExecutiveSummary, toPlainText } from './narrative';

type Cell = string | number;

export function buildWorkbook(input: ReportInput): XLSX.WorkBook {
  const { config, responses, totalDays, breakdown, pricePerDay } = input;
  const wb = XLSX.utils.book_new();
  const generated = formatTimestamp(input.generatedAt ?? new Date(), config.exportConfig.timestampFormat);

  // Summary sheet
  const summaryData: Cell[][] = [
    ['Data Quality Service Estimation Report'],
    ['Generated', generated],
  ];
  if (config.reportConfig.includeCompanyBranding && config.reportConfig.companyInfo.name) {
    summaryData.push(['Prepared by', config.reportConfig.companyInfo.name]);
  }
  summaryData.push(
    [],
    ['Tables/Workflows', resolveTablesCount(responses)],
    ['Total Working Days', totalDays],
    ['Price per Day', pricePerDay],
    ['Total Cost', totalDays * pricePerDay],
    ['Currency', config.pricingConfig.currency]
  );
  if (config.reportConfig.includeExecutiveSummary) {
    summaryData.push([]);
    for (const line of toPlainText(generateExecutiveSummary(input)).split('\n')) {
      summaryData.push([line]);
    }
  }

  const summarySheet = XLSX.utils.aoa_to_sheet(summaryData);
  summarySheet['!cols'] = [{ wch: 30 }, { wch: 25 }];
  XLSX.utils.book_append_sheet(wb, summarySheet, 'Summary');

  // Breakdown sheet
  const breakdownHeaders = ['Component', 'Days', 'Percentage', 'Cost'];
  const breakdownData: Cell[][] = [
    breakdownHeaders,
    ...buildBreakdownTable(breakdown, totalDays, pricePerDay).map(row => [
      row.component,
      row.rawDays,
      row.percentage,
      row.cost,
    ]),
    ['Total', totalDays, '', totalDays * pricePerDay],
  ];

  const breakdownSheet = XLSX.utils.aoa_to_sheet(breakdownData);
  breakdownSheet['!cols'] = [{ wch: 28 }, { wch: 10 }, { wch: 12 }, { wch: 14 }];
  XLSX.utils.book_append_sheet(wb, breakdownSheet, 'Breakdown');

  if (config.reportConfig.includeMethodology) {
    const methodologyData: Cell[][] = [
      ['Phase', 'Description'],
      ...Object.values(config.methodologyPhases).map(phase => [phase.title, phase.description.trim()]),
    ];
    const methodologySheet = XLSX.utils.aoa_to_sheet(methodologyData);
    methodologySheet['!cols'] = [{ wch: 35 }, { wch: 90 }];
    XLSX.utils.book_append_sheet(wb, methodologySheet, 'Methodology');
  }

  if (config.reportConfig.includeRiskAssessment) {
    const risksData: Cell[][] = [
      ['Risk', 'Mitigation'],
      ...assessRisks(responses, totalDays).map(item => [item.risk, item.mitigation]),
    ];
    const risksSheet = XLSX.utils.aoa_to_sheet(risksData);
    risksSheet['!cols'] = [{ wch: 45 }, { wch: 70 }];
    XLSX.utils.book_append_sheet(wb, risksSheet, 'Risks');
  }

  return wb;
}

export class ExcelReportGenerator extends BaseReportGenerator {
  readonly id: ReportFormat = 'excel';
  readonly name = 'Excel';
  readonly description = 'Workbook with summary, breakdown, methodology and risks';
  readonly mimeType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
  readonly fileExtension = 'xlsx';

  protected render(input: ReportInput): Buffer {
    return Buffer.from(XLSX.write(buildWorkbook(input), { type: 'buffer', bookType: 'xlsx' }));
  }
}

export const excelReportGenerator = new ExcelReportGenerator();
