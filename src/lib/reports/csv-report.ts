import type { ReportFormat } from '@/types/config';
import { BaseReportGenerator, type ReportInput } from './base-report';
import { generateCsvBreakdown } from './breakdown';

export class CsvReportGenerator extends BaseReportGenerator {
  readonly id: ReportFormat = 'csv';
  readonly name = 'CSV';
  readonly description = 'Component breakdown as comma-separated values';
  readonly mimeType = 'text/csv';
  readonly fileExtension = 'csv';

  protected render(input: ReportInput): string {
    return generateCsvBreakdown(input.breakdown, input.totalDays);
  }
}

export const csvReportGenerator = new CsvReportGenerator();
