import type { ReportFormat } from '@/types/config';
import { BaseReportGenerator, type ReportInput } from './base-report';
import { generateSummaryReport } from './breakdown';

export class TextReportGenerator extends BaseReportGenerator {
  readonly id: ReportFormat = 'txt';
  readonly name = 'Text Summary';
  readonly description = 'Plain-text estimation report with methodology phases';
  readonly mimeType = 'text/plain';
  readonly fileExtension = 'txt';

  protected render(input: ReportInput): string {
    return generateSummaryReport(input);
  }
}

export const textReportGenerator = new TextReportGenerator();
