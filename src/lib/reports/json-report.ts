import type { ReportFormat } from '@/types/config';
import { BaseReportGenerator, type ReportInput } from './base-report';
import { generateJsonExport } from './breakdown';

/**
 * JSON export envelope: metadata, answers, results and rule constants
 */
export class JsonReportGenerator extends BaseReportGenerator {
  readonly id: ReportFormat = 'json';
  readonly name = 'JSON';
  readonly description = 'Structured export with metadata, answers and results';
  readonly mimeType = 'application/json';
  readonly fileExtension = 'json';

  protected render(input: ReportInput): string {
    return generateJsonExport(input);
  }
}

export const jsonReportGenerator = new JsonReportGenerator();
