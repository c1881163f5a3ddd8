/**
 * Base Report Interface
 *
 * Every export format implements this interface so the registry can
 * produce any mix of formats from one computed estimate.
 */

import type { CalculatorConfig, ReportFormat } from '@/types/config';
import type { Breakdown, ResponseSet } from '@/types/estimator';

export interface ReportInput {
  config: CalculatorConfig;
  responses: ResponseSet;
  totalDays: number;
  breakdown: Breakdown;
  pricePerDay: number;
  /** Defaults to the time of generation */
  generatedAt?: Date;
}

export interface ReportResult {
  content: Buffer;
  format: ReportFormat;
  mimeType: string;
  fileExtension: string;
  fileName: string;
}

export interface ReportGenerator {
  /**
   * Format identifier as listed in export_config.formats
   */
  readonly id: ReportFormat;

  /**
   * Display name for UI
   */
  readonly name: string;

  readonly description: string;
  readonly mimeType: string;
  readonly fileExtension: string;

  /**
   * Render the estimate into a document
   */
  generate(input: ReportInput): Promise<ReportResult>;
}

/**
 * Abstract base class with common functionality
 */
export abstract class BaseReportGenerator implements ReportGenerator {
  abstract readonly id: ReportFormat;
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly mimeType: string;
  abstract readonly fileExtension: string;

  protected abstract render(input: ReportInput): Promise<Buffer | string> | Buffer | string;

  async generate(input: ReportInput): Promise<ReportResult> {
    const rendered = await this.render(input);

    return {
      content: typeof rendered === 'string' ? Buffer.from(rendered, 'utf-8') : rendered,
      format: this.id,
      mimeType: this.mimeType,
      fileExtension: this.fileExtension,
      fileName: this.buildFileName(input.generatedAt ?? new Date()),
    };
  }

  protected buildFileName(date: Date): string {
    const day = [date.getFullYear(), date.getMonth() + 1, date.getDate()]
      .map(part => String(part).padStart(2, '0'))
      .join('-');
    return `dq-estimate-${day}.${this.fileExtension}`;
  }
}
