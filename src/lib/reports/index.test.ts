import { afterEach, describe, expect, it, vi } from 'vitest';
import * as XLSX from 'xlsx';
import type { ReportFormat } from '@/types/config';
import { loadDefaultConfig, SCENARIO_RESPONSES } from '@/test/fixtures';
import { BaseReportGenerator, type ReportInput } from './base-report';
import {
  generateReport,
  generateReports,
  getAvailableFormats,
  getReportGenerator,
  jsonReportGenerator,
} from './index';

const config = loadDefaultConfig();

const input: ReportInput = {
  config,
  responses: SCENARIO_RESPONSES,
  totalDays: 40,
  breakdown: { 'Base Service': 10, 'Workflow Complexity': 20, 'Tool Setup': 10 },
  pricePerDay: 700,
  generatedAt: new Date(2024, 0, 15, 9, 5, 7),
};

class FailingGenerator extends BaseReportGenerator {
  readonly id: ReportFormat = 'csv';
  readonly name = 'Broken CSV';
  readonly description = 'Always fails';
  readonly mimeType = 'text/csv';
  readonly fileExtension = 'csv';

  protected render(): string {
    throw new Error('renderer unavailable');
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('report registry', () => {
  it('looks generators up by format id', () => {
    expect(getReportGenerator('CSV')?.id).toBe('csv');
    expect(getReportGenerator('docx')).toBeUndefined();
  });

  it('offers the formats enabled in the configuration', () => {
    expect(getAvailableFormats(config)).toEqual(['json', 'csv', 'txt', 'excel', 'pdf']);
  });

  it('rejects an unknown format', async () => {
    await expect(generateReport('xml', input)).rejects.toThrow(
      'Unknown report format: xml. Available: json, csv, txt, excel, pdf'
    );
  });

  it('names files after the generation date', async () => {
    const report = await generateReport('json', input);

    expect(report.fileName).toBe('dq-estimate-2024-01-15.json');
    expect(report.mimeType).toBe('application/json');
    expect(JSON.parse(report.content.toString('utf-8')).results.total_days).toBe(40);
  });
});

describe('generateReports', () => {
  it('isolates a failing format', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const outcomes = await generateReports(['json', 'csv'], input, {
      json: jsonReportGenerator,
      csv: new FailingGenerator(),
    });

    expect(outcomes.json.ok).toBe(true);
    expect(outcomes.csv).toEqual({ ok: false, error: 'renderer unavailable' });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('reports unknown and disabled formats per format', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const jsonOnly = { ...config, exportConfig: { ...config.exportConfig, formats: ['json'] } };

    const outcomes = await generateReports(['json', 'csv', 'bogus'], { ...input, config: jsonOnly });

    expect(outcomes.json.ok).toBe(true);
    expect(outcomes.csv).toEqual({
      ok: false,
      error: "Report format 'csv' is not enabled in export_config.formats",
    });
    expect(outcomes.bogus).toEqual({ ok: false, error: 'Unknown report format: bogus' });
  });
});

describe('document formats', () => {
  it('writes the text summary', async () => {
    const report = await generateReport('txt', input);

    expect(report.content.toString('utf-8').split('\n')[0]).toBe('='.repeat(60));
  });

  it('writes a workbook with every enabled sheet', async () => {
    const report = await generateReport('excel', input);
    const workbook = XLSX.read(report.content, { type: 'buffer' });

    expect(workbook.SheetNames).toEqual(['Summary', 'Breakdown', 'Methodology', 'Risks']);

    const breakdownRows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets.Breakdown, { header: 1 });
    expect(breakdownRows[0]).toEqual(['Component', 'Days', 'Percentage', 'Cost']);
    expect(breakdownRows[1]).toEqual(['Base Service', 10, '25.0%', 7000]);

    const riskRows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets.Risks, { header: 1 });
    expect(riskRows.map(row => row[0])).toEqual([
      'Risk',
      'Existing rules are not documented',
      'Integration across multiple data sources',
      'No established governance processes',
      'Long project duration',
    ]);
  });

  it('drops disabled sheets', async () => {
    const trimmed = {
      ...config,
      reportConfig: { ...config.reportConfig, includeMethodology: false, includeRiskAssessment: false },
    };
    const report = await generateReport('excel', { ...input, config: trimmed });

    expect(XLSX.read(report.content, { type: 'buffer' }).SheetNames).toEqual(['Summary', 'Breakdown']);
  });

  it('renders a PDF document', async () => {
    const report = await generateReport('pdf', input);

    expect(report.mimeType).toBe('application/pdf');
    expect(report.content.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});
