import PDFDocument from 'pdfkit';
import type { ReportFormat } from '@/types/config';
import { formatCurrency } from '@/lib/pricing';
import { BaseReportGenerator, type ReportInput } from './base-report';
import { buildBreakdownTable, formatTimestamp } from './breakdown';
import { buildNarrativeSections, toPlainText } from './narrative';

const MARGIN = 72;
const PAGE_BOTTOM = 700;

function sectionHeader(doc: PDFKit.PDFDocument, title: string): void {
  if (doc.y > PAGE_BOTTOM - 60) {
    doc.addPage();
  }
  doc.moveDown(0.5);
  doc.fontSize(14).font('Helvetica-Bold').fillColor('#1f3a93').text(title.toUpperCase());
  doc.moveDown(0.5);
  doc.fontSize(10).font('Helvetica').fillColor('#000000');
}

/**
 * Render the estimate to a PDF: title, breakdown table, then each narrative
 * section enabled in report_config.
 */
export function renderEstimatePdf(input: ReportInput): Promise<Buffer> {
  const { config, totalDays, breakdown, pricePerDay } = input;
  const generatedAt = input.generatedAt ?? new Date();

  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'A4',
        margins: { top: MARGIN, bottom: 18, left: MARGIN, right: MARGIN },
        info: {
          Title: 'Data Quality Service Estimate',
          Author: config.reportConfig.companyInfo.name || config.appConfig.title,
          Subject: 'Estimation Report',
          CreationDate: generatedAt,
        },
      });

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      // Title
      doc.fontSize(18).font('Helvetica-Bold').fillColor('#1f3a93');
      doc.text('DATA QUALITY SERVICE ESTIMATE', { align: 'center' });
      doc.moveDown(0.5);
      doc.fontSize(10).font('Helvetica').fillColor('#666666');
      const byline = config.reportConfig.includeCompanyBranding && config.reportConfig.companyInfo.name
        ? `${config.reportConfig.companyInfo.name} - `
        : '';
      doc.text(`${byline}${formatTimestamp(generatedAt, config.exportConfig.timestampFormat)}`, { align: 'center' });
      doc.moveDown(1.5);

      // Breakdown table
      sectionHeader(doc, 'Calculation Breakdown');
      const columns = [200, 70, 80, 100];
      const startX = MARGIN;
      const headers = ['Component', 'Days', 'Percentage', `Cost (${config.pricingConfig.currencySymbol})`];

      doc.font('Helvetica-Bold');
      let y = doc.y;
      let x = startX;
      headers.forEach((header, index) => {
        doc.text(header, x, y, { width: columns[index] });
        x += columns[index];
      });
      doc.moveDown(0.3);
      doc.moveTo(startX, doc.y).lineTo(startX + 450, doc.y).stroke('#cccccc');
      doc.moveDown(0.3);

      doc.font('Helvetica');
      const rows = buildBreakdownTable(breakdown, totalDays, pricePerDay).map(row => [
        row.component,
        row.rawDays.toFixed(1),
        row.percentage,
        formatCurrency(row.cost, config.pricingConfig, 0),
      ]);
      rows.push(['TOTAL', String(totalDays), '100.0%', formatCurrency(totalDays * pricePerDay, config.pricingConfig, 0)]);

      for (const row of rows) {
        if (doc.y > PAGE_BOTTOM) {
          doc.addPage();
        }
        y = doc.y;
        x = startX;
        row.forEach((cell, index) => {
          doc.text(cell, x, y, { width: columns[index] });
          x += columns[index];
        });
        doc.moveDown(0.3);
      }
      doc.x = startX;

      for (const section of buildNarrativeSections(input)) {
        sectionHeader(doc, section.title);
        // The heading is already printed; drop the section's own title line
        const body = toPlainText(section.body).split('\n').slice(1).join('\n').trim();
        doc.text(body, { lineGap: 2 });
      }

      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

export class PdfReportGenerator extends BaseReportGenerator {
  readonly id: ReportFormat = 'pdf';
  readonly name = 'PDF';
  readonly description = 'Printable report with breakdown and narrative sections';
  readonly mimeType = 'application/pdf';
  readonly fileExtension = 'pdf';

  protected render(input: ReportInput): Promise<Buffer> {
    return renderEstimatePdf(input);
  }
}

export const pdfReportGenerator = new PdfReportGenerator();
