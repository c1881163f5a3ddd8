import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { canViewBreakdown, estimateRequestSchema, runEstimate } from '@/lib/api/estimate-request';
import { toErrorResponse } from '@/lib/api/errors';
import { getConfigLoader } from '@/lib/config/loader';
import { generateReport, generateReports, getAvailableFormats, getReportGenerator } from '@/lib/reports';

export const runtime = 'nodejs';

const exportRequestSchema = estimateRequestSchema.extend({
  format: z.string().optional(),
  formats: z.array(z.string()).min(1).optional(),
});

export async function POST(request: NextRequest) {
  try {
    const body = exportRequestSchema.parse(await request.json());
    const config = getConfigLoader().get();

    // Every export carries the breakdown
    if (!canViewBreakdown(config.securityConfig, body.breakdownPassword)) {
      return NextResponse.json({ error: 'A valid breakdown password is required to export' }, { status: 403 });
    }

    const outcome = runEstimate(config, body);
    if (outcome.status === 'invalid') {
      return NextResponse.json(
        { error: 'Validation failed', validationErrors: outcome.validationErrors },
        { status: 422 }
      );
    }
    if (outcome.status === 'price_rejected') {
      return NextResponse.json({ error: outcome.error }, { status: 400 });
    }

    const input = {
      config,
      responses: outcome.responses,
      totalDays: outcome.result.totalDays,
      breakdown: outcome.result.breakdown,
      pricePerDay: outcome.pricePerDay,
    };

    // Single format: return the document itself
    if (body.format) {
      const generator = getReportGenerator(body.format);
      if (!generator || !getAvailableFormats(config).includes(generator.id)) {
        return NextResponse.json(
          { error: `Unsupported export format: ${body.format}. Available: ${getAvailableFormats(config).join(', ')}` },
          { status: 400 }
        );
      }

      const report = await generateReport(generator.id, input);
      return new NextResponse(new Uint8Array(report.content), {
        status: 200,
        headers: {
          'Content-Type': report.mimeType,
          'Content-Disposition': `attachment; filename="${report.fileName}"`,
        },
      });
    }

    const outcomes = await generateReports(body.formats ?? getAvailableFormats(config), input);
    const documents: Record<string, { fileName: string; mimeType: string; content: string }> = {};
    const errors: Record<string, string> = {};

    for (const [format, result] of Object.entries(outcomes)) {
      if (result.ok) {
        documents[format] = {
          fileName: result.result.fileName,
          mimeType: result.result.mimeType,
          content: result.result.content.toString('base64'),
        };
      } else {
        errors[format] = result.error;
      }
    }

    return NextResponse.json({
      success: true,
      data: { totalDays: outcome.result.totalDays, documents, errors },
    });
  } catch (error) {
    console.error('Export error:', error);
    return toErrorResponse(error, 'Failed to export estimate');
  }
}
