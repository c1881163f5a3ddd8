import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import type { CalculatorConfig } from '@/types/config';
import { toErrorResponse } from '@/lib/api/errors';
import { getConfigLoader } from '@/lib/config/loader';
import { getQuestionsForTier } from '@/lib/config/queries';
import { getPhaseDescriptions, getReportFormatInfo } from '@/lib/reports';

export const runtime = 'nodejs';

const configActionSchema = z.object({
  action: z.literal('reload'),
});

function describeConfig(config: CalculatorConfig) {
  const tiers: Record<string, { title: string; label: string; description: string; questions: string[] }> = {};
  for (const [tierId, level] of Object.entries(config.complexityLevels)) {
    tiers[tierId] = {
      title: level.title,
      label: level.label,
      description: level.description,
      questions: getQuestionsForTier(config, tierId),
    };
  }

  return {
    sourceFile: config.sourceFile,
    app: config.appConfig,
    tiers,
    quickEstimate: config.quickEstimateConfig,
    sections: config.uiSections,
    questions: config.questions,
    methodology: getPhaseDescriptions(config),
    exportFormats: getReportFormatInfo(config),
  };
}

export async function GET() {
  try {
    const config = getConfigLoader().get();
    return NextResponse.json({ success: true, data: describeConfig(config) });
  } catch (error) {
    console.error('Config error:', error);
    return toErrorResponse(error, 'Failed to load configuration');
  }
}

export async function POST(request: NextRequest) {
  try {
    configActionSchema.parse(await request.json());
    const config = getConfigLoader().reload();
    return NextResponse.json({ success: true, data: describeConfig(config) });
  } catch (error) {
    console.error('Config reload error:', error);
    return toErrorResponse(error, 'Failed to reload configuration');
  }
}
