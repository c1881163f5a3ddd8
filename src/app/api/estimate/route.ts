import { NextRequest, NextResponse } from 'next/server';
import { v4 as uuidv4 } from 'uuid';
import type { QuestionSpec } from '@/types/config';
import { canViewBreakdown, estimateRequestSchema, runEstimate } from '@/lib/api/estimate-request';
import { toErrorResponse } from '@/lib/api/errors';
import { calculateConfidence, calculateProjectTimeline, explainCalculation } from '@/lib/calculator';
import { getConfigLoader } from '@/lib/config/loader';
import { calculateTotalCost } from '@/lib/pricing';

export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  try {
    const body = estimateRequestSchema.parse(await request.json());
    const config = getConfigLoader().get();

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

    const { responses, result, pricePerDay } = outcome;
    const showBreakdown = canViewBreakdown(config.securityConfig, body.breakdownPassword);

    return NextResponse.json({
      success: true,
      data: {
        estimateId: uuidv4(),
        mode: body.mode,
        tier: body.tier,
        totalDays: result.totalDays,
        breakdown: showBreakdown ? result.breakdown : undefined,
        breakdownProtected: !showBreakdown,
        pricePerDay,
        totalCost: calculateTotalCost(result.totalDays, pricePerDay),
        currency: config.pricingConfig.currency,
        currencySymbol: config.pricingConfig.currencySymbol,
        confidence: calculateConfidence(responses, result.totalDays, Object.keys(config.questions).length),
        timeline: calculateProjectTimeline(result.totalDays, body.teamSize),
        explanation: showBreakdown
          ? explainCalculation(responses, result.breakdown, config.calculationRules)
          : undefined,
      },
    });
  } catch (error) {
    console.error('Estimation error:', error);
    return toErrorResponse(error, 'Failed to generate estimate');
  }
}

export async function GET(request: NextRequest) {
  try {
    const tier = request.nextUrl.searchParams.get('tier') ?? 'advanced';
    const loader = getConfigLoader();
    const config = loader.get();

    const sections: Record<string, QuestionSpec[]> = {};
    for (const [section, questionIds] of Object.entries(loader.getQuestionsBySection(tier))) {
      sections[section] = questionIds.map(id => config.questions[id]);
    }

    return NextResponse.json({
      success: true,
      data: {
        tier,
        level: config.complexityLevels[tier],
        sections,
        quickEstimate: {
          title: config.quickEstimateConfig.title,
          coreQuestions: config.quickEstimateConfig.coreQuestions,
        },
        pricing: config.pricingConfig,
        description: 'POST responses to receive a working-day estimate',
      },
    });
  } catch (error) {
    console.error('Estimate questions error:', error);
    return toErrorResponse(error, 'Failed to load questions');
  }
}
