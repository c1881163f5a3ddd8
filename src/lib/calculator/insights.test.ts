import { describe, expect, it } from 'vitest';
import { loadDefaultConfig, SCENARIO_RESPONSES } from '@/test/fixtures';
import { calculateWorkingDays } from './engine';
import { buildQuickResponses, calculateConfidence, calculateProjectTimeline, explainCalculation } from './insights';

const config = loadDefaultConfig();
const rules = config.calculationRules;

describe('explainCalculation', () => {
  it('lists each contributing component with its driver', () => {
    const { breakdown } = calculateWorkingDays(SCENARIO_RESPONSES, rules);

    expect(explainCalculation(SCENARIO_RESPONSES, breakdown, rules)).toBe(
      [
        '**Calculation Breakdown:**',
        '',
        '📊 **Project Scope:** 3 table(s)/workflow(s)',
        '',
        '• **Base Service:** 9.0 days',
        '  - Core DQ methodology implementation',
        '',
        '• **Workflow Complexity:** 12.0 days',
        '  - Complex (multiple tables/joins): 3 × 4.0 days each',
        '',
        '• **Data Integration:** 9.0 days',
        '  - Complex integration (4+ sources)',
        '',
        '• **DQ Rules Development:** 5.0 days',
        '  - Rules status: Not documented',
        '',
        '• **Additional Requirements:** 3.0 days',
        '',
        '**Total Estimated Days:** 38 days',
        '**Minimum Project Threshold:** 5 days',
      ].join('\n')
    );
  });

  it('notes the installation service under tool setup', () => {
    const responses = { ...SCENARIO_RESPONSES, installation_service: 'Yes, please provide installation' };
    const { breakdown } = calculateWorkingDays(responses, rules);
    const lines = explainCalculation(responses, breakdown, rules).split('\n');

    expect(lines).toContain('• **Tool Setup:** 10.0 days');
    expect(lines).toContain('  - Includes installation service (~10 days)');
  });
});

describe('calculateConfidence', () => {
  it('adds the answered share to the base confidence', () => {
    const responses = { a: 1, b: 2, c: 3, d: 4, existing_rules: 'Not documented' };

    expect(calculateConfidence(responses, 20, 10)).toBeCloseTo(0.8);
  });

  it('rewards fully documented rules and caps at 1', () => {
    const responses: Record<string, string> = { existing_rules: 'Fully documented and validated' };
    for (let i = 0; i < 9; i++) {
      responses[`q${i}`] = 'x';
    }

    expect(calculateConfidence(responses, 20, 10)).toBeCloseTo(1);
  });

  it('penalises very large and very small projects', () => {
    expect(calculateConfidence({}, 60, 10)).toBeCloseTo(0.6);
    expect(calculateConfidence({}, 4, 10)).toBeCloseTo(0.6);
  });

  it('keeps the base when no questions are configured', () => {
    expect(calculateConfidence({ tables_count: 3 }, 20, 0)).toBeCloseTo(0.7);
  });
});

describe('calculateProjectTimeline', () => {
  it('reports weeks for a single person', () => {
    expect(calculateProjectTimeline(38)).toEqual({ teamSize: 1, totalPersonDays: 38, weeks: 7.6 });
  });

  it('reports sequential and parallel weeks for a team', () => {
    expect(calculateProjectTimeline(38, 2)).toEqual({
      teamSize: 2,
      totalPersonDays: 38,
      sequentialWeeks: 7.6,
      parallelWeeks: 3.8,
    });
    expect(calculateProjectTimeline(10, 3).parallelWeeks).toBe(0.7);
  });
});

describe('buildQuickResponses', () => {
  it('overlays answers on the configured defaults', () => {
    const responses = buildQuickResponses(
      { tables_count: 4, workflow_complexity: 'Complex (multiple tables/joins)' },
      config.quickEstimateConfig
    );

    expect(responses.tables_count).toBe(4);
    expect(responses.workflow_complexity).toBe('Complex (multiple tables/joins)');
    expect(responses.data_sources).toBe('Single location (same database/schema)');
    expect(responses.rules_count).toBe(15);
  });
});
