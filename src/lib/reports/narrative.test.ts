import { describe, expect, it } from 'vitest';
import { calculateWorkingDays } from '@/lib/calculator/engine';
import { loadDefaultConfig, SCENARIO_RESPONSES } from '@/test/fixtures';
import type { ReportInput } from './base-report';
import {
  assessRisks,
  buildNarrativeSections,
  generateCalculationExplanation,
  generateExecutiveSummary,
  generateMethodologySection,
  generateRiskAssessment,
  toPlainText,
} from './narrative';

const config = loadDefaultConfig();
const result = calculateWorkingDays(SCENARIO_RESPONSES, config.calculationRules);

const input: ReportInput = {
  config,
  responses: SCENARIO_RESPONSES,
  totalDays: result.totalDays,
  breakdown: result.breakdown,
  pricePerDay: 700,
};

describe('generateExecutiveSummary', () => {
  const lines = generateExecutiveSummary(input).split('\n');

  it('states scope, total and company', () => {
    expect(lines).toContain('**Prepared by:** Data Quality Services');
    expect(lines).toContain('**Scope:** 3 table(s)/workflow(s)');
    expect(lines).toContain('**Total Estimate:** 38 working days (€26,600)');
  });

  it('lists the drivers raised by the answers', () => {
    expect(lines).toContain('- **Complexity:** complex workflows add 12.0 days');
    expect(lines).toContain('- **Integration:** multiple data sources add 9.0 days');
    expect(lines).toContain('- **Documentation:** undocumented rules add 5.0 days');
    expect(lines.some(line => line.startsWith('- **Tooling:**'))).toBe(false);
  });

  it('falls back to a standard-scope line', () => {
    const simple = {
      tables_count: 1,
      workflow_complexity: 'Simple (single table/report)',
      data_sources: 'Single location (same database/schema)',
      existing_rules: 'Partially documented',
    };
    const text = generateExecutiveSummary({ ...input, responses: simple });

    expect(text.split('\n')).toContain('- Standard scope with no additional drivers');
  });
});

describe('generateCalculationExplanation', () => {
  it('shows the multiplier behind each scaled component', () => {
    const lines = generateCalculationExplanation(input).split('\n');

    expect(lines).toContain('#### Workflow Complexity: 12.0 days (31.6%)');
    expect(lines).toContain('**Calculation:** 3 tables × 4 days = 12.0 days');
    expect(lines).toContain('**Calculation:** 3 tables × 3 days = 9.0 days');
    expect(lines).toContain('- Governance setup: 3 days');
  });
});

describe('generateMethodologySection', () => {
  it('renders every configured phase', () => {
    const lines = generateMethodologySection(config).split('\n');

    expect(lines).toContain('#### Phase 3: Implementation');
    expect(lines).toContain('Training and handover to the client team');
  });

  it('handles a configuration without phases', () => {
    expect(generateMethodologySection({ ...config, methodologyPhases: {} })).toBe(
      '## METHODOLOGY\n\nNo methodology phases configured.'
    );
  });
});

describe('risk assessment', () => {
  it('raises risks from the answers and the size', () => {
    expect(assessRisks(SCENARIO_RESPONSES, 38).map(item => item.risk)).toEqual([
      'Existing rules are not documented',
      'Integration across multiple data sources',
      'No established governance processes',
      'Long project duration',
    ]);
  });

  it('does not treat an absent governance answer as a risk', () => {
    expect(assessRisks({ existing_rules: 'Partially documented' }, 10)).toEqual([]);
  });

  it('describes a low-risk project', () => {
    expect(generateRiskAssessment({ governance_maturity: true }, 10)).toBe(
      [
        '## RISK ASSESSMENT',
        '',
        '### Identified Risks',
        'No significant risks identified for this project.',
        '',
        '### Mitigation Strategies',
        'The project has a low risk profile.',
      ].join('\n')
    );
  });
});

describe('buildNarrativeSections', () => {
  it('follows the report_config flags', () => {
    const trimmed = { ...config, reportConfig: { ...config.reportConfig, includeMethodology: false } };

    expect(buildNarrativeSections({ ...input, config: trimmed }).map(section => section.id)).toEqual([
      'executive_summary',
      'calculation_explanation',
      'risk_assessment',
    ]);
  });
});

describe('toPlainText', () => {
  it('strips heading marks and bold markers', () => {
    expect(toPlainText('## Title\n**Bold** text')).toBe('Title\nBold text');
  });
});
