// Narrative report sections
// Markdown text blocks shared by the Excel and PDF reports.

import type { CalculatorConfig } from '@/types/config';
import { BREAKDOWN_COMPONENTS, ENGINE_DEFAULTS, RESPONSE_KEYS, type ResponseSet } from '@/types/estimator';
import { resolveTablesCount, sumBreakdown } from '@/lib/calculator/engine';
import { lookupCoefficient, resolveFlag, resolveLabel } from '@/lib/calculator/resolve';
import { formatCurrency } from '@/lib/pricing';
import type { ReportInput } from './base-report';

export interface RiskItem {
  risk: string;
  mitigation: string;
}

export interface NarrativeSection {
  id: 'executive_summary' | 'calculation_explanation' | 'methodology' | 'risk_assessment';
  title: string;
  body: string;
}

const MULTI_SOURCE_LABELS = ['Multiple locations (2-3 sources)', 'Complex integration (4+ sources)'];

function installationDays(responses: ResponseSet, config: CalculatorConfig): number {
  const installation = resolveLabel(responses, RESPONSE_KEYS.installationService, ENGINE_DEFAULTS.installationService);
  return lookupCoefficient(installation, [config.calculationRules.installationService], 0);
}

export function generateExecutiveSummary(input: ReportInput): string {
  const { config, responses, totalDays, breakdown, pricePerDay } = input;
  const totalCost = formatCurrency(totalDays * pricePerDay, config.pricingConfig, 0);
  const company = config.reportConfig.companyInfo.name;

  const lines: string[] = ['## EXECUTIVE SUMMARY', ''];
  lines.push('**Project:** Data Quality Services Implementation');
  if (config.reportConfig.includeCompanyBranding && company) {
    lines.push(`**Prepared by:** ${company}`);
  }
  lines.push(`**Scope:** ${resolveTablesCount(responses)} table(s)/workflow(s)`);
  lines.push(`**Total Estimate:** ${totalDays} working days (${totalCost})`, '');

  lines.push('### Key Estimation Drivers');
  const drivers: string[] = [];

  const complexity = resolveLabel(responses, RESPONSE_KEYS.workflowComplexity, ENGINE_DEFAULTS.workflowComplexity);
  if (complexity.includes('Complex')) {
    drivers.push(`- **Complexity:** complex workflows add ${(breakdown['Workflow Complexity'] ?? 0).toFixed(1)} days`);
  }

  const sources = resolveLabel(responses, RESPONSE_KEYS.dataSources, '');
  if (sources.includes('Multiple') || sources.includes('Complex')) {
    drivers.push(`- **Integration:** multiple data sources add ${(breakdown['Data Integration'] ?? 0).toFixed(1)} days`);
  }

  if (resolveLabel(responses, RESPONSE_KEYS.existingRules, ENGINE_DEFAULTS.existingRules) === 'Not documented') {
    drivers.push(
      `- **Documentation:** undocumented rules add ${(breakdown['DQ Rules Development'] ?? 0).toFixed(1)} days`
    );
  }

  if (installationDays(responses, config) > 0) {
    drivers.push(`- **Tooling:** installation service adds ${(breakdown['Tool Setup'] ?? 0).toFixed(1)} days`);
  }

  lines.push(...(drivers.length > 0 ? drivers : ['- Standard scope with no additional drivers']), '');

  lines.push('### Next Steps');
  lines.push('1. Validate the estimate with the technical team');
  lines.push('2. Define the detailed schedule');
  lines.push('3. Start the first methodology phase');

  return lines.join('\n');
}

export function generateCalculationExplanation(input: ReportInput): string {
  const { config, responses, breakdown } = input;
  const rules = config.calculationRules;
  const tablesCount = resolveTablesCount(responses);
  const sum = sumBreakdown(breakdown);

  const lines: string[] = ['## DETAILED CALCULATION', ''];

  for (const component of BREAKDOWN_COMPONENTS) {
    const days = breakdown[component] ?? 0;
    if (days <= 0) continue;

    const share = sum > 0 ? (days / sum) * 100 : 0;
    lines.push(`#### ${component}: ${days.toFixed(1)} days (${share.toFixed(1)}%)`);

    switch (component) {
      case 'Base Service':
        lines.push(`**Calculation:** ${rules.baseServiceDays} base days, always included`);
        break;
      case 'Workflow Complexity': {
        const label = resolveLabel(responses, RESPONSE_KEYS.workflowComplexity, ENGINE_DEFAULTS.workflowComplexity);
        const multiplier = lookupCoefficient(label, [rules.workflowMultipliers], ENGINE_DEFAULTS.workflowMultiplier);
        lines.push(`**Calculation:** ${tablesCount} tables × ${multiplier} days = ${days.toFixed(1)} days`);
        lines.push(`**Selected complexity:** ${label}`);
        break;
      }
      case 'Data Integration': {
        const label = resolveLabel(responses, RESPONSE_KEYS.dataSources, '');
        const multiplier = lookupCoefficient(
          label,
          [rules.integrationComplexity, rules.integrationComplexityLegacy],
          ENGINE_DEFAULTS.integrationMultiplier
        );
        lines.push(`**Calculation:** ${tablesCount} tables × ${multiplier} days = ${days.toFixed(1)} days`);
        lines.push(`**Integration type:** ${label}`);
        break;
      }
      case 'DQ Rules Development': {
        const status = resolveLabel(responses, RESPONSE_KEYS.existingRules, ENGINE_DEFAULTS.existingRules);
        const base = lookupCoefficient(status, [rules.existingRulesImpact], ENGINE_DEFAULTS.existingRulesImpact);
        lines.push(`**Calculation:** ${base} base days + additional rules overhead = ${days.toFixed(1)} days`);
        lines.push(`**Current status:** ${status}`);
        break;
      }
      case 'Additional Requirements': {
        const costs = rules.additionalRequirements;
        if (!resolveFlag(responses, RESPONSE_KEYS.governanceMaturity)) {
          lines.push(`- Governance setup: ${lookupCoefficient('governance_setup', [costs], ENGINE_DEFAULTS.governanceSetup)} days`);
        }
        if (resolveFlag(responses, RESPONSE_KEYS.complianceReq)) {
          lines.push(`- Compliance requirements: ${lookupCoefficient('compliance', [costs], ENGINE_DEFAULTS.compliance)} days`);
        }
        if (resolveFlag(responses, RESPONSE_KEYS.historicalAnalysis)) {
          const perTable = lookupCoefficient(
            'historical_analysis_per_table',
            [costs],
            ENGINE_DEFAULTS.historicalAnalysisPerTable
          );
          lines.push(`- Historical analysis: ${tablesCount * perTable} days`);
        }
        if (resolveFlag(responses, RESPONSE_KEYS.systemIntegration)) {
          lines.push(
            `- System integration: ${lookupCoefficient('system_integration', [costs], ENGINE_DEFAULTS.systemIntegration)} days`
          );
        }
        break;
      }
      default:
        break;
    }

    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

export function generateMethodologySection(config: CalculatorConfig): string {
  const phases = Object.values(config.methodologyPhases);
  const lines: string[] = ['## METHODOLOGY', ''];

  if (phases.length === 0) {
    lines.push('No methodology phases configured.');
    return lines.join('\n');
  }

  for (const phase of phases) {
    lines.push(`#### ${phase.title}`);
    for (const line of phase.description.trim().split('\n')) {
      if (line.trim()) {
        lines.push(line.trim());
      }
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

/**
 * Risks raised by the answers and the size of the estimate
 */
export function assessRisks(responses: ResponseSet, totalDays: number): RiskItem[] {
  const risks: RiskItem[] = [];

  if (responses.existing_rules === 'Not documented') {
    risks.push({
      risk: 'Existing rules are not documented',
      mitigation: 'Allow time for documenting and validating the rules',
    });
  }

  if (typeof responses.data_sources === 'string' && MULTI_SOURCE_LABELS.includes(responses.data_sources)) {
    risks.push({
      risk: 'Integration across multiple data sources',
      mitigation: 'Plan alignment sessions with the owners of each source',
    });
  }

  if (responses.governance_maturity === false) {
    risks.push({
      risk: 'No established governance processes',
      mitigation: 'Include governance setup in the project scope',
    });
  }

  if (totalDays > 30) {
    risks.push({
      risk: 'Long project duration',
      mitigation: 'Split the work into smaller phases with intermediate deliverables',
    });
  }

  return risks;
}

export function generateRiskAssessment(responses: ResponseSet, totalDays: number): string {
  const risks = assessRisks(responses, totalDays);
  const lines: string[] = ['## RISK ASSESSMENT', '', '### Identified Risks'];

  if (risks.length === 0) {
    lines.push('No significant risks identified for this project.');
  } else {
    risks.forEach((item, index) => lines.push(`${index + 1}. **${item.risk}**`));
  }

  lines.push('', '### Mitigation Strategies');
  if (risks.length === 0) {
    lines.push('The project has a low risk profile.');
  } else {
    risks.forEach((item, index) => lines.push(`${index + 1}. ${item.mitigation}`));
  }

  return lines.join('\n');
}

/**
 * Sections enabled by report_config, in report order
 */
export function buildNarrativeSections(input: ReportInput): NarrativeSection[] {
  const flags = input.config.reportConfig;
  const sections: NarrativeSection[] = [];

  if (flags.includeExecutiveSummary) {
    sections.push({ id: 'executive_summary', title: 'Executive Summary', body: generateExecutiveSummary(input) });
  }
  if (flags.includeCalculationExplanation) {
    sections.push({
      id: 'calculation_explanation',
      title: 'Detailed Calculation',
      body: generateCalculationExplanation(input),
    });
  }
  if (flags.includeMethodology) {
    sections.push({ id: 'methodology', title: 'Methodology', body: generateMethodologySection(input.config) });
  }
  if (flags.includeRiskAssessment) {
    sections.push({
      id: 'risk_assessment',
      title: 'Risk Assessment',
      body: generateRiskAssessment(input.responses, input.totalDays),
    });
  }

  return sections;
}

/**
 * Strip markdown emphasis and heading marks for plain renderers
 */
export function toPlainText(markdown: string): string {
  return markdown
    .split('\n')
    .map(line => line.replace(/^#+\s*/, '').replace(/\*\*/g, ''))
    .join('\n');
}
