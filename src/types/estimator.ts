// DQ Service Estimation Types

export type ResponseValue = number | string | boolean;

/**
 * Answers for one estimation run, keyed by question id
 */
export type ResponseSet = Record<string, ResponseValue>;

export type BreakdownComponent =
  | 'Base Service'
  | 'Workflow Complexity'
  | 'Data Integration'
  | 'DQ Rules Development'
  | 'Data Volume Impact'
  | 'Tool Setup'
  | 'Cloud Integration'
  | 'Additional Requirements';

// Evaluation order; also the key order of every breakdown
export const BREAKDOWN_COMPONENTS: readonly BreakdownComponent[] = [
  'Base Service',
  'Workflow Complexity',
  'Data Integration',
  'DQ Rules Development',
  'Data Volume Impact',
  'Tool Setup',
  'Cloud Integration',
  'Additional Requirements',
];

/**
 * Days contributed per component. Components contributing zero are omitted.
 */
export type Breakdown = Partial<Record<BreakdownComponent, number>>;

export interface EstimationResult {
  totalDays: number;
  breakdown: Breakdown;
}

/**
 * Field-level validation errors keyed by question id; empty means valid
 */
export type ValidationErrors = Record<string, string>;

export interface ProjectTimeline {
  teamSize: number;
  totalPersonDays: number;
  weeks?: number;
  sequentialWeeks?: number;
  parallelWeeks?: number;
}

// Response keys read by the engine, current name first
export const RESPONSE_KEYS = {
  tablesCount: ['tables_count', 'num_workflows'],
  workflowComplexity: ['workflow_complexity'],
  dataSources: ['data_sources', 'integration_complexity'],
  existingRules: ['existing_rules', 'dq_rules_status'],
  rulesCount: ['rules_count'],
  dataVolume: ['data_volume'],
  commercialTool: ['commercial_tool', 'dq_tool_status'],
  installationService: ['installation_service'],
  cloudPlatform: ['cloud_platform'],
  governanceMaturity: ['governance_maturity'],
  complianceReq: ['compliance_req'],
  historicalAnalysis: ['historical_analysis'],
  systemIntegration: ['system_integration'],
} as const;

// Fields the quick estimate flow insists on
export const QUICK_REQUIRED_FIELDS = ['tables_count', 'workflow_complexity', 'data_sources', 'existing_rules'];

// Fallbacks used when a label or coefficient cannot be resolved
export const ENGINE_DEFAULTS = {
  tablesCount: 1,
  workflowComplexity: 'Simple (single table/report)',
  workflowMultiplier: 2.0,
  integrationMultiplier: 0.0,
  existingRules: 'Not documented',
  existingRulesImpact: 5.0,
  baseRulesIncluded: 20,
  additionalRulesPer5: 0.5,
  commercialTool: 'No commercial tool',
  existingToolRate: 2.0,
  toolAcquisitionRate: 3.0,
  installationService: 'No, not needed',
  cloudPlatform: 'Not applicable',
  governanceSetup: 3.0,
  compliance: 2.0,
  historicalAnalysisPerTable: 2.0,
  systemIntegration: 3.0,
};

// Pre-catalogue tool labels still accepted from older response sets
export const LEGACY_TOOL_LABELS = ['Have existing DQ tool', 'Need other tool'];
