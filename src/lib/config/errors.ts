export type ConfigurationErrorKind = 'source' | 'syntax' | 'validation';

/**
 * Raised when a configuration document cannot be read, parsed or validated.
 * Validation failures carry every violation found, not just the first.
 */
export class ConfigurationError extends Error {
  readonly kind: ConfigurationErrorKind;
  readonly violations: string[];

  constructor(kind: ConfigurationErrorKind, message: string, violations: string[] = []) {
    super(violations.length > 0 ? `${message}:\n${violations.map(v => `- ${v}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.kind = kind;
    this.violations = violations;
  }
}

export class UnknownTierError extends Error {
  readonly tier: string;

  constructor(tier: string, available: string[]) {
    super(`Unknown complexity level: ${tier}. Available: ${available.join(', ')}`);
    this.name = 'UnknownTierError';
    this.tier = tier;
  }
}
