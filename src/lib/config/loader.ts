/**
 * Configuration Loader
 *
 * Reads the calculator configuration (YAML or JSON, chosen by extension),
 * maps it onto the typed model and validates the whole graph. A loaded
 * configuration is an immutable snapshot; reload() swaps in a new one.
 */

import fs from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { CalculatorConfig } from '@/types/config';
import type { ResponseSet } from '@/types/estimator';
import { ConfigurationError } from './errors';
import { getQuestionsBySection, getQuestionsForTier, shouldShowQuestion } from './queries';
import { configDocumentSchema, formatSchemaIssues, mapConfigDocument } from './schema';
import { validateConfig } from './validate';

export function getDefaultConfigPath(): string {
  return process.env.CALCULATOR_CONFIG_PATH || path.join(process.cwd(), 'config', 'calculator.yaml');
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Read and parse a configuration file without interpreting it
 */
export function readConfigDocument(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError('source', `Configuration file not found: ${configPath}`);
  }

  const extension = path.extname(configPath).toLowerCase();
  if (!['.yml', '.yaml', '.json'].includes(extension)) {
    throw new ConfigurationError('source', `Unsupported configuration file format: ${extension || '(none)'}`);
  }

  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('source', `Cannot read configuration file ${configPath}: ${reason}`);
  }

  try {
    return extension === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('syntax', `Invalid configuration file format: ${reason}`);
  }
}

/**
 * Turn a parsed document into a validated, frozen configuration
 */
export function parseConfig(raw: unknown, sourceFile = 'inline'): CalculatorConfig {
  const document = raw ?? {};
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigurationError('validation', 'Configuration validation errors', [
      'Configuration document must be a mapping of sections',
    ]);
  }

  const parsed = configDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError('validation', 'Configuration validation errors', formatSchemaIssues(parsed.error));
  }

  const config = mapConfigDocument(parsed.data, sourceFile);
  const violations = validateConfig(config);
  if (violations.length > 0) {
    throw new ConfigurationError('validation', 'Configuration validation errors', violations);
  }

  return deepFreeze(config);
}

export class ConfigLoader {
  readonly configPath: string;
  private snapshot: CalculatorConfig | null = null;

  constructor(configPath: string = getDefaultConfigPath()) {
    this.configPath = configPath;
  }

  /**
   * Load the configuration, returning the cached snapshot unless `reload` is set.
   * A failed reload leaves the previous snapshot in place.
   */
  load(options: { reload?: boolean } = {}): CalculatorConfig {
    if (this.snapshot && !options.reload) {
      return this.snapshot;
    }

    const next = parseConfig(readConfigDocument(this.configPath), path.basename(this.configPath));
    this.snapshot = next;

    console.info(
      `${options.reload ? 'Reloaded' : 'Loaded'} configuration from ${this.configPath} ` +
        `(${Object.keys(next.questions).length} questions, ${Object.keys(next.complexityLevels).length} complexity levels)`
    );

    return next;
  }

  reload(): CalculatorConfig {
    return this.load({ reload: true });
  }

  /**
   * Current snapshot; loads on first use
   */
  get(): CalculatorConfig {
    return this.load();
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  getQuestionsForTier(tier: string): string[] {
    return getQuestionsForTier(this.get(), tier);
  }

  getQuestionsBySection(tier = 'advanced'): Record<string, string[]> {
    return getQuestionsBySection(this.get(), tier);
  }

  shouldShowQuestion(questionId: string, responses: ResponseSet): boolean {
    return shouldShowQuestion(this.get(), questionId, responses);
  }
}

let configLoader: ConfigLoader | null = null;

/**
 * Process-wide loader. Passing a path replaces the current loader.
 */
export function getConfigLoader(configPath?: string): ConfigLoader {
  if (!configLoader || configPath !== undefined) {
    configLoader = new ConfigLoader(configPath);
  }
  return configLoader;
}

export function loadConfig(configPath?: string, reload = false): CalculatorConfig {
  return getConfigLoader(configPath).load({ reload });
}
