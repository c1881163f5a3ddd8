import { ALL_QUESTIONS, type CalculatorConfig, type QuestionSpec } from '@/types/config';
import type { ResponseSet } from '@/types/estimator';
import { UnknownTierError } from './errors';

/**
 * Look up a declared question; keys inherited from Object.prototype are not questions
 */
export function getQuestion(config: CalculatorConfig, questionId: string): QuestionSpec | undefined {
  return Object.prototype.hasOwnProperty.call(config.questions, questionId) ? config.questions[questionId] : undefined;
}

/**
 * Get the ordered list of question ids shown for a complexity level
 */
export function getQuestionsForTier(config: CalculatorConfig, tier: string): string[] {
  const level = Object.prototype.hasOwnProperty.call(config.complexityLevels, tier)
    ? config.complexityLevels[tier]
    : undefined;
  if (!level) {
    throw new UnknownTierError(tier, Object.keys(config.complexityLevels));
  }

  if (level.showQuestions === ALL_QUESTIONS) {
    return Object.keys(config.questions);
  }
  return [...level.showQuestions];
}

/**
 * Get the questions of a complexity level grouped by section, in section
 * declaration order. Sections without a visible question are left out.
 */
export function getQuestionsBySection(config: CalculatorConfig, tier: string): Record<string, string[]> {
  const visible = getQuestionsForTier(config, tier);
  const sections: Record<string, string[]> = {};

  for (const section of config.uiSections) {
    const questionIds = visible.filter(id => getQuestion(config, id)?.section === section.name);
    if (questionIds.length > 0) {
      sections[section.name] = questionIds;
    }
  }

  return sections;
}

/**
 * Check whether a question should be shown given the answers so far
 */
export function shouldShowQuestion(config: CalculatorConfig, questionId: string, responses: ResponseSet): boolean {
  const question = getQuestion(config, questionId);
  if (!question) {
    return false;
  }

  if (question.dependsOn) {
    if (!(question.dependsOn in responses)) {
      return false;
    }
    if (responses[question.dependsOn] !== question.dependsValue) {
      return false;
    }
  }

  return true;
}
