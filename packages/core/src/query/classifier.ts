import { validateClassificationRules } from '@toolscout/schemas/src/validators.js';
import type { ClassificationRules } from '@toolscout/schemas/src/classification-rules.schema.js';
import type {
  ClassifiedQuery,
  QueryIntent,
  ToolDomain,
} from '@toolscout/shared/src/types/query.types.js';
import { compileWordPattern } from '@toolscout/shared/src/utils/word-pattern.js';
import defaultRulesData from './classification-rules.json' with { type: 'json' };

const MIN_QUERY_LENGTH = 2;
const MAX_SPECIAL_CHAR_RATIO = 0.3;

const SUBJECT_STOPLIST = compileWordPattern(
  '\\b(alternatives?|vs|versus|compare|features?|pricing|tutorial|guide|how|to|best|top|review)\\b',
  'g',
);
const COMPARISON_PAIR = compileWordPattern(
  '(\\w+(?:\\s+\\w+)*)\\s+(?:vs|versus)\\s+(\\w+(?:\\s+\\w+)*)',
  'i',
);
const SPECIAL_CHAR = /[^\p{L}\p{N}_\s]/gu;

interface CompiledRule<T> {
  readonly label: T;
  readonly patterns: readonly RegExp[];
}

export interface QueryClassifier {
  classify(text: string): ClassifiedQuery;
  validate(text: string): boolean;
}

function firstMatch<T>(rules: readonly CompiledRule<T>[], text: string, fallback: T): T {
  for (const rule of rules) {
    if (rule.patterns.some((pattern) => pattern.test(text))) {
      return rule.label;
    }
  }
  return fallback;
}

export function extractTargetSubject(text: string): string | null {
  const cleaned = text
    .toLowerCase()
    .replace(SUBJECT_STOPLIST, '')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned ? cleaned : null;
}

export function extractComparisonSubjects(text: string): readonly [string, string] | null {
  const match = COMPARISON_PAIR.exec(text);
  if (!match) {
    return null;
  }
  return Object.freeze([match[1].trim(), match[2].trim()] as const);
}

export function validateQuery(text: string): boolean {
  if (text.trim().length < MIN_QUERY_LENGTH) {
    return false;
  }

  const length = [...text].length;
  const specialCount = text.match(SPECIAL_CHAR)?.length ?? 0;
  return specialCount / length <= MAX_SPECIAL_CHAR_RATIO;
}

/**
 * Builds a classifier over ordered rule tables. Intent and domain are each
 * decided by the first rule (in table order) with any matching pattern.
 */
export function createQueryClassifier(rules: ClassificationRules): QueryClassifier {
  const intentRules: readonly CompiledRule<QueryIntent>[] = rules.intents.map((rule) => ({
    label: rule.intent,
    patterns: rule.patterns.map((source) => compileWordPattern(source)),
  }));
  const domainRules: readonly CompiledRule<ToolDomain>[] = rules.domains.map((rule) => ({
    label: rule.domain,
    patterns: rule.patterns.map((source) => compileWordPattern(source)),
  }));

  return {
    classify(text: string): ClassifiedQuery {
      const lowered = text.toLowerCase();
      const intent = firstMatch(intentRules, lowered, 'general');
      const domain = firstMatch(domainRules, lowered, 'general');

      return Object.freeze({
        originalQuery: text,
        intent,
        domain,
        targetSubject: extractTargetSubject(text),
        comparisonSubjects: intent === 'comparison' ? extractComparisonSubjects(text) : null,
      });
    },

    validate: validateQuery,
  };
}

export const defaultClassificationRules: ClassificationRules =
  validateClassificationRules(defaultRulesData);

const defaultClassifier = createQueryClassifier(defaultClassificationRules);

export function classifyQuery(text: string): ClassifiedQuery {
  return defaultClassifier.classify(text);
}
