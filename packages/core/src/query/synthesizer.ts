import type {
  ClassifiedQuery,
  QueryIntent,
  SynthesizedQueries,
  ToolDomain,
} from '@toolscout/shared/src/types/query.types.js';

type TemplateTable = Readonly<Partial<Record<QueryIntent, Partial<Record<ToolDomain, string>>>>>;

export const GENERIC_TEMPLATE = '{tool} developer tools software';

export const SEARCH_TEMPLATES: TemplateTable = {
  alternatives: {
    monitoring: '{tool} alternatives monitoring logging observability',
    ci_cd: '{tool} alternatives CI CD pipeline deployment',
    database: '{tool} alternatives database management',
    cloud: '{tool} alternatives cloud infrastructure',
    machine_learning: '{tool} alternatives machine learning AI',
    frontend: '{tool} alternatives frontend framework UI',
    backend: '{tool} alternatives backend API framework',
    devops: '{tool} alternatives devops deployment',
    security: '{tool} alternatives security authentication',
    testing: '{tool} alternatives testing framework',
    general: '{tool} alternatives similar tools',
  },
  comparison: {
    general: '{tool1} vs {tool2} comparison features pricing',
  },
  features: {
    general: '{tool} features capabilities documentation',
  },
  pricing: {
    general: '{tool} pricing cost plans pricing model',
  },
  tutorial: {
    general: '{tool} tutorial getting started guide documentation',
  },
  integration: {
    general: '{tool} integration API SDK documentation',
  },
  general: {
    general: GENERIC_TEMPLATE,
  },
};

const ARTICLE_SUFFIXES: Readonly<Partial<Record<QueryIntent, string>>> = {
  alternatives: 'alternatives comparison best tools',
  comparison: 'comparison review analysis',
  features: 'features capabilities review',
  pricing: 'pricing cost analysis',
};
const DEFAULT_ARTICLE_SUFFIX = 'developer tools software review';
const UNDECOMPOSED_ARTICLE_SUFFIX = 'developer tools comparison';

const STOPWORDS: ReadonlySet<string> = new Set([
  'a',
  'an',
  'and',
  'the',
  'or',
  'but',
  'in',
  'on',
  'at',
  'to',
  'for',
  'of',
  'with',
  'by',
]);

const PAIR_PLACEHOLDER = /\{tool[12]\}/;

/**
 * Resolves a template: exact (intent, domain), then (intent, general), then the
 * generic template. Pair templates are skipped when no pair is available to
 * fill them.
 */
export function lookupTemplate(intent: QueryIntent, domain: ToolDomain, hasPair: boolean): string {
  const byDomain = SEARCH_TEMPLATES[intent];
  const candidates = [byDomain?.[domain], byDomain?.general];
  for (const candidate of candidates) {
    if (candidate !== undefined && (hasPair || !PAIR_PLACEHOLDER.test(candidate))) {
      return candidate;
    }
  }
  return GENERIC_TEMPLATE;
}

export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder);
}

/**
 * Collapses whitespace and drops stopword tokens. Falls back to the collapsed
 * input when every token is a stopword, and to the raw input when that is blank.
 */
export function optimizeQuery(query: string): string {
  const collapsed = query.replace(/\s+/g, ' ').trim();
  if (!collapsed) {
    return query;
  }

  const kept = collapsed.split(' ').filter((word) => !STOPWORDS.has(word.toLowerCase()));
  return kept.length > 0 ? kept.join(' ') : collapsed;
}

export function buildSearchQuery(query: ClassifiedQuery): string {
  const { intent, domain, targetSubject, comparisonSubjects, originalQuery } = query;

  if (intent === 'comparison' && comparisonSubjects) {
    const template = lookupTemplate(intent, domain, true);
    return fillTemplate(template, {
      tool1: comparisonSubjects[0],
      tool2: comparisonSubjects[1],
    });
  }

  if (targetSubject === null) {
    return originalQuery;
  }

  return fillTemplate(lookupTemplate(intent, domain, false), { tool: targetSubject });
}

export function buildArticleQuery(query: ClassifiedQuery): string {
  if (query.targetSubject === null) {
    return `${query.originalQuery} ${UNDECOMPOSED_ARTICLE_SUFFIX}`;
  }
  const suffix = ARTICLE_SUFFIXES[query.intent] ?? DEFAULT_ARTICLE_SUFFIX;
  return `${query.targetSubject} ${suffix}`;
}

export function synthesizeQueries(query: ClassifiedQuery): SynthesizedQueries {
  return Object.freeze({
    searchQuery: optimizeQuery(buildSearchQuery(query)),
    articleQuery: optimizeQuery(buildArticleQuery(query)),
  });
}
